import { ConfigService } from '@nestjs/config';
import { PrescriptionSafetyOptions } from '../prescription-safety/config/prescription-safety.config';

/**
 * Map validated environment variables onto engine options. The API key is
 * read here once and handed to the engine; nothing else reads it.
 */
export function prescriptionSafetyOptionsFromEnv(
  configService: ConfigService,
): Partial<PrescriptionSafetyOptions> {
  return {
    enabled: configService.get<boolean>('AI_ANALYSIS_ENABLED'),
    fallbackEnabled: configService.get<boolean>('AI_ANALYSIS_FALLBACK_ENABLED'),
    maxRetries: configService.get<number>('AI_ANALYSIS_MAX_RETRIES'),
    retryDelayMs: configService.get<number>('AI_ANALYSIS_RETRY_DELAY_MS'),
    systemPrompt: configService.get<string>('AI_ANALYSIS_SYSTEM_PROMPT'),
    baseUrl: configService.get<string>('OPENROUTER_API_URL'),
    apiKey: configService.get<string>('OPENROUTER_API_KEY'),
    model: configService.get<string>('OPENROUTER_MODEL'),
    maxTokens: configService.get<number>('OPENROUTER_MAX_TOKENS'),
    temperature: configService.get<number>('OPENROUTER_TEMPERATURE'),
    timeoutMs: configService.get<number>('OPENROUTER_TIMEOUT_MS'),
    minRequestIntervalMs: configService.get<number>(
      'OPENROUTER_RATE_LIMIT_DELAY_MS',
    ),
    referer: configService.get<string>('OPENROUTER_HTTP_REFERER'),
    appTitle: configService.get<string>('OPENROUTER_APP_TITLE'),
  };
}
