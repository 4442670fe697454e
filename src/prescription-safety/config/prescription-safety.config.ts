import { ANALYSIS_SYSTEM_PROMPT } from '../constants/analysis-prompt';

export const PRESCRIPTION_SAFETY_OPTIONS = 'PRESCRIPTION_SAFETY_OPTIONS';

export interface PrescriptionSafetyOptions {
  enabled: boolean; // Feature flag for the whole engine
  fallbackEnabled: boolean; // Use the rule-based analyzer when AI fails
  apiKey?: string;
  baseUrl: string; // Chat completions endpoint
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number; // Per request
  minRequestIntervalMs: number; // Rate limit between outbound calls
  maxRetries: number;
  retryDelayMs: number;
  systemPrompt: string;
  referer?: string;
  appTitle?: string;
}

export const DEFAULT_PRESCRIPTION_SAFETY_OPTIONS: PrescriptionSafetyOptions = {
  enabled: true,
  fallbackEnabled: true,
  baseUrl: 'https://openrouter.ai/api/v1/chat/completions',
  model: 'openai/gpt-4o-mini',
  maxTokens: 2000,
  temperature: 0.3,
  timeoutMs: 30 * 1000, // 30 seconds
  minRequestIntervalMs: 1000,
  maxRetries: 3,
  retryDelayMs: 2000,
  systemPrompt: ANALYSIS_SYSTEM_PROMPT,
  appTitle: 'Prescription Safety Service',
};

export function resolvePrescriptionSafetyOptions(
  options: Partial<PrescriptionSafetyOptions> = {},
): PrescriptionSafetyOptions {
  const defined: Partial<PrescriptionSafetyOptions> = Object.fromEntries(
    Object.entries(options).filter(([, value]) => value !== undefined),
  );
  const resolved: PrescriptionSafetyOptions = {
    ...DEFAULT_PRESCRIPTION_SAFETY_OPTIONS,
    ...defined,
  };
  const apiKey = resolved.apiKey?.trim();

  return {
    ...resolved,
    apiKey: apiKey ? apiKey : undefined,
    maxRetries: Math.max(1, Math.floor(resolved.maxRetries)),
    retryDelayMs: Math.max(0, resolved.retryDelayMs),
    minRequestIntervalMs: Math.max(0, resolved.minRequestIntervalMs),
  };
}
