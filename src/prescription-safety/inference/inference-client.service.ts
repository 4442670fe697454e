import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { AxiosResponse, isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { z } from 'zod';
import {
  PRESCRIPTION_SAFETY_OPTIONS,
  PrescriptionSafetyOptions,
} from '../config/prescription-safety.config';
import {
  AnalysisCancelledError,
  AnalysisError,
  ConfigurationError,
  ProtocolError,
  TransportError,
} from '../errors/analysis.errors';

// OpenAI-compatible chat completion request body
export interface ChatCompletionRequest {
  model: string;
  messages: { role: 'system' | 'user'; content: string }[];
  max_tokens: number;
  temperature: number;
}

const chatCompletionEnvelopeSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .min(1),
});

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const CREDENTIAL_REJECTED_STATUSES = new Set([401, 403]);

export const MISSING_API_KEY_MESSAGE = 'Inference API key is not configured';

@Injectable()
export class InferenceClientService {
  private readonly logger = new Logger(InferenceClientService.name);

  constructor(
    private readonly httpService: HttpService,
    @Inject(PRESCRIPTION_SAFETY_OPTIONS)
    private readonly options: PrescriptionSafetyOptions,
  ) {}

  get isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  /**
   * Send the prompt to the chat completions endpoint and return the first
   * completion's message content, unvalidated.
   */
  async invoke(prompt: string, signal?: AbortSignal): Promise<string> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new ConfigurationError(MISSING_API_KEY_MESSAGE);
    }

    const body = this.buildRequest(prompt);
    this.logger.debug(
      `POST ${this.options.baseUrl} model=${body.model} promptLength=${prompt.length}`,
    );

    let response: AxiosResponse<unknown>;
    try {
      response = await firstValueFrom(
        this.httpService.post<unknown>(this.options.baseUrl, body, {
          headers: this.buildHeaders(apiKey),
          timeout: this.options.timeoutMs,
          signal,
        }),
      );
    } catch (error) {
      throw this.toAnalysisError(error, signal);
    }

    return this.extractContent(response.data);
  }

  buildRequest(prompt: string): ChatCompletionRequest {
    return {
      model: this.options.model,
      messages: [
        { role: 'system', content: this.options.systemPrompt },
        { role: 'user', content: prompt },
      ],
      max_tokens: this.options.maxTokens,
      temperature: this.options.temperature,
    };
  }

  private buildHeaders(apiKey: string): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${apiKey}`,
      'Content-Type': 'application/json',
    };
    if (this.options.referer) {
      headers['HTTP-Referer'] = this.options.referer;
    }
    if (this.options.appTitle) {
      headers['X-Title'] = this.options.appTitle;
    }
    return headers;
  }

  private extractContent(data: unknown): string {
    const envelope = chatCompletionEnvelopeSchema.safeParse(data);
    if (!envelope.success) {
      throw new ProtocolError(
        'Inference response has no completion message content',
      );
    }

    const content = envelope.data.choices[0].message.content;
    if (!content.trim()) {
      throw new ProtocolError('Inference response content is empty');
    }
    return content;
  }

  private toAnalysisError(error: unknown, signal?: AbortSignal): AnalysisError {
    if (signal?.aborted) {
      return new AnalysisCancelledError();
    }

    if (!isAxiosError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      return new TransportError(`Inference request failed: ${message}`, {
        cause: error,
      });
    }

    if (error.response) {
      if (CREDENTIAL_REJECTED_STATUSES.has(error.response.status)) {
        return new ConfigurationError(
          `Inference endpoint rejected the API key (status ${error.response.status})`,
          { cause: error },
        );
      }
      return new ProtocolError(
        `Inference endpoint responded with status ${error.response.status}`,
        error.response.status,
        { cause: error },
      );
    }

    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new TransportError(
        `Inference request timed out after ${this.options.timeoutMs}ms`,
        { cause: error },
      );
    }

    return new TransportError(`Inference request failed: ${error.message}`, {
      cause: error,
    });
  }
}
