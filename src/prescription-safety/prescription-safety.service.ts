import { Inject, Injectable, Logger } from '@nestjs/common';
import { ResponseInterpreter } from './analysis/response-interpreter';
import { RuleBasedAnalyzer } from './analysis/rule-based-analyzer';
import {
  PRESCRIPTION_SAFETY_OPTIONS,
  PrescriptionSafetyOptions,
} from './config/prescription-safety.config';
import { buildAnalysisPrompt } from './constants/analysis-prompt';
import {
  AnalysisCancelledError,
  AnalysisError,
  isRetryable,
} from './errors/analysis.errors';
import {
  InferenceClientService,
  MISSING_API_KEY_MESSAGE,
} from './inference/inference-client.service';
import { RateLimiter } from './inference/rate-limiter';
import {
  AnalysisProgressEvent,
  AnalysisResult,
  AnalysisServiceStatus,
  AnalyzeSafetyOptions,
  MedicationItem,
  PatientContext,
  RiskLevel,
  emptyFindings,
} from './types/analysis.types';
import { sleep } from './utils/sleep';

@Injectable()
export class PrescriptionSafetyService {
  private readonly logger = new Logger(PrescriptionSafetyService.name);
  private readonly rateLimiter: RateLimiter;

  constructor(
    @Inject(PRESCRIPTION_SAFETY_OPTIONS)
    private readonly options: PrescriptionSafetyOptions,
    private readonly inferenceClient: InferenceClientService,
    private readonly responseInterpreter: ResponseInterpreter,
    private readonly ruleBasedAnalyzer: RuleBasedAnalyzer,
  ) {
    this.rateLimiter = new RateLimiter(options.minRequestIntervalMs);
  }

  /**
   * Produce a safety report for a prescription. Operational failures of the
   * AI path end in the rule-based fallback, or in a result with
   * `source: 'error'` when fallback is disabled. Only cancellation through
   * `options.signal` rejects.
   */
  async analyzeSafety(
    medications: readonly MedicationItem[],
    patientContext: PatientContext,
    options: AnalyzeSafetyOptions = {},
  ): Promise<AnalysisResult> {
    const notify = (event: AnalysisProgressEvent) => options.onProgress?.(event);

    if (!this.options.enabled) {
      this.logger.log('Prescription safety analysis is disabled, skipping');
      notify({ type: 'completed', source: 'system' });
      return this.systemResult('Prescription safety analysis is disabled.');
    }

    if (medications.length === 0) {
      notify({ type: 'completed', source: 'system' });
      return this.systemResult('No medications to analyze.');
    }

    // No key means no network call, so the rate limiter is not consulted
    if (!this.inferenceClient.isConfigured) {
      this.logger.warn(`AI analysis skipped: ${MISSING_API_KEY_MESSAGE}`);
      return this.concludeWithoutAi(
        medications,
        patientContext,
        MISSING_API_KEY_MESSAGE,
        notify,
      );
    }

    const maxAttempts = this.options.maxRetries;
    const medicationNames = medications.map((medication) => medication.name);
    let lastError: AnalysisError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.logger.log(
        `Analyzing prescription safety (attempt ${attempt} of ${maxAttempts})`,
      );
      notify({ type: 'attempt', attempt, maxAttempts });

      try {
        await this.rateLimiter.waitIfNeeded(options.signal);
        const prompt = buildAnalysisPrompt(medications, patientContext);
        const rawText = await this.inferenceClient.invoke(
          prompt,
          options.signal,
        );
        const result = this.responseInterpreter.interpret(rawText, {
          medicationNames,
        });

        this.logger.log(
          `AI analysis completed on attempt ${attempt} (${result.interpretation} interpretation, ${result.overallRisk} risk)`,
        );
        notify({ type: 'completed', source: result.source });
        return result;
      } catch (error) {
        if (!(error instanceof AnalysisError)) {
          throw error;
        }
        if (error instanceof AnalysisCancelledError) {
          this.logger.warn('Prescription safety analysis cancelled by caller');
          throw error;
        }

        lastError = error;
        this.logger.warn(
          `AI analysis attempt ${attempt} of ${maxAttempts} failed: ${error.message}`,
        );

        if (!isRetryable(error)) {
          break;
        }
        if (attempt < maxAttempts) {
          notify({ type: 'retry', attempt, maxAttempts, reason: error.message });
          await sleep(this.options.retryDelayMs, options.signal);
        }
      }
    }

    return this.concludeWithoutAi(
      medications,
      patientContext,
      lastError?.message ?? 'AI analysis failed after all retries',
      notify,
    );
  }

  isAiAvailable(): boolean {
    return this.options.enabled && this.inferenceClient.isConfigured;
  }

  getStatus(): AnalysisServiceStatus {
    return {
      enabled: this.options.enabled,
      apiConfigured: this.inferenceClient.isConfigured,
      fallbackEnabled: this.options.fallbackEnabled,
      model: this.options.model,
      maxRetries: this.options.maxRetries,
    };
  }

  private concludeWithoutAi(
    medications: readonly MedicationItem[],
    patientContext: PatientContext,
    reason: string,
    notify: (event: AnalysisProgressEvent) => void,
  ): AnalysisResult {
    if (this.options.fallbackEnabled) {
      this.logger.log('AI analysis unavailable, using rule-based fallback');
      notify({ type: 'fallback', reason });
      const result = this.ruleBasedAnalyzer.analyze(medications, patientContext);
      notify({ type: 'completed', source: result.source });
      return result;
    }

    this.logger.error(
      `Prescription safety analysis failed and fallback is disabled: ${reason}`,
    );
    notify({ type: 'completed', source: 'error' });
    return this.errorResult(reason);
  }

  private systemResult(summary: string): AnalysisResult {
    return this.bareResult('system', 'low', summary);
  }

  private errorResult(reason: string): AnalysisResult {
    return {
      ...this.bareResult(
        'error',
        'moderate',
        'Prescription safety analysis could not be completed. Review the prescription manually.',
      ),
      error: reason,
    };
  }

  private bareResult(
    source: AnalysisResult['source'],
    overallRisk: RiskLevel,
    summary: string,
  ): AnalysisResult {
    return {
      ...emptyFindings(),
      overallRisk,
      summary,
      source,
      timestamp: new Date().toISOString(),
    };
  }
}
