/**
 * Failures raised below the orchestrator. Each carries whether another
 * attempt at the inference endpoint can succeed.
 */
export abstract class AnalysisError extends Error {
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid credential. */
export class ConfigurationError extends AnalysisError {
  readonly retryable = false;
}

/** Network failure or request timeout. */
export class TransportError extends AnalysisError {
  readonly retryable = true;
}

/** Non-success HTTP status or an unexpected response envelope. */
export class ProtocolError extends AnalysisError {
  readonly retryable = true;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The caller aborted the analysis through its AbortSignal. */
export class AnalysisCancelledError extends AnalysisError {
  readonly retryable = false;

  constructor(message = 'Prescription safety analysis was cancelled') {
    super(message);
  }
}

export function isRetryable(error: AnalysisError): boolean {
  return error.retryable;
}
