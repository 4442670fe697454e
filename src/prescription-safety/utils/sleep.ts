import { setTimeout as delay } from 'timers/promises';
import { AnalysisCancelledError } from '../errors/analysis.errors';

/**
 * Wait `ms` milliseconds, rejecting with AnalysisCancelledError as soon as
 * `signal` aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new AnalysisCancelledError();
  }
  if (ms <= 0) {
    return;
  }

  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new AnalysisCancelledError();
    }
    throw error;
  }
}
