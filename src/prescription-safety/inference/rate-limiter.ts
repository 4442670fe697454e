import { AnalysisCancelledError } from '../errors/analysis.errors';
import { sleep } from '../utils/sleep';

export interface RateLimiterClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

const systemClock: RateLimiterClock = {
  now: () => Date.now(),
  sleep,
};

/**
 * Enforces a minimum spacing between outbound calls. Callers are queued on
 * a promise chain so concurrent analyses take their turns one at a time.
 */
export class RateLimiter {
  private lastCallAt?: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly minDelayMs: number,
    private readonly clock: RateLimiterClock = systemClock,
  ) {}

  waitIfNeeded(signal?: AbortSignal): Promise<void> {
    const turn = this.queue.then(() => this.takeTurn(signal));
    // A cancelled waiter must not block the callers queued behind it
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  private async takeTurn(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new AnalysisCancelledError();
    }
    if (this.lastCallAt !== undefined) {
      const elapsed = this.clock.now() - this.lastCallAt;
      if (elapsed < this.minDelayMs) {
        await this.clock.sleep(this.minDelayMs - elapsed, signal);
      }
    }
    this.lastCallAt = this.clock.now();
  }
}
