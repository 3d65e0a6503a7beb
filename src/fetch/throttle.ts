import type { ThrottlePolicy } from '../config.js';
import { jitter, sleep } from '../utils/timing.js';

/**
 * Spaces consecutive page loads by a fixed delay plus jitter. The gap is measured from the
 * start of the previous load, whether it succeeded or not, and is separate from retry backoff.
 */
export class PageThrottle {
  private nextAllowedAt = 0;

  constructor(
    private readonly policy: ThrottlePolicy,
    private readonly wait: (ms: number) => Promise<void> = sleep,
    private readonly now: () => number = Date.now,
    private readonly random: () => number = Math.random,
  ) {}

  async schedule<T>(task: () => Promise<T>): Promise<T> {
    const waitMs = Math.max(0, this.nextAllowedAt - this.now());
    if (waitMs > 0) {
      await this.wait(waitMs);
    }

    this.nextAllowedAt =
      this.now() + this.policy.pageDelayMs + jitter(this.policy.pageDelayJitterMs, this.random);
    return task();
  }
}
