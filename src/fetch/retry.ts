import type { RetryPolicy } from '../config.js';
import { FetchFailure, RetryExhaustedError } from '../errors.js';
import { sleep } from '../utils/timing.js';

export interface RetryHooks {
  onFailure?: (failure: FetchFailure, attempt: number, willRetry: boolean) => Promise<void> | void;
  wait?: (ms: number) => Promise<void>;
}

/** Delay after the failed attempt with zero-based index `attempt`. */
export function backoffDelayMs(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
}

/**
 * Runs `task` at most `policy.maxAttempts` times. Only FetchFailure is retried;
 * anything else propagates on the first throw.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const wait = hooks.wait ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await task(attempt);
    } catch (error) {
      if (!(error instanceof FetchFailure)) {
        throw error;
      }
      const willRetry = attempt + 1 < maxAttempts;
      await hooks.onFailure?.(error, attempt, willRetry);
      if (!willRetry) {
        throw new RetryExhaustedError(attempt + 1, error);
      }
      await wait(backoffDelayMs(attempt, policy));
    }
  }
}
