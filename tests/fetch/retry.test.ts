import { describe, expect, it, vi } from 'vitest';
import { FetchFailure, RetryExhaustedError } from '../../src/errors.js';
import { backoffDelayMs, withRetry } from '../../src/fetch/retry.js';

const policy = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 };

describe('backoffDelayMs', () => {
  it('doubles from the base delay and stops at the cap', () => {
    const delays = [0, 1, 2, 3, 4].map((attempt) => backoffDelayMs(attempt, { ...policy, maxAttempts: 5 }));
    expect(delays).toEqual([100, 200, 400, 800, 1000]);
  });
});

describe('withRetry', () => {
  it('makes exactly maxAttempts attempts before giving up', async () => {
    const waits: number[] = [];
    const retries: boolean[] = [];
    const task = vi.fn(async () => {
      throw new FetchFailure('FetchTimeout', 'https://www.twine.net/find/video-editors', 'Timeout 1000ms exceeded');
    });

    const error = await withRetry(task, policy, {
      wait: async (ms) => {
        waits.push(ms);
      },
      onFailure: (_failure, _attempt, willRetry) => {
        retries.push(willRetry);
      },
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(3);
      expect(error.lastFailure.kind).toBe('FetchTimeout');
    }
    expect(task).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([100, 200]);
    expect(retries).toEqual([true, true, false]);
  });

  it('returns as soon as an attempt succeeds', async () => {
    const waits: number[] = [];
    const task = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new FetchFailure('FetchError', 'https://www.twine.net', 'net::ERR_CONNECTION_RESET'))
      .mockResolvedValueOnce('<html></html>');

    const value = await withRetry(task, policy, {
      wait: async (ms) => {
        waits.push(ms);
      },
    });

    expect(value).toBe('<html></html>');
    expect(task).toHaveBeenCalledTimes(2);
    expect(task.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1]);
    expect(waits).toEqual([100]);
  });

  it('does not retry errors that are not fetch failures', async () => {
    const wait = vi.fn(async () => {});
    const task = vi.fn(async () => {
      throw new TypeError('bad selector');
    });

    await expect(withRetry(task, policy, { wait })).rejects.toThrow('bad selector');
    expect(task).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });
});
