import { describe, it, expect, vi } from 'vitest';
import { nextDelay, withRetry, RetriesExhaustedError } from '../../src/utils/retry.js';

class Transient extends Error {}

describe('nextDelay', () => {
  const config = { maxAttempts: 6, baseDelayMs: 1000, maxDelayMs: 5000 };

  it('doubles from the base delay and caps at the maximum', () => {
    expect([1, 2, 3, 4, 5].map((attempt) => nextDelay(attempt, config))).toEqual([1000, 2000, 4000, 5000, 5000]);
  });

  it('applies symmetric jitter around the delay', () => {
    const jittered = { ...config, jitter: 0.25 };
    expect(nextDelay(1, jittered, () => 0)).toBe(750);
    expect(nextDelay(1, jittered, () => 1)).toBe(1250);
    expect(nextDelay(1, jittered, () => 0.5)).toBe(1000);
  });

  it('honours a custom multiplier', () => {
    expect(nextDelay(3, { ...config, multiplier: 3, maxDelayMs: 60000 })).toBe(9000);
  });
});

describe('withRetry', () => {
  const base = {
    maxAttempts: 3,
    baseDelayMs: 100,
    maxDelayMs: 1000,
    isRetryable: (error: unknown) => error instanceof Transient,
  };

  it('returns the first successful result and reports attempt numbers', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Transient(`attempt ${attempt}`);
      return 'ok';
    });

    await expect(withRetry(fn, { ...base, sleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('rethrows non-retryable errors without waiting', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fatal = new Error('bad request');

    await expect(withRetry(async () => Promise.reject(fatal), { ...base, sleep })).rejects.toBe(fatal);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('wraps the last error once attempts are exhausted', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    let calls = 0;

    const error = await withRetry(
      async () => {
        calls++;
        throw new Transient(`timeout ${calls}`);
      },
      { ...base, sleep, operation: 'fetch page' }
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetriesExhaustedError);
    if (error instanceof RetriesExhaustedError) {
      expect(error.attempts).toBe(3);
      expect(error.message).toBe('fetch page: retries exhausted after 3 attempts: timeout 3');
      expect(error.lastError).toBeInstanceOf(Transient);
    }
    expect(sleep).toHaveBeenCalledTimes(2);
  });
});
