/**
 * Bounded retry with exponential backoff
 *
 * The delay schedule is a pure function of the attempt number so it can be
 * tested without timers; withRetry() is the loop that applies it.
 */

import { createLogger } from '../logger.js';
import { errorMessage } from '../errors.js';

const logger = createLogger('retry');

/**
 * Error thrown when all retry attempts have been exhausted
 */
export class RetriesExhaustedError extends Error {
  /** The error raised by the final attempt */
  readonly lastError: unknown;
  readonly attempts: number;

  constructor(lastError: unknown, attempts: number, operation?: string) {
    const label = operation ? `${operation}: ` : '';
    super(`${label}retries exhausted after ${attempts} attempts: ${errorMessage(lastError)}`, {
      cause: lastError,
    });
    this.name = 'RetriesExhaustedError';
    this.lastError = lastError;
    this.attempts = attempts;
  }
}

export interface BackoffConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the second attempt */
  baseDelayMs: number;
  /** Cap applied after exponential growth */
  maxDelayMs: number;
  /** Growth factor between attempts (default: 2) */
  multiplier?: number;
  /** Fraction of the delay used as +/- jitter (default: 0) */
  jitter?: number;
}

/**
 * Delay to wait after the given failed attempt (1-based).
 * nextDelay(1) is the wait before attempt 2.
 */
export function nextDelay(attempt: number, config: BackoffConfig, random: () => number = Math.random): number {
  const multiplier = config.multiplier ?? 2;
  const base = config.baseDelayMs * Math.pow(multiplier, Math.max(0, attempt - 1));
  const delay = Math.min(base, config.maxDelayMs);

  const jitter = config.jitter ?? 0;
  if (jitter > 0) {
    const range = delay * jitter;
    return Math.max(0, delay + (random() * 2 - 1) * range);
  }
  return delay;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions extends BackoffConfig {
  isRetryable: (error: unknown) => boolean;
  /** Name for log lines */
  operation?: string;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Execute an async function, retrying retryable failures with backoff.
 *
 * Non-retryable errors are rethrown as-is. When the attempts run out the
 * last error is wrapped in RetriesExhaustedError.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (!options.isRetryable(error)) {
        throw error;
      }

      if (attempt === maxAttempts) {
        break;
      }

      const delayMs = nextDelay(attempt, options, options.random);
      logger.warn(
        {
          attempt,
          maxAttempts,
          delayMs: Math.round(delayMs),
          error: errorMessage(error),
          operation: options.operation,
        },
        `Retryable error, waiting before attempt ${attempt + 1}/${maxAttempts}`
      );
      await wait(delayMs);
    }
  }

  logger.error(
    { attempts: maxAttempts, error: errorMessage(lastError), operation: options.operation },
    'All retry attempts exhausted'
  );
  throw new RetriesExhaustedError(lastError, maxAttempts, options.operation);
}
