/**
 * Bounded Retry with Exponential Backoff
 *
 * Runs an async operation up to `maxAttempts` times and reports the outcome
 * as a result value instead of throwing, so callers branch on `ok`.
 *
 * Usage:
 *   const result = await retryWithBackoff(() => provider.fetchCurrentPrice(), {
 *     maxAttempts: 5, initialDelayMs: 30_000, maxDelayMs: 300_000,
 *   });
 *   if (!result.ok) return [];
 *
 * Cancellation is not a failure: when `signal` aborts, `signal.reason` is
 * thrown so the caller unwinds. Only the signal decides; an AbortError from
 * the operation itself (a request timeout) is an ordinary failure.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { InvalidArgumentError } from './errors.ts';

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  /** Total attempts including the first one (>= 1) */
  maxAttempts: number;
  /** Delay before the first retry */
  initialDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  /** Growth factor between delays (default: 2) */
  multiplier?: number;
  /** Return false to stop retrying on this error (default: retry all but InvalidArgumentError) */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each backoff sleep */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  sleep?: SleepFn;
  signal?: AbortSignal;
}

/** Rejects with `signal.reason` when aborted */
export const defaultSleep: SleepFn = async (ms, signal) => {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    signal?.throwIfAborted();
    throw error;
  }
};

const defaultShouldRetry = (error: unknown): boolean => !(error instanceof InvalidArgumentError);

/**
 * Delay to wait after failed attempt `attempt` (1-based):
 * initialDelayMs * multiplier^(attempt - 1), capped at maxDelayMs.
 */
export function computeBackoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'multiplier'>
): number {
  const multiplier = options.multiplier ?? 2;
  const delay = options.initialDelayMs * Math.pow(multiplier, attempt - 1);
  return Math.min(delay, options.maxDelayMs);
}

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
    throw new InvalidArgumentError(`maxAttempts must be an integer >= 1, got ${options.maxAttempts}`);
  }

  const { signal } = options;
  const shouldRetry = options.shouldRetry ?? defaultShouldRetry;
  const wait = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();

    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      signal?.throwIfAborted();

      if (attempt === options.maxAttempts || !shouldRetry(error)) {
        return { ok: false, error, attempts: attempt };
      }

      const delayMs = computeBackoffDelay(attempt, options);
      options.onRetry?.(attempt, error, delayMs);
      await wait(delayMs, signal);
    }
  }
}
