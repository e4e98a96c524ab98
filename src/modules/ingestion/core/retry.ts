/**
 * Bounded retry with exponential backoff.
 */

import { err, ok, type Result } from 'neverthrow';

import type { SleepFn } from './types.js';

/**
 * Outcome of one failed attempt.
 */
export interface AttemptFailure {
  readonly message: string;
  /** Transient failures are retried, permanent ones end the loop */
  readonly retryable: boolean;
  readonly status?: number;
  readonly cause?: unknown;
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  sleep: SleepFn;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (failure: AttemptFailure, attempt: number, delayMs: number) => void;
}

export interface RetryFailure extends AttemptFailure {
  readonly attempts: number;
}

/**
 * HTTP statuses worth retrying: server errors, request timeout, throttling.
 */
export const isTransientStatus = (status: number): boolean =>
  status >= 500 || status === 408 || status === 429;

/**
 * Delay before retrying after attempt `attempt` (1-based).
 *
 * @example backoffDelay(1, 1000) // 1000
 * @example backoffDelay(3, 1000) // 4000
 */
export const backoffDelay = (attempt: number, baseDelayMs: number): number =>
  Math.pow(2, attempt - 1) * baseDelayMs;

/**
 * Runs `operation` until it succeeds, fails permanently, or `maxAttempts`
 * attempts have been made.
 */
export const withRetry = async <T>(
  operation: (attempt: number) => Promise<Result<T, AttemptFailure>>,
  options: RetryOptions
): Promise<Result<T, RetryFailure>> => {
  const { maxAttempts, baseDelayMs, sleep, onRetry } = options;
  let attempt = 1;

  for (;;) {
    const result = await operation(attempt);
    if (result.isOk()) {
      return ok(result.value);
    }

    const failure = result.error;
    if (!failure.retryable || attempt >= maxAttempts) {
      return err({ ...failure, attempts: attempt });
    }

    const delayMs = backoffDelay(attempt, baseDelayMs);
    onRetry?.(failure, attempt, delayMs);
    await sleep(delayMs);
    attempt++;
  }
};
