import { err, ok, type Result } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import {
  backoffDelay,
  isTransientStatus,
  withRetry,
  type AttemptFailure,
} from '@/modules/ingestion/index.js';

const transient: AttemptFailure = { message: 'HTTP 503', retryable: true, status: 503 };
const permanent: AttemptFailure = { message: 'HTTP 404', retryable: false, status: 404 };

const makeSleep = () => vi.fn(async (_ms: number) => undefined);

describe('backoffDelay', () => {
  it('doubles from the base delay', () => {
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, 1000))).toEqual([
      1000, 2000, 4000, 8000,
    ]);
  });
});

describe('isTransientStatus', () => {
  it('retries server errors, timeouts and throttling only', () => {
    expect(isTransientStatus(500)).toBe(true);
    expect(isTransientStatus(503)).toBe(true);
    expect(isTransientStatus(408)).toBe(true);
    expect(isTransientStatus(429)).toBe(true);
    expect(isTransientStatus(404)).toBe(false);
    expect(isTransientStatus(400)).toBe(false);
  });
});

describe('withRetry', () => {
  it('returns the first success without sleeping', async () => {
    const sleep = makeSleep();

    const result = await withRetry(async () => ok('payload'), {
      maxAttempts: 3,
      baseDelayMs: 100,
      sleep,
    });

    expect(result._unsafeUnwrap()).toBe('payload');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries transient failures with backoff', async () => {
    const sleep = makeSleep();
    const outcomes: Result<string, AttemptFailure>[] = [err(transient), err(transient), ok('payload')];
    const operation = vi.fn(
      async (attempt: number): Promise<Result<string, AttemptFailure>> =>
        outcomes[attempt - 1] ?? err(permanent)
    );

    const result = await withRetry(operation, { maxAttempts: 3, baseDelayMs: 100, sleep });

    expect(result._unsafeUnwrap()).toBe('payload');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('stops after maxAttempts and reports the attempt count', async () => {
    const sleep = makeSleep();

    const result = await withRetry(async () => err(transient), {
      maxAttempts: 3,
      baseDelayMs: 10,
      sleep,
    });

    expect(result._unsafeUnwrapErr()).toEqual({ ...transient, attempts: 3 });
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('does not retry permanent failures', async () => {
    const sleep = makeSleep();

    const result = await withRetry(async () => err(permanent), {
      maxAttempts: 5,
      baseDelayMs: 10,
      sleep,
    });

    expect(result._unsafeUnwrapErr()).toEqual({ ...permanent, attempts: 1 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('notifies before each retry', async () => {
    const onRetry = vi.fn();

    await withRetry(async () => err(transient), {
      maxAttempts: 2,
      baseDelayMs: 50,
      sleep: makeSleep(),
      onRetry,
    });

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(transient, 1, 50);
  });
});
