import { setTimeout as delay } from 'node:timers/promises';

import { CancelledError, isRetryableError } from '@cloud-narrator/contracts';

export type RetryAttemptInfo = {
  /** 1-based number of the attempt that just failed. */
  attempt: number;
  delayMs: number;
  error: unknown;
};

export type RetryOptions = {
  label: string;
  /** Additional attempts after the first one. */
  retries: number;
  initialDelayMs: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
  signal?: AbortSignal;
};

/**
 * Run `fn` until it succeeds, the error is not retryable, or `retries` is exhausted.
 * Backoff doubles after every failure. An abort during backoff ends the loop with a
 * CancelledError carrying the last failure as its cause.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const maxDelay = options.maxDelayMs ?? 5 * 60_000;
  let nextDelay = options.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      if (attempt > options.retries || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = Math.min(nextDelay, maxDelay);
      nextDelay *= 2;

      if (options.signal?.aborted) {
        throw new CancelledError(`${options.label} cancelled before retry`, { cause: error });
      }
      options.onRetry?.({ attempt, delayMs, error });

      try {
        await delay(delayMs, undefined, { signal: options.signal });
      } catch {
        throw new CancelledError(`${options.label} cancelled during backoff`, { cause: error });
      }
    }
  }
}
