/**
 * Bounded retry and per-attempt timeout
 */

import type { BackoffStrategy, RetryPolicy } from '../types/common.js';
import { TranslationTimeoutError, toError } from '../errors.js';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before the next attempt, after `failedAttempt` (1-based) failed
 */
export function retryDelay(
  baseMs: number,
  backoff: BackoffStrategy,
  failedAttempt: number
): number {
  switch (backoff) {
    case 'fixed':
      return baseMs;
    case 'linear':
      return baseMs * failedAttempt;
    case 'exponential':
      return baseMs * 2 ** (failedAttempt - 1);
  }
}

export interface RetryOptions {
  policy: RetryPolicy;
  isRetryable: (error: Error) => boolean;
  /** Turns the last error into the error the caller sees */
  escalate?: (lastError: Error, attempts: number) => Error;
  onRetry?: (error: Error, failedAttempt: number, delayMs: number) => void;
  sleep?: Sleep;
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

/**
 * Run `operation` up to policy.maxAttempts times.
 * Stops at the first success or the first non-retryable error.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, Math.floor(options.policy.maxAttempts));
  const wait = options.sleep ?? sleep;
  const escalate = options.escalate ?? ((error: Error) => error);

  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      const value = await operation(attempt);
      return { value, attempts: attempt };
    } catch (caught) {
      const error = toError(caught);
      if (attempt >= maxAttempts || !options.isRetryable(error)) {
        throw escalate(error, attempt);
      }
      const delayMs = retryDelay(options.policy.retryDelayMs, options.policy.backoff, attempt);
      options.onRetry?.(error, attempt, delayMs);
      if (delayMs > 0) {
        await wait(delayMs);
      }
    }
  }
}

/**
 * Bound one call by `timeoutMs`. The signal handed to `operation` aborts on
 * timeout so well-behaved backends stop their work.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TranslationTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
