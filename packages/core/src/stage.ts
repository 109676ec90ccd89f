/**
 * @module stage
 * Retry runner shared by every pipeline step. Only {@link TransientAPIError}
 * is retried; anything else fails the stage on the first attempt. The render
 * stage runs under {@link NO_RETRY}.
 */

import { TransientAPIError, toError } from './errors.js';
import { sleep } from './utils/time.js';

export interface RetryPolicy {
  /** Maximum number of attempts (1 = no retry). */
  maxAttempts: number;
  /** Base delay in ms between retries (doubles on each attempt). */
  backoffMs: number;
}

export const NO_RETRY: RetryPolicy = { maxAttempts: 1, backoffMs: 0 };

export interface RetryHooks {
  onAttempt?(attempt: number): void;
  onError?(error: Error, willRetry: boolean): void;
}

/**
 * Run `fn` until it succeeds, a non-transient error is thrown, or attempts
 * are exhausted. Backoff waits honour `signal`.
 */
export async function executeWithRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  signal: AbortSignal,
  hooks: RetryHooks = {},
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    hooks.onAttempt?.(attempt);
    try {
      return await fn();
    } catch (err) {
      const error = toError(err);
      const willRetry =
        error instanceof TransientAPIError && attempt < maxAttempts && !signal.aborted;
      hooks.onError?.(error, willRetry);
      if (!willRetry) throw error;
      await sleep(policy.backoffMs * Math.pow(2, attempt - 1), signal);
    }
  }
}
