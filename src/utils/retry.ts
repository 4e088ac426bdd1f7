/**
 * Retry Logic
 *
 * Retries run immediately. Used for the transient races between an in-flight request and a page,
 * context or browser being torn down elsewhere.
 */

import { logger } from './logger.js';
import { isTargetClosedError } from '../types/errors.js';

const log = logger.retry;

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /**
   * Maximum number of total attempts (not retries).
   *
   * - maxAttempts: 1 = no retries (just the initial attempt)
   * - maxAttempts: 4 = 1 initial attempt + up to 3 retries
   *
   * @default 3 (1 initial + 2 retries)
   */
  maxAttempts?: number;

  /**
   * Return true to retry, false to throw immediately.
   * @default Retries when the target page, context or browser was closed
   */
  retryOn?: (error: Error) => boolean;

  /**
   * Callback invoked before each retry attempt.
   */
  onRetry?: (attempt: number, error: Error) => void;

  /**
   * Label added to the retry log entries.
   */
  operation?: string;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  retryOn: isTargetClosedError,
  onRetry: () => {},
  operation: 'operation',
};

/**
 * Execute an async function with automatic retry on failure.
 *
 * @throws Last error if all attempts fail, or the first non-retryable one
 *
 * @example
 * ```typescript
 * const html = await withRetry(() => page.content(), {
 *   maxAttempts: 2,
 *   retryOn: isNavigatingContentError,
 * });
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= opts.maxAttempts || !opts.retryOn(lastError)) {
        throw lastError;
      }

      opts.onRetry(attempt, lastError);

      log.warn('Retry attempt failed', {
        operation: opts.operation,
        attempt,
        maxAttempts: opts.maxAttempts,
        errorMessage: lastError.message,
      });
    }
  }

  throw lastError ?? new Error(`${opts.operation} failed without running`);
}
