/**
 * Retry outcomes
 *
 * Classifies the result of one attempt so a caller's retry loop can decide
 * what to do next. Nothing here waits.
 */

import { ErrorCategory, type Result, type RetryableError } from '@faultline/core';

export type RetryOutcome<T, E> =
  | { readonly status: 'success'; readonly value: T }
  | { readonly status: 'retry'; readonly error: E; readonly delay: number }
  | { readonly status: 'failed'; readonly error: E };

/**
 * Decide the outcome of an attempt from its result
 */
export function toRetryOutcome<T, E extends RetryableError>(
  result: Result<T, E>,
  attempt: number
): RetryOutcome<T, E> {
  if (result.ok) {
    return { status: 'success', value: result.value };
  }

  const { error } = result;
  if (error.shouldRetry(attempt)) {
    return { status: 'retry', error, delay: error.retryDelay(attempt) };
  }

  return { status: 'failed', error };
}

export function isRetriable(category: ErrorCategory): boolean {
  return ErrorCategory.isRetriable(category);
}

/**
 * Category delay for an attempt (1-based), in milliseconds
 */
export function calculateRetryDelay(category: ErrorCategory, attempt: number): number {
  return ErrorCategory.retryDelay(category, attempt);
}
