/**
 * Errors that can answer retry questions on their own
 */
export interface RetryableError {
  /** Whether the failed call should be attempted again */
  shouldRetry(attempt: number): boolean;

  /** Suggested wait in milliseconds before the next attempt */
  retryDelay(attempt: number): number;

  maxRetries(): number;
}
