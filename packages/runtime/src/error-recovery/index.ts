/**
 * Error recovery module
 * Backoff calculation and retry decisions; no timers, no state
 */

export {
  calculateRetryDelay,
  isRetriable,
  type RetryOutcome,
  toRetryOutcome
} from './outcome.js';

export {
  calculateDelay,
  createRetryPolicyConfig,
  RetryPolicies,
  RetryPolicy,
  type RetryPolicyConfig,
  type RetryPolicyName,
  shouldRetry
} from './retry-policy.js';
