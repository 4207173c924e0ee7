/**
 * Error system exports for Faultline
 */

export {
  FaultError,
  type FaultErrorDetail,
  type FaultErrorKind,
  formatFaultError,
  isFaultError
} from './fault-error.js';
export type { RetryableError } from './retryable.js';
