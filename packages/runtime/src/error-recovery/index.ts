/**
 * Error recovery module - failure classification, backoff policies and the
 * retry engine
 */

export {
  classifyFailure,
  DEFAULT_TRANSIENT_KINDS,
  isCancellation,
  isTransient,
  resolveTransientKinds,
  TransientKindSet,
  type TransientKindsInput
} from './error-classifier.js';

export {
  MAX_TIMER_DELAY_MS,
  type Operation,
  type RetryOptions,
  retry,
  retryable
} from './retry.js';

export {
  calculateDelay,
  createRetryPolicy,
  DEFAULT_RETRY_POLICY,
  delaySchedule,
  hasRetriesLeft,
  nextPolicy,
  type RetryPolicy
} from './strategies.js';
