/**
 * Retry policies and backoff schedule
 */

import {
  DEFAULT_BACKOFF_MULTIPLIER,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_RETRIES,
  ErrorHelpers,
  formatPolicyError,
  type RetryPolicyInput,
  safeParsePolicyInput
} from '@retrykit/core';
import { resolveTransientKinds } from './error-classifier.js';

/**
 * Retry policy. Immutable; each retry step works on a new value.
 */
export type RetryPolicy = {
  /** Remaining retry budget */
  readonly maxRetries: number;

  /** Wait before the next retry in milliseconds */
  readonly baseDelayMs: number;

  /** Factor applied to baseDelayMs after each retry */
  readonly backoffMultiplier: number;

  /** Failure kinds eligible for retry */
  readonly transientKinds: ReadonlySet<string>;
};

/**
 * Create a validated policy. Throws E_POLICY_INVALID on bad input.
 */
export function createRetryPolicy(input: RetryPolicyInput = {}): RetryPolicy {
  const parsed = safeParsePolicyInput(input);
  if (!parsed.success) {
    throw ErrorHelpers.invalidPolicy(formatPolicyError(parsed.error));
  }

  const { data } = parsed;
  return Object.freeze({
    maxRetries: data.maxRetries ?? DEFAULT_MAX_RETRIES,
    baseDelayMs: data.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
    backoffMultiplier: data.backoffMultiplier ?? DEFAULT_BACKOFF_MULTIPLIER,
    transientKinds: resolveTransientKinds(data)
  });
}

/** maxRetries=3, baseDelayMs=10s, backoffMultiplier=2, default transient kinds */
export const DEFAULT_RETRY_POLICY: RetryPolicy = createRetryPolicy();

/**
 * Policy for the step after a retry: one less retry, delay scaled
 */
export function nextPolicy(policy: RetryPolicy): RetryPolicy {
  return Object.freeze({
    ...policy,
    maxRetries: policy.maxRetries - 1,
    baseDelayMs: policy.baseDelayMs * policy.backoffMultiplier
  });
}

/**
 * Wait applied after the `attempt`-th failed attempt (1-based)
 */
export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  if (attempt <= 0) return 0;
  return policy.baseDelayMs * policy.backoffMultiplier ** (attempt - 1);
}

/**
 * Every wait the policy would apply if all attempts fail transiently
 */
export function delaySchedule(policy: RetryPolicy): number[] {
  return Array.from({ length: policy.maxRetries }, (_, index) => calculateDelay(index + 1, policy));
}

/**
 * Check if the policy still has retry budget
 */
export function hasRetriesLeft(policy: RetryPolicy): boolean {
  return policy.maxRetries > 0;
}
