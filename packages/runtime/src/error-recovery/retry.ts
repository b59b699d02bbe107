/**
 * Retry mechanism with exponential backoff
 */

import { createSilentLogger, type FailureInfo, type Logger } from '@retrykit/core';
import { isOk, type Outcome, tryCatchAsync } from '../utils/result.js';
import { classifyFailure, isTransient } from './error-classifier.js';
import { DEFAULT_RETRY_POLICY, hasRetriesLeft, nextPolicy, type RetryPolicy } from './strategies.js';

/**
 * Zero-argument computation that may fail
 */
export type Operation<T> = () => T | Promise<T>;

/**
 * Retry options
 */
export type RetryOptions = {
  /** Diagnostic tracing; silent by default */
  logger?: Logger;

  /**
   * Callback before each wait; `attempt` is the 1-based failed attempt.
   * An error thrown here is logged and the retry continues. Errors thrown
   * by the logger itself propagate.
   */
  onRetry?: (failure: FailureInfo, attempt: number, delayMs: number) => void;

  /** Wait implementation; a setTimeout-based sleep by default */
  sleep?: (ms: number) => Promise<void>;
};

/** Longest delay a single setTimeout honours */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Sleep for specified milliseconds. Delays past the timer limit are
 * chained in chunks.
 */
async function sleep(ms: number): Promise<void> {
  let remaining = ms;
  do {
    const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, chunk));
    remaining -= chunk;
  } while (remaining > 0);
}

/**
 * Run an operation, retrying transient failures with backoff.
 *
 * Settles with the operation's value, or with the failure of the last
 * attempt once the failure is not transient or the budget is spent. Never
 * rejects because of the operation.
 */
export async function retry<T>(
  operation: Operation<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<Outcome<T>> {
  const logger = options.logger ?? createSilentLogger();
  const wait = options.sleep ?? sleep;
  let current = policy;
  let attempt = 0;

  while (true) {
    attempt++;
    logger.debug({ attempt, retriesLeft: current.maxRetries }, 'Trying operation');

    const outcome = await tryCatchAsync(operation, classifyFailure);
    if (isOk(outcome)) {
      logger.debug({ attempt }, 'Operation succeeded');
      return outcome;
    }

    const failure = outcome.error;
    if (!hasRetriesLeft(current) || !isTransient(failure, current.transientKinds)) {
      logger.debug(
        { attempt, kind: failure.kind, transient: isTransient(failure, current.transientKinds) },
        `Giving up: ${failure.message}`
      );
      return outcome;
    }

    const delayMs = current.baseDelayMs;
    logger.warn(
      { attempt, kind: failure.kind, delayMs },
      `Attempt failed: ${failure.message}; retrying in ${delayMs}ms`
    );
    try {
      options.onRetry?.(failure, attempt, delayMs);
    } catch (hookError) {
      logger.error({ attempt, error: hookError }, 'onRetry callback failed');
    }

    await wait(delayMs);
    current = nextPolicy(current);
  }
}

/**
 * Create a function that runs `retry` on each call
 */
export function retryable<T>(
  operation: Operation<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): () => Promise<Outcome<T>> {
  return () => retry(operation, policy, options);
}
