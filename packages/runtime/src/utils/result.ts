/**
 * Result type for functional error handling
 *
 * `Outcome<T>` is the Result a retry sequence settles with: the operation's
 * value, or the failure of its last attempt.
 */

import type { FailureInfo } from '@retrykit/core';

/**
 * Success result
 */
export type Ok<T> = {
  readonly ok: true;
  readonly value: T;
};

/**
 * Error result
 */
export type Err<E> = {
  readonly ok: false;
  readonly error: E;
};

export type Result<T, E> = Ok<T> | Err<E>;

export type Outcome<T> = Result<T, FailureInfo>;

export const isOk = <T, E>(result: Result<T, E>): result is Ok<T> => result.ok;

export const isErr = <T, E>(result: Result<T, E>): result is Err<E> => !result.ok;

export const ok = <T>(value: T): Ok<T> => Object.freeze<Ok<T>>({ ok: true, value });

export const err = <E>(error: E): Err<E> => Object.freeze<Err<E>>({ ok: false, error });

/**
 * Map over a successful result
 */
export const map = <T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> =>
  isOk(result) ? ok(fn(result.value)) : result;

/**
 * Map over an error result
 */
export const mapErr = <T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> =>
  isErr(result) ? err(fn(result.error)) : result;

/**
 * Branch on a result
 */
export const match = <T, E, U>(
  result: Result<T, E>,
  handlers: { ok: (value: T) => U; err: (error: E) => U }
): U => (isOk(result) ? handlers.ok(result.value) : handlers.err(result.error));

/**
 * Unwrap an outcome, rethrowing the value the last attempt raised
 */
export const unwrap = <T>(outcome: Outcome<T>): T => {
  if (isOk(outcome)) {
    return outcome.value;
  }
  throw outcome.error.cause;
};

export const unwrapOr = <T, E>(result: Result<T, E>, defaultValue: T): T =>
  isOk(result) ? result.value : defaultValue;

/**
 * Async try/catch wrapper that returns Result
 */
export const tryCatchAsync = async <T, E>(
  fn: () => T | Promise<T>,
  errorMapper: (error: unknown) => E
): Promise<Result<T, E>> => {
  try {
    return ok(await fn());
  } catch (error) {
    return err(errorMapper(error));
  }
};
