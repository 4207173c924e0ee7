/**
 * Result type for functional error handling
 * Decoding and classification return values instead of throwing
 */

import type { FaultError } from '../errors/fault-error.js';

/**
 * Success result
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Error result
 */
export interface Err<E = FaultError> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Result type - Either Ok or Err
 */
export type Result<T, E = FaultError> = Ok<T> | Err<E>;

/**
 * Result whose failure side is always a FaultError
 */
export type FaultResult<T> = Result<T, FaultError>;

export const isOk = <T, E>(result: Result<T, E>): result is Ok<T> => result.ok;

export const isErr = <T, E>(result: Result<T, E>): result is Err<E> => !result.ok;

export const ok = <T>(value: T): Ok<T> => ({
  ok: true,
  value
});

export const err = <E = FaultError>(error: E): Err<E> => ({
  ok: false,
  error
});

/**
 * Map over a successful result
 */
export const map = <T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> => {
  if (isOk(result)) {
    return ok(fn(result.value));
  }
  return result;
};

/**
 * Map over an error result
 */
export const mapErr = <T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> => {
  if (isErr(result)) {
    return err(fn(result.error));
  }
  return result;
};

/**
 * Unwrap result or return default value
 */
export const unwrapOr = <T, E>(result: Result<T, E>, defaultValue: T): T => {
  if (isOk(result)) {
    return result.value;
  }
  return defaultValue;
};

/**
 * Chain Result computations
 */
export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> => {
  if (isOk(result)) {
    return fn(result.value);
  }
  return result;
};

/**
 * Try/catch wrapper that returns Result
 */
export const tryCatch = <T, E>(fn: () => T, errorMapper: (error: unknown) => E): Result<T, E> => {
  try {
    return ok(fn());
  } catch (error) {
    return err(errorMapper(error));
  }
};
