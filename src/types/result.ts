/**
 * Result type for fallible operations
 *
 * Operations that can fail in expected ways return a Result instead of
 * throwing, so callers handle the failure branch explicitly.
 */

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<E> {
  ok: false;
  error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Wrap a success value
 * @param value - Success payload
 * @returns Ok result
 */
export function ok<T>(value: T): Ok<T> {
  return { ok: true, value: value };
}

/**
 * Wrap a failure
 * @param error - Failure payload
 * @returns Err result
 */
export function err<E>(error: E): Err<E> {
  return { ok: false, error: error };
}
