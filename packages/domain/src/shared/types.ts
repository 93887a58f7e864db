/**
 * @fileoverview Shared Domain Types
 *
 * Result pattern for operations that report failure as a value
 * instead of throwing.
 *
 * @module domain/shared/types
 */

// ============================================================================
// RESULT PATTERN TYPES
// ============================================================================

export interface Success<T> {
  readonly success: true;
  readonly value: T;
  readonly error?: never;
}

export interface Failure<E> {
  readonly success: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Either a value or the error that prevented computing it
 *
 * @example
 * ```typescript
 * const result = tryPatientNormalise(rows);
 * if (result.success) {
 *   render(result.value.toRows());
 * } else {
 *   logger.warn({ code: result.error.code }, 'Normalisation rejected');
 * }
 * ```
 */
export type Result<T, E = Error> = Success<T> | Failure<E>;

// ============================================================================
// RESULT PATTERN UTILITIES
// ============================================================================

export function ok<T>(value: T): Success<T> {
  return { success: true, value };
}

export function err<E>(error: E): Failure<E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Success<T> {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is Failure<E> {
  return !result.success;
}

/**
 * Unwrap a result, throwing the error if it's a failure
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.success) {
    return result.value;
  }
  throw result.error;
}

export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return result.success ? result.value : defaultValue;
}
