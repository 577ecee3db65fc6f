/**
 * Result type for table operations.
 * Expected failures (missing key, duplicate key, exhausted capacity) are
 * returned as values; callers branch on `ok`.
 */

import { HashTableError } from './errors.js'

export type Result<T, E = HashTableError> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/** Returns the value, or throws the carried error. For tests and scripts. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  if (result.error instanceof Error) throw result.error
  throw new HashTableError('INVALID_ARGUMENT', String(result.error))
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok
}
