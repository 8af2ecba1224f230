/**
 * Typed result values
 *
 * Stages report failure by returning `err(...)` instead of throwing, so the
 * scheduler can aggregate outcomes explicitly.
 *
 * @module pipeline/result
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
