/**
 * Tagged outcome of running a fallible computation once.
 *
 * This is the low-level shape the capture boundary hands back; `Try`
 * builds on it. Inspect it with the `ok` discriminant.
 */

export type Result<T, E = unknown> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
