/**
 * Zero-or-one container. Unlike `T | undefined`, `some(undefined)` is a
 * present value, so an Option can carry absence markers.
 */

export type Option<T> =
  | { readonly isSome: true; readonly value: T }
  | { readonly isSome: false };

const NONE: Option<never> = Object.freeze({ isSome: false });

export function some<T>(value: T): Option<T> {
  return { isSome: true, value };
}

export function none<T = never>(): Option<T> {
  return NONE;
}

export function isSome<T>(
  option: Option<T>,
): option is { readonly isSome: true; readonly value: T } {
  return option.isSome;
}

export function isNone<T>(
  option: Option<T>,
): option is { readonly isSome: false } {
  return !option.isSome;
}
