/**
 * Two-sided container. By convention the right side holds the
 * successful value and the left side holds whatever describes the
 * failure.
 */

export type Either<L, R> =
  | { readonly isRight: false; readonly left: L }
  | { readonly isRight: true; readonly right: R };

export function left<L>(value: L): Either<L, never> {
  return { isRight: false, left: value };
}

export function right<R>(value: R): Either<never, R> {
  return { isRight: true, right: value };
}

export function isLeft<L, R>(
  either: Either<L, R>,
): either is { readonly isRight: false; readonly left: L } {
  return !either.isRight;
}

export function isRight<L, R>(
  either: Either<L, R>,
): either is { readonly isRight: true; readonly right: R } {
  return either.isRight;
}

/**
 * Reduce an Either to a single value by applying the function for
 * whichever side is present.
 */
export function fold<L, R, U>(
  either: Either<L, R>,
  onLeft: (value: L) => U,
  onRight: (value: R) => U,
): U {
  return either.isRight ? onRight(either.right) : onLeft(either.left);
}
