/**
 * Error kinds select which Failures a recovery, observer or rethrow
 * applies to.
 *
 * Matching policy:
 *   - a class matches by `instanceof`, so subclasses match too;
 *   - a guard built with `errorKind()` matches whatever its test accepts,
 *     which covers thrown values that are not class instances.
 */

export type ErrorClass<X> = abstract new (...args: never[]) => X;

export interface ErrorGuard<X> {
  readonly name: string;
  test(cause: unknown): cause is X;
}

export type ErrorKind<X> = ErrorClass<X> | ErrorGuard<X>;

export function errorKind<X>(
  name: string,
  test: (cause: unknown) => cause is X,
): ErrorGuard<X> {
  return Object.freeze({ name, test });
}

function isErrorClass<X>(kind: ErrorKind<X>): kind is ErrorClass<X> {
  return typeof kind === "function";
}

export function matchesKind<X>(kind: ErrorKind<X>, cause: unknown): cause is X {
  return isErrorClass(kind) ? cause instanceof kind : kind.test(cause);
}
