/**
 * Try: the outcome of a synchronous fallible computation.
 *
 * A Try is either a Success holding the produced value or a Failure
 * holding the captured cause. Combinators that run caller-supplied
 * functions do so through the capture boundary, so a non-fatal error
 * thrown inside them becomes a Failure while a fatal one propagates.
 * Observers (`onSuccess`, `onFailure`), `fold` and `rethrow` never
 * capture.
 *
 * Instances are immutable. The variant set is closed: only the static
 * factories below create instances.
 *
 * @example
 * ```ts
 * const port = Try.of(() => parsePort(raw))
 *   .filter((n) => n > 1024)
 *   .recover(NoSuchElementError, () => 8080)
 *   .getOrElse(3000);
 * ```
 */

import { inspect } from "node:util";
import { describeValue } from "../errors/describe.js";
import {
  NoSuchElementError,
  NonFatalError,
  UnsupportedOperationError,
} from "../errors/errors.js";
import { isFatal } from "../errors/fatal.js";
import { matchesKind } from "../errors/kind.js";
import type { ErrorKind } from "../errors/kind.js";
import { left, right } from "../types/either.js";
import type { Either } from "../types/either.js";
import { none, some } from "../types/option.js";
import type { Option } from "../types/option.js";
import type { Result } from "../types/result.js";
import { capture } from "./capture.js";
import { hashValue, valueEquals } from "./equality.js";
import { requireFunction, requireKind } from "./require.js";

export abstract class Try<T> implements Iterable<T> {
  /** Mirrors the `ok` discriminant of Result. */
  abstract readonly ok: boolean;

  protected constructor() {}

  // -------------------------------------------------------------------------
  // Construction
  // -------------------------------------------------------------------------

  /**
   * Run `computation` once. Its value becomes a Success; a non-fatal
   * error it throws becomes a Failure; a fatal error is re-thrown.
   * Capturing an interruption signal sets the interrupt flag again.
   */
  static of<T>(computation: () => T): Try<T> {
    requireFunction(computation, "computation");
    return fromResult(capture(computation));
  }

  /** Like `of`, for a procedure with no result. */
  static run(procedure: () => void): Try<void> {
    requireFunction(procedure, "procedure");
    return Try.of<void>(() => {
      procedure();
    });
  }

  static success<T>(value: T): Try<T> {
    return new Success(value);
  }

  /** Throws `cause` instead of returning when it is fatal. */
  static failure<T = never>(cause: unknown): Try<T> {
    return new Failure<T>(cause);
  }

  /**
   * Collect the values of every Success in order, or return the first
   * Failure found.
   */
  static sequence<T>(tries: Iterable<Try<T>>): Try<T[]> {
    const values: T[] = [];
    for (const attempt of tries) {
      if (attempt.isFailure()) {
        return new Failure<T[]>(attempt.cause);
      }
      values.push(attempt.get());
    }
    return new Success(values);
  }

  // -------------------------------------------------------------------------
  // Variant queries and extraction
  // -------------------------------------------------------------------------

  abstract isSuccess(): this is Success<T>;

  abstract isFailure(): this is Failure<T>;

  /**
   * The value of a Success. On a Failure, throws the cause when it is an
   * Error and a NonFatalError wrapping it otherwise.
   */
  abstract get(): T;

  /** The cause of a Failure. Throws UnsupportedOperationError on a Success. */
  abstract getCause(): unknown;

  getOrElse<U = T>(other: U): T | U {
    return this.isSuccess() ? this.value : other;
  }

  getOrElseGet<U = T>(supplier: (cause: unknown) => U): T | U {
    requireFunction(supplier, "supplier");
    return this.isSuccess() ? this.value : supplier(this.getCause());
  }

  /** Throws whatever `mapper` makes of the cause. */
  getOrElseThrow(mapper: (cause: unknown) => unknown): T {
    requireFunction(mapper, "mapper");
    if (this.isSuccess()) {
      return this.value;
    }
    throw mapper(this.getCause());
  }

  // -------------------------------------------------------------------------
  // Transformation
  // -------------------------------------------------------------------------

  map<U>(mapper: (value: T) => U): Try<U> {
    requireFunction(mapper, "mapper");
    if (this.isSuccess()) {
      const value = this.value;
      return fromResult(capture(() => mapper(value)));
    }
    return new Failure<U>(this.getCause());
  }

  flatMap<U>(mapper: (value: T) => Try<U>): Try<U> {
    requireFunction(mapper, "mapper");
    if (this.isSuccess()) {
      const value = this.value;
      return flatten(capture(() => mapper(value)));
    }
    return new Failure<U>(this.getCause());
  }

  /**
   * Keep a Success only if `predicate` holds for its value. A rejected
   * value becomes a Failure with a NoSuchElementError.
   */
  filter(predicate: (value: T) => boolean): Try<T> {
    requireFunction(predicate, "predicate");
    if (this.isSuccess()) {
      const value = this.value;
      const holds = capture(() => predicate(value));
      if (!holds.ok) {
        return new Failure<T>(holds.error);
      }
      if (!holds.value) {
        return new Failure<T>(
          new NoSuchElementError(
            `Predicate does not hold for ${describeValue(value)}`,
          ),
        );
      }
    }
    return this;
  }

  /** Reduce to a single value. Errors thrown by either function propagate. */
  fold<U>(onFailure: (cause: unknown) => U, onSuccess: (value: T) => U): U {
    requireFunction(onFailure, "onFailure");
    requireFunction(onSuccess, "onSuccess");
    return this.isSuccess() ? onSuccess(this.value) : onFailure(this.getCause());
  }

  transform<U>(
    onFailure: (cause: unknown) => Try<U>,
    onSuccess: (value: T) => Try<U>,
  ): Try<U> {
    requireFunction(onFailure, "onFailure");
    requireFunction(onSuccess, "onSuccess");
    if (this.isSuccess()) {
      const value = this.value;
      return flatten(capture(() => onSuccess(value)));
    }
    const cause = this.getCause();
    return flatten(capture(() => onFailure(cause)));
  }

  // -------------------------------------------------------------------------
  // Recovery
  // -------------------------------------------------------------------------

  /** Swap the variants: a Failure's cause becomes a Success's value. */
  failed(): Try<unknown> {
    if (this.isFailure()) {
      return new Success<unknown>(this.cause);
    }
    return new Failure<unknown>(
      new UnsupportedOperationError("Success.failed()"),
    );
  }

  mapFailure(mapper: (cause: unknown) => unknown): Try<T> {
    requireFunction(mapper, "mapper");
    if (this.isFailure()) {
      const cause = this.cause;
      const mapped = capture(() => mapper(cause));
      return new Failure<T>(mapped.ok ? mapped.value : mapped.error);
    }
    return this;
  }

  /**
   * Replace a Failure whose cause matches `kind` with the result of
   * running `recovery` on it. `recovery` runs through the capture
   * boundary, so a throwing recovery yields a new Failure.
   */
  recover<X>(kind: ErrorKind<X>, recovery: (cause: X) => T): Try<T> {
    requireKind(kind, "kind");
    requireFunction(recovery, "recovery");
    if (this.isFailure()) {
      const cause = this.cause;
      if (matchesKind(kind, cause)) {
        return Try.of(() => recovery(cause));
      }
    }
    return this;
  }

  recoverWith<X>(kind: ErrorKind<X>, recovery: (cause: X) => Try<T>): Try<T> {
    requireKind(kind, "kind");
    requireFunction(recovery, "recovery");
    if (this.isFailure()) {
      const cause = this.cause;
      if (matchesKind(kind, cause)) {
        return flatten(capture(() => recovery(cause)));
      }
    }
    return this;
  }

  orElse(supplier: () => Try<T>): Try<T> {
    requireFunction(supplier, "supplier");
    if (this.isSuccess()) {
      return this;
    }
    return flatten(capture(supplier));
  }

  /** Throw the cause as-is when it matches `kind`. */
  rethrow<X>(kind: ErrorKind<X>): Try<T> {
    requireKind(kind, "kind");
    if (this.isFailure() && matchesKind(kind, this.cause)) {
      throw this.cause;
    }
    return this;
  }

  // -------------------------------------------------------------------------
  // Observers
  // -------------------------------------------------------------------------

  onFailure(action: (cause: unknown) => void): Try<T>;
  onFailure<X>(kind: ErrorKind<X>, action: (cause: X) => void): Try<T>;
  onFailure<X>(
    ...args:
      | [action: (cause: unknown) => void]
      | [kind: ErrorKind<X>, action: (cause: X) => void]
  ): Try<T> {
    if (args.length === 1) {
      const [action] = args;
      requireFunction(action, "action");
      if (this.isFailure()) {
        action(this.cause);
      }
      return this;
    }
    const [kind, action] = args;
    requireKind(kind, "kind");
    requireFunction(action, "action");
    if (this.isFailure()) {
      const cause = this.cause;
      if (matchesKind(kind, cause)) {
        action(cause);
      }
    }
    return this;
  }

  onSuccess(action: (value: T) => void): Try<T> {
    requireFunction(action, "action");
    if (this.isSuccess()) {
      action(this.value);
    }
    return this;
  }

  // -------------------------------------------------------------------------
  // Conversion
  // -------------------------------------------------------------------------

  toEither<L>(failureMapper: (cause: unknown) => L): Either<L, T> {
    requireFunction(failureMapper, "failureMapper");
    return this.isSuccess()
      ? right(this.value)
      : left(failureMapper(this.getCause()));
  }

  /** `some(value)` for any Success, including one holding null or undefined. */
  toOption(): Option<T> {
    return this.isSuccess() ? some(this.value) : none();
  }

  /**
   * The value, or undefined. A Success holding null or undefined is
   * indistinguishable from a Failure here.
   */
  toOptional(): NonNullable<T> | undefined {
    return this.isSuccess() ? (this.value ?? undefined) : undefined;
  }

  /** Zero or one element. */
  stream(): readonly T[] {
    return this.isSuccess() ? [this.value] : [];
  }

  collect<R>(collector: (values: readonly T[]) => R): R {
    requireFunction(collector, "collector");
    return collector(this.stream());
  }

  iterator(): Iterator<T> {
    return this.stream()[Symbol.iterator]();
  }

  [Symbol.iterator](): Iterator<T> {
    return this.iterator();
  }

  // -------------------------------------------------------------------------
  // Object protocol
  // -------------------------------------------------------------------------

  abstract equals(other: unknown): boolean;

  abstract hashCode(): number;

  abstract toString(): string;

  [inspect.custom](): string {
    return this.toString();
  }
}

class Success<T> extends Try<T> {
  readonly ok = true as const;
  readonly value: T;

  constructor(value: T) {
    super();
    this.value = value;
    Object.freeze(this);
  }

  isSuccess(): this is Success<T> {
    return true;
  }

  isFailure(): this is Failure<T> {
    return false;
  }

  get(): T {
    return this.value;
  }

  getCause(): never {
    throw new UnsupportedOperationError("getCause() on Success");
  }

  equals(other: unknown): boolean {
    return (
      other === this ||
      (other instanceof Success && valueEquals(this.value, other.value))
    );
  }

  hashCode(): number {
    return (31 + hashValue(this.value)) | 0;
  }

  toString(): string {
    return `Success(${describeValue(this.value)})`;
  }
}

class Failure<T> extends Try<T> {
  readonly ok = false as const;
  readonly cause: unknown;

  constructor(cause: unknown) {
    if (isFatal(cause)) {
      throw cause;
    }
    super();
    this.cause = cause;
    Object.freeze(this);
  }

  isSuccess(): this is Success<T> {
    return false;
  }

  isFailure(): this is Failure<T> {
    return true;
  }

  get(): never {
    if (this.cause instanceof Error) {
      throw this.cause;
    }
    throw new NonFatalError(this.cause);
  }

  getCause(): unknown {
    return this.cause;
  }

  equals(other: unknown): boolean {
    return (
      other === this ||
      (other instanceof Failure && valueEquals(this.cause, other.cause))
    );
  }

  hashCode(): number {
    return hashValue(this.cause);
  }

  toString(): string {
    return `Failure(${describeValue(this.cause)})`;
  }
}

function fromResult<T>(result: Result<T>): Try<T> {
  return result.ok ? new Success(result.value) : new Failure<T>(result.error);
}

function flatten<T>(result: Result<Try<T>>): Try<T> {
  return result.ok ? result.value : new Failure<T>(result.error);
}

export type { Success, Failure };
