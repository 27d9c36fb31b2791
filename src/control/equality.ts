/**
 * Equality and hashing for values held by a Try.
 *
 * Two held values are equal when they are identical, both NaN, or the
 * left one has an `equals` method that accepts the right one. Errors
 * have no `equals`, so causes compare by identity.
 *
 * `hashValue` agrees with `valueEquals`: primitives hash by content,
 * objects with `hashCode()` delegate to it, and any other object gets a
 * hash tied to its identity.
 *
 * A value that defines `equals` must also define `hashCode`, so that
 * equal values hash alike. Without it the identity hash applies and two
 * equal values may hash differently.
 */

interface Equatable {
  equals(other: unknown): boolean;
}

interface Hashable {
  hashCode(): number;
}

function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === "object" &&
    value !== null &&
    "equals" in value &&
    typeof value.equals === "function"
  );
}

function isHashable(value: object): value is Hashable {
  return "hashCode" in value && typeof value.hashCode === "function";
}

export function valueEquals(a: unknown, b: unknown): boolean {
  if (a === b) {
    return true;
  }
  if (Number.isNaN(a) && Number.isNaN(b)) {
    return true;
  }
  return isEquatable(a) && a.equals(b) === true;
}

/** 31-multiplier string hash, kept in 32-bit signed range. */
export function hashString(text: string): number {
  let hash = 0;
  for (let i = 0; i < text.length; i++) {
    hash = (Math.imul(31, hash) + text.charCodeAt(i)) | 0;
  }
  return hash;
}

const identityHashes = new WeakMap<object, number>();
let nextIdentityHash = 1;

function identityHash(value: object): number {
  const existing = identityHashes.get(value);
  if (existing !== undefined) {
    return existing;
  }
  const hash = hashString(`@${nextIdentityHash++}`);
  identityHashes.set(value, hash);
  return hash;
}

export function hashValue(value: unknown): number {
  if (value === null || value === undefined) {
    return 0;
  }
  if (typeof value === "boolean") {
    return value ? 1231 : 1237;
  }
  if (typeof value === "string") {
    return hashString(value);
  }
  if (typeof value === "symbol") {
    return hashString(value.description ?? "");
  }
  if (typeof value === "object") {
    return isHashable(value) ? value.hashCode() | 0 : identityHash(value);
  }
  if (typeof value === "function") {
    return identityHash(value);
  }
  // number or bigint
  return hashString(String(value));
}
