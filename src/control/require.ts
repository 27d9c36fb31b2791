/**
 * Argument checks shared by every entry point and combinator.
 *
 * These guard against JavaScript callers (or `any`-typed call sites)
 * passing something other than a function. Violations are programmer
 * errors: they throw TypeError and are never captured into a Failure.
 */

import { z } from "zod";

const callableSchema = z.function();

const kindGuardSchema = z.object({
  name: z.string(),
  test: z.function(),
});

function requirePresent(value: unknown, name: string): void {
  if (value === null || value === undefined) {
    throw new TypeError(`${name} is null`);
  }
}

export function requireFunction(value: unknown, name: string): void {
  requirePresent(value, name);
  if (!callableSchema.safeParse(value).success) {
    throw new TypeError(`${name} is not a function`);
  }
}

/** Accepts an error class or a guard built with `errorKind()`. */
export function requireKind(value: unknown, name: string): void {
  requirePresent(value, name);
  if (
    !callableSchema.safeParse(value).success &&
    !kindGuardSchema.safeParse(value).success
  ) {
    throw new TypeError(`${name} is not an error class or kind guard`);
  }
}
