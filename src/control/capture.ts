/**
 * The capture boundary.
 *
 * Runs a fallible computation once and reports the outcome as a tagged
 * Result. Fatal errors are re-thrown untouched. An interruption signal
 * is captured like any other error, but the interrupt flag is set again
 * first so that callers further up still see the request.
 */

import { isFatal, isInterruption } from "../errors/fatal.js";
import { ok, err } from "../types/result.js";
import type { Result } from "../types/result.js";
import { interrupt } from "./interrupt.js";

export function capture<T>(computation: () => T): Result<T> {
  try {
    return ok(computation());
  } catch (thrown: unknown) {
    if (isFatal(thrown)) {
      throw thrown;
    }
    if (isInterruption(thrown)) {
      interrupt();
    }
    return err(thrown);
  }
}
