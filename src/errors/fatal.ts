/**
 * Fatal-error classification.
 *
 * An error is fatal when the runtime cannot meaningfully continue after
 * it: link/load failures, thread death, and VM-level exhaustion. Every
 * capture site consults `isFatal` and re-throws instead of capturing.
 */

import {
  InterruptedError,
  LinkageError,
  ThreadDeath,
  VirtualMachineError,
} from "./errors.js";

/** V8 messages for stack exhaustion and failed allocation. */
const EXHAUSTION_MESSAGES: readonly RegExp[] = [
  /^Maximum call stack size exceeded/,
  /^Array buffer allocation failed/,
];

/** Node error codes for native add-ons that failed to link. */
const LINKAGE_CODES: ReadonlySet<string> = new Set(["ERR_DLOPEN_FAILED"]);

function hasStringCode(error: unknown): error is { readonly code: string } {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  );
}

export function isFatal(error: unknown): boolean {
  if (
    error instanceof LinkageError ||
    error instanceof ThreadDeath ||
    error instanceof VirtualMachineError
  ) {
    return true;
  }
  if (error instanceof RangeError) {
    const { message } = error;
    return EXHAUSTION_MESSAGES.some((pattern) => pattern.test(message));
  }
  return hasStringCode(error) && LINKAGE_CODES.has(error.code);
}

/**
 * True for interruption signals: InterruptedError, and anything named
 * "AbortError" (what AbortSignal-aware APIs throw).
 */
export function isInterruption(error: unknown): boolean {
  if (error instanceof InterruptedError) {
    return true;
  }
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === "AbortError"
  );
}
