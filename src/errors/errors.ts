/**
 * Error classes raised or recognised by the library.
 *
 * Fatal kinds (LinkageError, ThreadDeath, VirtualMachineError and its
 * subclasses) are never captured into a Failure. Application code may
 * throw them to signal that the process cannot meaningfully continue.
 */

import { describeValue } from "./describe.js";

/** An operation is not defined for the receiver's current state. */
export class UnsupportedOperationError extends Error {
  override readonly name: string = "UnsupportedOperationError";
}

/** A predicate rejected the only candidate element. */
export class NoSuchElementError extends Error {
  override readonly name: string = "NoSuchElementError";
}

/**
 * Raised by unsafe extraction when the captured cause is not an Error
 * instance (a thrown string, number, plain object, null, ...). The
 * original value is kept as `cause`.
 */
export class NonFatalError extends Error {
  override readonly name: string = "NonFatalError";

  constructor(cause: unknown) {
    super(describeValue(cause), { cause });
  }
}

/** Cooperative interruption of the current thread of control. */
export class InterruptedError extends Error {
  override readonly name: string = "InterruptedError";
}

/** A module or native add-on could not be linked or loaded. */
export class LinkageError extends Error {
  override readonly name: string = "LinkageError";
}

/** The current thread of control is being torn down. */
export class ThreadDeath extends Error {
  override readonly name: string = "ThreadDeath";
}

/** The runtime itself is broken or out of resources. */
export class VirtualMachineError extends Error {
  override readonly name: string = "VirtualMachineError";
}

export class OutOfMemoryError extends VirtualMachineError {
  override readonly name: string = "OutOfMemoryError";
}

export class StackOverflowError extends VirtualMachineError {
  override readonly name: string = "StackOverflowError";
}
