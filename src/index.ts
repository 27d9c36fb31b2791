/**
 * fallible: a synchronous Try type that captures recoverable errors as
 * values and lets fatal ones through.
 */

export {
  Try,
  type Success,
  type Failure,
  capture,
  interrupt,
  isInterrupted,
  interrupted,
} from "./control/index.js";
export {
  UnsupportedOperationError,
  NoSuchElementError,
  NonFatalError,
  InterruptedError,
  LinkageError,
  ThreadDeath,
  VirtualMachineError,
  OutOfMemoryError,
  StackOverflowError,
  isFatal,
  isInterruption,
  type ErrorClass,
  type ErrorGuard,
  type ErrorKind,
  errorKind,
  matchesKind,
} from "./errors/index.js";
export {
  type Result,
  ok,
  err,
  type Either,
  left,
  right,
  isLeft,
  isRight,
  fold,
  type Option,
  some,
  none,
  isSome,
  isNone,
} from "./types/index.js";
