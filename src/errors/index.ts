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
} from "./errors.js";
export { isFatal, isInterruption } from "./fatal.js";
export {
  type ErrorClass,
  type ErrorGuard,
  type ErrorKind,
  errorKind,
  matchesKind,
} from "./kind.js";
