/**
 * Interrupt flag of the current thread of control.
 *
 * Each thread (the main thread, every worker) loads its own copy of this
 * module, so the flag below belongs to whichever thread reads it. Code
 * that cooperates with cancellation polls `isInterrupted()` or consumes
 * the flag with `interrupted()`.
 */

let flag = false;

export function interrupt(): void {
  flag = true;
}

export function isInterrupted(): boolean {
  return flag;
}

/** Read the flag and clear it. */
export function interrupted(): boolean {
  const wasSet = flag;
  flag = false;
  return wasSet;
}
