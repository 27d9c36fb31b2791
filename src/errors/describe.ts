/**
 * Render any thrown or held value as text without throwing.
 * `String()` fails on objects with no prototype and on objects whose
 * `toString` throws; those fall back to the `[object Tag]` form.
 */
export function describeValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}
