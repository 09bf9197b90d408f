/**
 * Keys worth echoing into logs and error context. Objects and symbols are
 * left out.
 */
export function loggableKey(key: unknown): string | number | boolean | undefined {
  if (typeof key === "string" || typeof key === "number" || typeof key === "boolean") {
    return key
  }

  return undefined
}
