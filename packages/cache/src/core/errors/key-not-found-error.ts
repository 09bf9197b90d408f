import { type AppError, BaseError, isAppError } from "@stowage/errors"
import { loggableKey } from "../utils/loggable-key"

export type KeyNotFoundErrorCode = "key_not_found"

/**
 * Thrown by `get` when the key is not cached.
 *
 * A miss is an expected outcome, so the error is operational. Primitive keys
 * are echoed in `context.key`.
 */
export class KeyNotFoundError extends BaseError<KeyNotFoundErrorCode> {
  constructor(key: unknown) {
    const shown = loggableKey(key)

    super(shown === undefined ? "Key not found" : `Key not found: ${String(shown)}`, {
      code: "key_not_found",
      context: {
        ...(shown !== undefined && { key: shown }),
      },
    })
  }
}

/** Structural check; also matches copies of this error from another bundle. */
export function isKeyNotFoundError(
  e: unknown,
): e is AppError & { code: KeyNotFoundErrorCode } {
  return isAppError(e) && e.code === "key_not_found"
}
