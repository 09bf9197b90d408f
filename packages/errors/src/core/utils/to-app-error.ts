import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"

/**
 * Convert any caught value to an {@link AppError}.
 *
 * - `BaseError` passes through unchanged
 * - `Error` instances are wrapped as non-operational with the original as cause
 * - Non-Error values are wrapped as non-operational with the value in context
 *
 * @param fallbackCode - Code for values that are not already a `BaseError`. Default: "unknown"
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (err instanceof BaseError) {
    return err
  }

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      isOperational: false,
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}
