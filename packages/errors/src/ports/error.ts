/**
 * Machine-readable error code. Codes are snake_case by convention,
 * e.g. `"key_not_found"`.
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (offending key, requested
 * capacity, ...). Kept JSON-friendly so it survives serialization.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected runtime outcome (true) or a programmer
   * error / invariant violation (false).
   *
   * @remarks
   * - Operational (`true`): a cache miss, invalid configuration values.
   * - Non-operational (`false`): a negative capacity passed in code,
   *   corrupted internal state.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logs and diagnostics.
 *
 * Always safe to pass to `JSON.stringify`.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
