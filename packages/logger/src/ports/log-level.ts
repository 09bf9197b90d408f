export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels (higher = more severe).
 *
 * Values match pino's defaults so adapters can compare them directly.
 */
export const LogLevels = {
  /** Per-operation detail: individual evictions, promotions. */
  Trace: 10,
  /** Diagnostic detail useful while tuning a cache. */
  Debug: 20,
  /** Normal lifecycle messages. */
  Info: 30,
  /** Unexpected but recoverable situations. */
  Warn: 40,
  /** Failure of the current operation. */
  Error: 50,
  /** The process may be unable to continue. */
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]
