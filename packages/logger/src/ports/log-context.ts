export type LogContext = {
  service: string
  module: string
  env: string

  /** Eviction policy of the cache emitting the entry. */
  policy: string
  /** Caller-chosen name distinguishing cache instances. */
  cacheName: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
