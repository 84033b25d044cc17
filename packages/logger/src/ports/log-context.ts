export type LogContext = {
  /** Dotted logger name, e.g. `billing.db` */
  logger: string
  service: string

  requestId: string
  traceId: string
  module: string
  env: string
}

export type LogEvent = {
  /** A caught fault; rendered with its type name and stack trace. */
  err: unknown
}

/**
 * Per-call fields. Anything beyond the known context keys is carried as an
 * extra field on the record.
 */
export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
