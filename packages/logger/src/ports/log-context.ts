export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the codec operation being logged, e.g. "fromStoreValue" */
  operation: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields added or overridden by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
