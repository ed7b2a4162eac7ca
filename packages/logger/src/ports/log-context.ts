export type LogContext = {
  /** Utility being run and waited on, if any */
  command: string

  /** Notification service a record is about, e.g. "slack" */
  service: string

  module: string

  /** Config file the run resolved, empty when none was found */
  configFile: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields merged into a child logger's context.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
