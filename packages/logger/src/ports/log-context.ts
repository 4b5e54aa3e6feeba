/**
 * Fields the settings packages attach to log entries.
 *
 * `file` and `scope` identify a `.env` file, `line` a position in it, and
 * `key` the variable assigned there. Values are never logged.
 */
export type LogContext = {
  module: string
  file: string
  scope: string
  line: number
  key: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Fields a child logger adds to, or overrides in, its parent's context. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
