/**
 * Structured fields bound to every entry a cache component emits.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Primary table the cache reads and writes. */
  table: string
  /** Blob bucket used for overflow payloads, when configured. */
  bucket: string
  /** Cache operation in flight (e.g. "set", "multiGet"). */
  operation: string
  key: string
}

export type LogEvent = {
  err: unknown
}

export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>
