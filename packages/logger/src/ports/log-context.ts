export type LogContext = {
  service: string
  module: string
  env: string

  /** Key construction being performed ("after", "between", "spread", ...). */
  operation: string

  /** Encoded length in bytes, sentinel included. */
  keyLength: number
  threshold: number
  count: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
