
export type LogContext = {
  service: string
  module: string
  env: string

  /** Public operation being executed, e.g. `dynamicToOptional` */
  operation: string

  /** Scalar kind involved, e.g. `int8` */
  kind: string

  /** `typeof`-style name of the received runtime value */
  receivedType: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Fields layered onto an existing context by `child()`. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

