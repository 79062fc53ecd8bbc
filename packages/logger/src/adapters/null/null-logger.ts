import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

/**
 * Discards every entry. The context bound through `child()` is still kept
 * on `context`, so a caller can see what a real adapter would have logged
 * with.
 */
export class NullLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  readonly context: Readonly<LogContextPatch>

  constructor(context: LogContextPatch = {}) {
    this.context = Object.freeze({ ...context })
  }

  trace(_message: string, _meta?: LogMeta<TContext>): void {}

  debug(_message: string, _meta?: LogMeta<TContext>): void {}

  info(_message: string, _meta?: LogMeta<TContext>): void {}

  warn(_message: string, _meta?: LogMeta<TContext>): void {}

  error(_message: string, _meta?: LogMeta<TContext>): void {}

  fatal(_message: string, _meta?: LogMeta<TContext>): void {}

  child<U extends LogContextPatch>(context: U): NullLogger<TContext & U> {
    return new NullLogger<TContext & U>({ ...this.context, ...context })
  }
}

export function createNullLogger<TContext extends LogContext = LogContext>(
  context: LogContextPatch = {},
): NullLogger<TContext> {
  return new NullLogger<TContext>(context)
}
