import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every adapter.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local work. Structured JSON otherwise.
   *
   * @remarks
   * Ignored when the adapter is given an explicit destination.
   */
  prettify?: boolean
}
