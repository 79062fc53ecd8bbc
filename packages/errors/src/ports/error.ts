export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error: the offending kind, the runtime type
 * that was received, validation issues.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for failures caused by the caller's input (a value the catalog
   * cannot box), `false` for broken invariants inside the library.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/** JSON-safe error shape. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
