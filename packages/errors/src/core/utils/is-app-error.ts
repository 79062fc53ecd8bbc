import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Structural guard for {@link AppError}, so errors raised by another copy of
 * this package (or a look-alike) are recognized too.
 *
 * @example
 * ```ts
 * try {
 *   dynamicToOptional(input)
 * } catch (err) {
 *   if (isAppError(err) && err.code === "type_construction") {
 *     return fallback
 *   }
 *   throw err
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
