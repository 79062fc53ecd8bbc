import { type AppError, BaseError, isAppError } from "@optbox/errors"
import type { ValidationIssue } from "../ports/scalar"

export type TypeConstructionErrorCode = "type_construction"

/**
 * Raised by the dynamic lift when no box of the requested (or inferred)
 * kind can hold the value. Typed operations never raise it.
 */
export class TypeConstructionError extends BaseError<TypeConstructionErrorCode> {
  static uninferable(receivedType: string): TypeConstructionError {
    return new TypeConstructionError(
      `Cannot infer a scalar kind for a value of type ${receivedType}`,
      {
        code: "type_construction",
        context: { receivedType },
      },
    )
  }

  static unknownKind(kind: string, receivedType: string): TypeConstructionError {
    return new TypeConstructionError(`Unknown scalar kind "${kind}"`, {
      code: "type_construction",
      context: { kind, receivedType },
    })
  }

  static rejected(
    kind: string,
    receivedType: string,
    issues: ValidationIssue[],
  ): TypeConstructionError {
    const reason = issues[0]?.message ?? "value not admitted"

    return new TypeConstructionError(
      `Cannot box a value of type ${receivedType} as ${kind}: ${reason}`,
      {
        code: "type_construction",
        context: { kind, receivedType, issues },
      },
    )
  }
}

export type InvalidOptionsErrorCode = "invalid_options"

export class InvalidOptionsError extends BaseError<InvalidOptionsErrorCode> {
  static fromIssues(issues: ValidationIssue[]): InvalidOptionsError {
    const first = issues[0]
    const message = first
      ? `Invalid lifter options: ${first.path ? `${first.path}: ` : ""}${first.message}`
      : "Invalid lifter options"

    return new InvalidOptionsError(message, {
      code: "invalid_options",
      context: { issues },
    })
  }
}

export function isTypeConstructionError(
  err: unknown,
): err is AppError & { code: TypeConstructionErrorCode } {
  return isAppError(err) && err.code === "type_construction"
}
