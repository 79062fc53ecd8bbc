import type { Logger } from "@optbox/logger"
import { z } from "zod/mini"
import type { BigIntKind, NumberKind } from "../ports/scalar"
import { InvalidOptionsError } from "./errors"
import { toValidationIssues } from "./issues"

const numberKinds = [
  "int",
  "int8",
  "int16",
  "int32",
  "uint",
  "uint8",
  "uint16",
  "uint32",
  "float32",
  "float64",
  "byte",
  "rune",
  "duration",
] as const satisfies readonly NumberKind[]

const bigintKinds = ["int64", "uint64"] as const satisfies readonly BigIntKind[]

export const dynamicLifterOptionsSchema = z.object({
  numberKind: z.optional(z.enum(numberKinds)),
  bigintKind: z.optional(z.enum(bigintKinds)),
})

export type DynamicLifterOptions = z.infer<typeof dynamicLifterOptionsSchema> & {
  /** Receives inference and rejection events. Defaults to a no-op logger. */
  logger?: Logger
}

export type ResolvedDynamicLifterOptions = {
  /** Kind inferred for a JS `number`. */
  numberKind: NumberKind

  /** Kind inferred for a JS `bigint`. */
  bigintKind: BigIntKind
}

export const DEFAULT_DYNAMIC_LIFTER_OPTIONS: Readonly<ResolvedDynamicLifterOptions> = {
  numberKind: "float64",
  bigintKind: "int64",
}

/**
 * Validates lifter options from an untyped source (a parsed config file,
 * a JS caller) and fills in defaults.
 *
 * @throws {InvalidOptionsError} when a field names an unsupported kind
 */
export function parseDynamicLifterOptions(input: unknown): ResolvedDynamicLifterOptions {
  const result = dynamicLifterOptionsSchema.safeParse(input ?? {})

  if (!result.success) {
    throw InvalidOptionsError.fromIssues(toValidationIssues(result.error.issues))
  }

  return {
    numberKind: result.data.numberKind ?? DEFAULT_DYNAMIC_LIFTER_OPTIONS.numberKind,
    bigintKind: result.data.bigintKind ?? DEFAULT_DYNAMIC_LIFTER_OPTIONS.bigintKind,
  }
}
