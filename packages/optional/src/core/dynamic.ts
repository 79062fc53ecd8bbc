import { createNullLogger, type Logger } from "@optbox/logger"
import type { Present } from "../ports/optional"
import type { ScalarDescriptor, ScalarKind, ScalarOf } from "../ports/scalar"
import { isTypeConstructionError, TypeConstructionError } from "./errors"
import {
  type DynamicLifterOptions,
  parseDynamicLifterOptions,
  type ResolvedDynamicLifterOptions,
} from "./options"
import { isScalarKind, scalars } from "./scalars"

/** A present box tagged with the kind it was built for. */
export type OptionalBox<K extends ScalarKind = ScalarKind> = Present<ScalarOf<K>> & {
  readonly type: K
}

export interface DynamicLifter {
  /** Boxes `value` as the kind inferred from its runtime type. */
  (value: unknown): OptionalBox

  /** Boxes `value` as `kind`, which must admit it unchanged. */
  <K extends ScalarKind>(value: unknown, kind: K): OptionalBox<K>
}

/**
 * `typeof`, refined for the cases it lumps together: `null`, arrays and
 * class instances (reported by constructor name).
 */
export function describeRuntimeType(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (typeof value !== "object") return typeof value

  const proto: unknown = Object.getPrototypeOf(value)
  const ctor =
    typeof proto === "object" && proto !== null && "constructor" in proto
      ? proto.constructor
      : undefined

  return typeof ctor === "function" && ctor.name !== "" && ctor.name !== "Object"
    ? ctor.name
    : "object"
}

function isComplexShaped(value: object): boolean {
  return !Array.isArray(value) && "real" in value && "imag" in value
}

function inferKind(
  value: unknown,
  options: ResolvedDynamicLifterOptions,
): ScalarKind | undefined {
  switch (typeof value) {
    case "boolean":
      return "bool"
    case "string":
      return "string"
    case "number":
      return options.numberKind
    case "bigint":
      return options.bigintKind
    case "object":
      if (value instanceof Date) return "time"
      if (value !== null && isComplexShaped(value)) return "complex128"
      return undefined
    default:
      return undefined
  }
}

function box<K extends ScalarKind>(descriptor: ScalarDescriptor<K>, value: unknown): OptionalBox<K> {
  if (!descriptor.is(value)) {
    throw TypeConstructionError.rejected(
      descriptor.kind,
      describeRuntimeType(value),
      descriptor.check(value),
    )
  }

  return { kind: "present", type: descriptor.kind, value: descriptor.copy(value) }
}

/**
 * Builds a lifter for values whose scalar kind is only known at run time.
 *
 * The box always holds a copy of the input, never a converted value: a
 * number that does not fit the requested kind is rejected, not truncated.
 *
 * @throws {InvalidOptionsError} when `options` name an unsupported kind
 *
 * @example
 * ```ts
 * const lift = createDynamicLifter({ numberKind: "int", logger })
 *
 * lift(42)            // { kind: "present", type: "int", value: 42 }
 * lift(300, "uint8")  // throws TypeConstructionError
 * ```
 */
export function createDynamicLifter(options: DynamicLifterOptions = {}): DynamicLifter {
  const resolved = parseDynamicLifterOptions(options)
  const base: Logger = options.logger ?? createNullLogger()
  const log = base.child({
    module: "optional",
    operation: "dynamicToOptional",
  })

  function lift(value: unknown): OptionalBox
  function lift<K extends ScalarKind>(value: unknown, kind: K): OptionalBox<K>
  function lift(value: unknown, kind?: ScalarKind): OptionalBox {
    const receivedType = describeRuntimeType(value)
    let target: string | undefined = kind

    try {
      if (target === undefined) {
        target = inferKind(value, resolved)
        if (target === undefined) throw TypeConstructionError.uninferable(receivedType)

        log.debug("inferred scalar kind", { kind: target, receivedType })
      }

      if (!isScalarKind(target)) throw TypeConstructionError.unknownKind(target, receivedType)

      const descriptor: ScalarDescriptor<ScalarKind> = scalars[target]
      return box(descriptor, value)
    } catch (err) {
      if (isTypeConstructionError(err)) {
        log.warn("cannot construct optional box", { kind: target, receivedType, err })
      }
      throw err
    }
  }

  return lift
}

export const dynamicToOptional: DynamicLifter = createDynamicLifter()

export function isOptionalBoxOf<K extends ScalarKind>(
  optional: OptionalBox,
  kind: K,
): optional is OptionalBox<K> {
  return optional.type === kind
}
