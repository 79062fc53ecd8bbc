import { z } from "zod/mini"
import type {
  Complex,
  ScalarDescriptor,
  ScalarKind,
  ScalarOf,
  ValidationIssue,
} from "../ports/scalar"
import { toValidationIssues } from "./issues"

/** `0001-01-01T00:00:00.000Z`, the instant an unset time reads as. */
export const ZERO_INSTANT_MS = -62_135_596_800_000

const integer = (min: number, max: number) => z.int().check(z.gte(min), z.lte(max))

const float32 = z.custom<number>(
  (v) => typeof v === "number" && (Number.isNaN(v) || Math.fround(v) === v),
  { error: "Expected a number representable as float32" },
)

const float64 = z.custom<number>((v) => typeof v === "number", {
  error: "Expected a number",
})

/** Parts admit whatever their float width admits, NaN and infinities included. */
const complexOf = (part: z.ZodMiniType<number>) => z.strictObject({ real: part, imag: part })

function describeScalar<K extends ScalarKind>(
  kind: K,
  schema: z.ZodMiniType<ScalarOf<K>>,
  zero: () => ScalarOf<K>,
  copy: (value: ScalarOf<K>) => ScalarOf<K> = (value) => value,
): ScalarDescriptor<K> {
  return {
    kind,
    zero,
    copy,
    is: (value: unknown): value is ScalarOf<K> => schema.safeParse(value).success,
    check: (value: unknown): ValidationIssue[] => {
      const result = schema.safeParse(value)
      if (result.success) return []

      return toValidationIssues(result.error.issues)
    },
  }
}

const copyComplex = (value: Complex): Complex => ({ real: value.real, imag: value.imag })

export type ScalarDescriptors = { readonly [K in ScalarKind]: ScalarDescriptor<K> }

export const scalars: ScalarDescriptors = {
  bool: describeScalar("bool", z.boolean(), () => false),

  int: describeScalar("int", z.int(), () => 0),
  int8: describeScalar("int8", integer(-128, 127), () => 0),
  int16: describeScalar("int16", integer(-32_768, 32_767), () => 0),
  int32: describeScalar("int32", z.int32(), () => 0),
  int64: describeScalar("int64", z.int64(), () => 0n),

  uint: describeScalar("uint", integer(0, Number.MAX_SAFE_INTEGER), () => 0),
  uint8: describeScalar("uint8", integer(0, 255), () => 0),
  uint16: describeScalar("uint16", integer(0, 65_535), () => 0),
  uint32: describeScalar("uint32", z.uint32(), () => 0),
  uint64: describeScalar("uint64", z.uint64(), () => 0n),

  float32: describeScalar("float32", float32, () => 0),
  float64: describeScalar("float64", float64, () => 0),

  string: describeScalar("string", z.string(), () => ""),
  byte: describeScalar("byte", integer(0, 255), () => 0),
  rune: describeScalar("rune", z.int32(), () => 0),

  time: describeScalar(
    "time",
    z.date(),
    () => new Date(ZERO_INSTANT_MS),
    (value) => new Date(value.getTime()),
  ),
  duration: describeScalar("duration", z.number(), () => 0),

  complex64: describeScalar(
    "complex64",
    complexOf(float32),
    () => ({ real: 0, imag: 0 }),
    copyComplex,
  ),
  complex128: describeScalar(
    "complex128",
    complexOf(float64),
    () => ({ real: 0, imag: 0 }),
    copyComplex,
  ),
}

export const scalarKinds = Object.keys(scalars).filter(isScalarKind)

export function isScalarKind(value: unknown): value is ScalarKind {
  return typeof value === "string" && Object.hasOwn(scalars, value)
}

/** `true` for the instant an unset `time` lowers to. */
export function isZeroInstant(value: Date): boolean {
  return value.getTime() === ZERO_INSTANT_MS
}
