import type { Duration } from "./time"

export type Complex = {
  readonly real: number
  readonly imag: number
}

/**
 * Scalar kinds and their TypeScript representation.
 *
 * @remarks
 * Kinds narrower than a JS `number` share its representation; the width only
 * matters when a value is boxed dynamically and checked against the kind.
 * 64-bit integers are `bigint`. `int` and `uint` are bounded by the safe
 * integer range.
 */
export type ScalarTypeMap = {
  bool: boolean
  int: number
  int8: number
  int16: number
  int32: number
  int64: bigint
  uint: number
  uint8: number
  uint16: number
  uint32: number
  uint64: bigint
  float32: number
  float64: number
  string: string
  byte: number
  rune: number
  time: Date
  duration: Duration
  complex64: Complex
  complex128: Complex
}

export type ScalarKind = keyof ScalarTypeMap

export type ScalarOf<K extends ScalarKind> = ScalarTypeMap[K]

/** Kinds represented by a JS `number`. */
export type NumberKind = {
  [K in ScalarKind]: ScalarTypeMap[K] extends number ? K : never
}[ScalarKind]

/** Kinds represented by a JS `bigint`. */
export type BigIntKind = {
  [K in ScalarKind]: ScalarTypeMap[K] extends bigint ? K : never
}[ScalarKind]

export type ScalarCodec<T> = {
  /** A fresh zero value. */
  zero(): T

  /** A copy that shares no mutable state with `value`. */
  copy(value: T): T
}

export type ValidationIssue = {
  path: string
  message: string
}

export type ScalarDescriptor<K extends ScalarKind> = ScalarCodec<ScalarOf<K>> & {
  readonly kind: K

  /** `true` when the kind admits `value` unchanged. */
  is(value: unknown): value is ScalarOf<K>

  /** Reasons `value` is not admitted; empty when it is. */
  check(value: unknown): ValidationIssue[]
}
