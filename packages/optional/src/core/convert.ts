import type { MaybeOptional, Present } from "../ports/optional"
import type { ScalarCodec } from "../ports/scalar"
import { isPresent, present } from "./optional"

/**
 * Generic lift/lower operations. Each takes the codec of the element type,
 * which supplies the zero value used for absent entries and the copy rule
 * that keeps boxes and results from aliasing the caller's values.
 *
 * Inputs are never mutated; every call returns a new container.
 */

export function toOptional<T>(codec: ScalarCodec<T>, value: T): Present<T> {
  return present(codec.copy(value))
}

export function fromOptional<T>(codec: ScalarCodec<T>, optional: MaybeOptional<T>): T {
  return isPresent(optional) ? codec.copy(optional.value) : codec.zero()
}

/**
 * Holes in a sparse input stay holes: nothing is copied for them, and
 * lowering the result reads them as absent.
 */
export function toOptionalSequence<T>(
  codec: ScalarCodec<T>,
  values: readonly T[],
): Present<T>[] {
  return values.map((value) => toOptional(codec, value))
}

/**
 * Holes in a sparse input are read as absent, so the result is always dense.
 */
export function fromOptionalSequence<T>(
  codec: ScalarCodec<T>,
  optionals: readonly MaybeOptional<T>[],
): T[] {
  return Array.from(optionals, (optional) => fromOptional(codec, optional))
}

/**
 * Own enumerable string keys are carried over, `"__proto__"` included
 * (as an ordinary own key).
 */
export function toOptionalMapping<T>(
  codec: ScalarCodec<T>,
  values: Readonly<Record<string, T>>,
): Record<string, Present<T>> {
  return Object.fromEntries(
    Object.entries(values).map(([key, value]): [string, Present<T>] => [
      key,
      toOptional(codec, value),
    ]),
  )
}

/** Absent entries keep their key and take the zero value. */
export function fromOptionalMapping<T>(
  codec: ScalarCodec<T>,
  optionals: Readonly<Record<string, MaybeOptional<T>>>,
): Record<string, T> {
  return Object.fromEntries(
    Object.entries(optionals).map(([key, optional]): [string, T] => [
      key,
      fromOptional(codec, optional),
    ]),
  )
}
