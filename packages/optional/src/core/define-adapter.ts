import type { MaybeOptional, Present } from "../ports/optional"
import type { ScalarDescriptor, ScalarKind, ScalarOf } from "../ports/scalar"
import {
  fromOptional,
  fromOptionalMapping,
  fromOptionalSequence,
  toOptional,
  toOptionalMapping,
  toOptionalSequence,
} from "./convert"

/**
 * The six lift/lower operations bound to one scalar kind.
 *
 * Methods do not use `this`, so they can be destructured and exported on
 * their own.
 */
export interface OptionalAdapter<K extends ScalarKind> {
  readonly kind: K

  zero(): ScalarOf<K>

  toOptional(value: ScalarOf<K>): Present<ScalarOf<K>>

  /** The contained value, or the kind's zero value when absent. */
  fromOptional(optional: MaybeOptional<ScalarOf<K>>): ScalarOf<K>

  toOptionalSequence(values: readonly ScalarOf<K>[]): Present<ScalarOf<K>>[]

  fromOptionalSequence(optionals: readonly MaybeOptional<ScalarOf<K>>[]): ScalarOf<K>[]

  toOptionalMapping(
    values: Readonly<Record<string, ScalarOf<K>>>,
  ): Record<string, Present<ScalarOf<K>>>

  fromOptionalMapping(
    optionals: Readonly<Record<string, MaybeOptional<ScalarOf<K>>>>,
  ): Record<string, ScalarOf<K>>
}

export function defineAdapter<K extends ScalarKind>(
  descriptor: ScalarDescriptor<K>,
): OptionalAdapter<K> {
  return Object.freeze({
    kind: descriptor.kind,
    zero: () => descriptor.zero(),
    toOptional: (value: ScalarOf<K>) => toOptional(descriptor, value),
    fromOptional: (optional: MaybeOptional<ScalarOf<K>>) => fromOptional(descriptor, optional),
    toOptionalSequence: (values: readonly ScalarOf<K>[]) => toOptionalSequence(descriptor, values),
    fromOptionalSequence: (optionals: readonly MaybeOptional<ScalarOf<K>>[]) =>
      fromOptionalSequence(descriptor, optionals),
    toOptionalMapping: (values: Readonly<Record<string, ScalarOf<K>>>) =>
      toOptionalMapping(descriptor, values),
    fromOptionalMapping: (optionals: Readonly<Record<string, MaybeOptional<ScalarOf<K>>>>) =>
      fromOptionalMapping(descriptor, optionals),
  })
}
