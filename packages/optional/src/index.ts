export * from "./adapters/boolean"
export * from "./adapters/complex"
export * from "./adapters/float"
export * from "./adapters/signed"
export * from "./adapters/text"
export * from "./adapters/time"
export * from "./adapters/unsigned"
export {
  fromOptional,
  fromOptionalMapping,
  fromOptionalSequence,
  toOptional,
  toOptionalMapping,
  toOptionalSequence,
} from "./core/convert"
export { defineAdapter, type OptionalAdapter } from "./core/define-adapter"
export {
  createDynamicLifter,
  type DynamicLifter,
  describeRuntimeType,
  dynamicToOptional,
  isOptionalBoxOf,
  type OptionalBox,
} from "./core/dynamic"
export {
  InvalidOptionsError,
  type InvalidOptionsErrorCode,
  isTypeConstructionError,
  TypeConstructionError,
  type TypeConstructionErrorCode,
} from "./core/errors"
export { absent, fromNullable, isAbsent, isPresent, present, valueOr } from "./core/optional"
export {
  DEFAULT_DYNAMIC_LIFTER_OPTIONS,
  type DynamicLifterOptions,
  parseDynamicLifterOptions,
  type ResolvedDynamicLifterOptions,
} from "./core/options"
export {
  isScalarKind,
  isZeroInstant,
  type ScalarDescriptors,
  scalarKinds,
  scalars,
  ZERO_INSTANT_MS,
} from "./core/scalars"
export type { Absent, MaybeOptional, Optional, Present } from "./ports/optional"
export type * from "./ports/scalar"
export type * from "./ports/time"
