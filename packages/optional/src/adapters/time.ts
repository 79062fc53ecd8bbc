import { defineAdapter } from "../core/define-adapter"
import { scalars } from "../core/scalars"

/** Absent lowers to a fresh `Date` at `0001-01-01T00:00:00.000Z`. */
export const timeOptional = defineAdapter(scalars.time)

export const {
  toOptional: timeToOptional,
  fromOptional: timeFromOptional,
  toOptionalSequence: timeToOptionalSequence,
  fromOptionalSequence: timeFromOptionalSequence,
  toOptionalMapping: timeToOptionalMapping,
  fromOptionalMapping: timeFromOptionalMapping,
} = timeOptional

export const durationOptional = defineAdapter(scalars.duration)

export const {
  toOptional: durationToOptional,
  fromOptional: durationFromOptional,
  toOptionalSequence: durationToOptionalSequence,
  fromOptionalSequence: durationFromOptionalSequence,
  toOptionalMapping: durationToOptionalMapping,
  fromOptionalMapping: durationFromOptionalMapping,
} = durationOptional
