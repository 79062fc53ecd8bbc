import { defineAdapter } from "../core/define-adapter"
import { scalars } from "../core/scalars"

export const stringOptional = defineAdapter(scalars.string)

export const {
  toOptional: stringToOptional,
  fromOptional: stringFromOptional,
  toOptionalSequence: stringToOptionalSequence,
  fromOptionalSequence: stringFromOptionalSequence,
  toOptionalMapping: stringToOptionalMapping,
  fromOptionalMapping: stringFromOptionalMapping,
} = stringOptional

// Code points share the int32 range.
export const runeOptional = defineAdapter(scalars.rune)

export const {
  toOptional: runeToOptional,
  fromOptional: runeFromOptional,
  toOptionalSequence: runeToOptionalSequence,
  fromOptionalSequence: runeFromOptionalSequence,
  toOptionalMapping: runeToOptionalMapping,
  fromOptionalMapping: runeFromOptionalMapping,
} = runeOptional
