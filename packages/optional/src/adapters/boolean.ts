import { defineAdapter } from "../core/define-adapter"
import { scalars } from "../core/scalars"

export const boolOptional = defineAdapter(scalars.bool)

export const {
  toOptional: boolToOptional,
  fromOptional: boolFromOptional,
  toOptionalSequence: boolToOptionalSequence,
  fromOptionalSequence: boolFromOptionalSequence,
  toOptionalMapping: boolToOptionalMapping,
  fromOptionalMapping: boolFromOptionalMapping,
} = boolOptional
