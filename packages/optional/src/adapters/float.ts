import { defineAdapter } from "../core/define-adapter"
import { scalars } from "../core/scalars"

export const float32Optional = defineAdapter(scalars.float32)

export const {
  toOptional: float32ToOptional,
  fromOptional: float32FromOptional,
  toOptionalSequence: float32ToOptionalSequence,
  fromOptionalSequence: float32FromOptionalSequence,
  toOptionalMapping: float32ToOptionalMapping,
  fromOptionalMapping: float32FromOptionalMapping,
} = float32Optional

export const float64Optional = defineAdapter(scalars.float64)

export const {
  toOptional: float64ToOptional,
  fromOptional: float64FromOptional,
  toOptionalSequence: float64ToOptionalSequence,
  fromOptionalSequence: float64FromOptionalSequence,
  toOptionalMapping: float64ToOptionalMapping,
  fromOptionalMapping: float64FromOptionalMapping,
} = float64Optional
