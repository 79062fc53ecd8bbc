import { defineAdapter } from "../core/define-adapter"
import { scalars } from "../core/scalars"

export const intOptional = defineAdapter(scalars.int)

export const {
  toOptional: intToOptional,
  fromOptional: intFromOptional,
  toOptionalSequence: intToOptionalSequence,
  fromOptionalSequence: intFromOptionalSequence,
  toOptionalMapping: intToOptionalMapping,
  fromOptionalMapping: intFromOptionalMapping,
} = intOptional

export const int8Optional = defineAdapter(scalars.int8)

export const {
  toOptional: int8ToOptional,
  fromOptional: int8FromOptional,
  toOptionalSequence: int8ToOptionalSequence,
  fromOptionalSequence: int8FromOptionalSequence,
  toOptionalMapping: int8ToOptionalMapping,
  fromOptionalMapping: int8FromOptionalMapping,
} = int8Optional

export const int16Optional = defineAdapter(scalars.int16)

export const {
  toOptional: int16ToOptional,
  fromOptional: int16FromOptional,
  toOptionalSequence: int16ToOptionalSequence,
  fromOptionalSequence: int16FromOptionalSequence,
  toOptionalMapping: int16ToOptionalMapping,
  fromOptionalMapping: int16FromOptionalMapping,
} = int16Optional

export const int32Optional = defineAdapter(scalars.int32)

export const {
  toOptional: int32ToOptional,
  fromOptional: int32FromOptional,
  toOptionalSequence: int32ToOptionalSequence,
  fromOptionalSequence: int32FromOptionalSequence,
  toOptionalMapping: int32ToOptionalMapping,
  fromOptionalMapping: int32FromOptionalMapping,
} = int32Optional

export const int64Optional = defineAdapter(scalars.int64)

export const {
  toOptional: int64ToOptional,
  fromOptional: int64FromOptional,
  toOptionalSequence: int64ToOptionalSequence,
  fromOptionalSequence: int64FromOptionalSequence,
  toOptionalMapping: int64ToOptionalMapping,
  fromOptionalMapping: int64FromOptionalMapping,
} = int64Optional
