import { defineAdapter } from "../core/define-adapter"
import { scalars } from "../core/scalars"

export const uintOptional = defineAdapter(scalars.uint)

export const {
  toOptional: uintToOptional,
  fromOptional: uintFromOptional,
  toOptionalSequence: uintToOptionalSequence,
  fromOptionalSequence: uintFromOptionalSequence,
  toOptionalMapping: uintToOptionalMapping,
  fromOptionalMapping: uintFromOptionalMapping,
} = uintOptional

export const uint8Optional = defineAdapter(scalars.uint8)

export const {
  toOptional: uint8ToOptional,
  fromOptional: uint8FromOptional,
  toOptionalSequence: uint8ToOptionalSequence,
  fromOptionalSequence: uint8FromOptionalSequence,
  toOptionalMapping: uint8ToOptionalMapping,
  fromOptionalMapping: uint8FromOptionalMapping,
} = uint8Optional

export const uint16Optional = defineAdapter(scalars.uint16)

export const {
  toOptional: uint16ToOptional,
  fromOptional: uint16FromOptional,
  toOptionalSequence: uint16ToOptionalSequence,
  fromOptionalSequence: uint16FromOptionalSequence,
  toOptionalMapping: uint16ToOptionalMapping,
  fromOptionalMapping: uint16FromOptionalMapping,
} = uint16Optional

export const uint32Optional = defineAdapter(scalars.uint32)

export const {
  toOptional: uint32ToOptional,
  fromOptional: uint32FromOptional,
  toOptionalSequence: uint32ToOptionalSequence,
  fromOptionalSequence: uint32FromOptionalSequence,
  toOptionalMapping: uint32ToOptionalMapping,
  fromOptionalMapping: uint32FromOptionalMapping,
} = uint32Optional

export const uint64Optional = defineAdapter(scalars.uint64)

export const {
  toOptional: uint64ToOptional,
  fromOptional: uint64FromOptional,
  toOptionalSequence: uint64ToOptionalSequence,
  fromOptionalSequence: uint64FromOptionalSequence,
  toOptionalMapping: uint64ToOptionalMapping,
  fromOptionalMapping: uint64FromOptionalMapping,
} = uint64Optional

// Same range as uint8, kept as its own kind so dynamic boxes say "byte".
export const byteOptional = defineAdapter(scalars.byte)

export const {
  toOptional: byteToOptional,
  fromOptional: byteFromOptional,
  toOptionalSequence: byteToOptionalSequence,
  fromOptionalSequence: byteFromOptionalSequence,
  toOptionalMapping: byteToOptionalMapping,
  fromOptionalMapping: byteFromOptionalMapping,
} = byteOptional
