import { defineAdapter } from "../core/define-adapter"
import { scalars } from "../core/scalars"
import type { Complex } from "../ports/scalar"

export function complex(real: number, imag = 0): Complex {
  return { real, imag }
}

export const complex64Optional = defineAdapter(scalars.complex64)

export const {
  toOptional: complex64ToOptional,
  fromOptional: complex64FromOptional,
  toOptionalSequence: complex64ToOptionalSequence,
  fromOptionalSequence: complex64FromOptionalSequence,
  toOptionalMapping: complex64ToOptionalMapping,
  fromOptionalMapping: complex64FromOptionalMapping,
} = complex64Optional

export const complex128Optional = defineAdapter(scalars.complex128)

export const {
  toOptional: complex128ToOptional,
  fromOptional: complex128FromOptional,
  toOptionalSequence: complex128ToOptionalSequence,
  fromOptionalSequence: complex128FromOptionalSequence,
  toOptionalMapping: complex128ToOptionalMapping,
  fromOptionalMapping: complex128FromOptionalMapping,
} = complex128Optional
