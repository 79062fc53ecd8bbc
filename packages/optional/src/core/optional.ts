import type { Absent, MaybeOptional, Optional, Present } from "../ports/optional"

const ABSENT: Absent = Object.freeze({ kind: "absent" })

export function present<T>(value: T): Present<T> {
  return { kind: "present", value }
}

export function absent(): Absent {
  return ABSENT
}

export function isPresent<T>(optional: MaybeOptional<T>): optional is Present<T> {
  return optional?.kind === "present"
}

export function isAbsent<T>(optional: MaybeOptional<T>): optional is Absent | null | undefined {
  return !isPresent(optional)
}

/** Lifts a nullable value; `null` and `undefined` become absent. */
export function fromNullable<T>(value: T | null | undefined): Optional<T> {
  return value === null || value === undefined ? ABSENT : present(value)
}

export function valueOr<T>(optional: MaybeOptional<T>, fallback: T): T {
  return isPresent(optional) ? optional.value : fallback
}
