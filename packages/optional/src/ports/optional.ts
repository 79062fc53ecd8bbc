export type Present<T> = {
  readonly kind: "present"
  readonly value: T
}

export type Absent = {
  readonly kind: "absent"
}

/**
 * A value of type `T` that may be missing.
 *
 * @example
 * ```ts
 * const port: Optional<number> = present(8080)
 * const host: Optional<string> = absent()
 * ```
 */
export type Optional<T> = Present<T> | Absent

/**
 * What lowering operations accept: `null` and `undefined` read as absent,
 * the way a nil reference would.
 */
export type MaybeOptional<T> = Optional<T> | null | undefined
