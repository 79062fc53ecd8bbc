export type Milliseconds = number

/** Elapsed time in milliseconds. May be fractional or negative. */
export type Duration = Milliseconds
