/** A span of time in milliseconds. */
export type Milliseconds = number

/** An instant, as milliseconds since the Unix epoch. */
export type UnixMs = number
