/**
 * Failure of one attempt, tagged by what may happen next.
 *
 * - `maybe_retryable`: fresh failure, retryability decided at classification
 * - `fatal`: never retried
 * - `timed_out`: the deadline left no room for another attempt; carries the
 *   last real failure, or one synthesized by the caller
 */
export type AttemptError<E> =
  | Readonly<{ kind: "maybe_retryable"; error: E }>
  | Readonly<{ kind: "fatal"; error: E }>
  | Readonly<{ kind: "timed_out"; lastError: E }>

export type AttemptErrorKind = AttemptError<unknown>["kind"]
