/**
 * What the caller's loop does after classifying an attempt.
 *
 * - `success`: stop with the value
 * - `retry`: go round again; the next attempt waits for its backoff
 * - `failure`: stop with the unwrapped error
 */
export type RetryDecision<T, E> =
  | Readonly<{ kind: "success"; value: T }>
  | Readonly<{ kind: "retry" }>
  | Readonly<{ kind: "failure"; error: E }>
