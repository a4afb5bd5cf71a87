import type { AttemptError } from "../ports/attempt-error"

export function maybeRetryable<E>(error: E): AttemptError<E> {
  return { kind: "maybe_retryable", error }
}

export function fatal<E>(error: E): AttemptError<E> {
  return { kind: "fatal", error }
}

export function timedOut<E>(lastError: E): AttemptError<E> {
  return { kind: "timed_out", lastError }
}

/** The wrapped error, whatever the tag. */
export function intoInner<E>(error: AttemptError<E>): E {
  switch (error.kind) {
    case "maybe_retryable":
    case "fatal":
      return error.error
    case "timed_out":
      return error.lastError
  }
}

/** Same tag, error transformed. */
export function mapAttemptError<E, F>(
  error: AttemptError<E>,
  map: (error: E) => F,
): AttemptError<F> {
  switch (error.kind) {
    case "maybe_retryable":
      return maybeRetryable(map(error.error))
    case "fatal":
      return fatal(map(error.error))
    case "timed_out":
      return timedOut(map(error.lastError))
  }
}

/**
 * Re-tag a `timed_out` error; any other tag passes through untouched.
 *
 * @example
 * ```ts
 * // keep retrying past the deadline
 * onTimeout(err, (lastError) => maybeRetryable(lastError))
 * ```
 */
export function onTimeout<E>(
  error: AttemptError<E>,
  transform: (lastError: E) => AttemptError<E>,
): AttemptError<E> {
  return error.kind === "timed_out" ? transform(error.lastError) : error
}
