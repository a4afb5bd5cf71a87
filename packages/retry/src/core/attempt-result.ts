import { BackoffError } from "@ebb/backoff"
import type { AttemptError } from "../ports/attempt-error"
import type { ErrorPredicateFn, RetryPredicate } from "../ports/predicates"
import type { RetryDecision } from "../ports/retry-decision"
import type { AttemptOutcome, AttemptSink } from "./attempt-host"
import { intoInner, onTimeout } from "./attempt-error"
import { canRetry } from "./retryable"

/**
 * Outcome of one attempt, waiting to be classified.
 *
 * Every result MUST be classified with {@link AttemptResult.orRetry} or
 * {@link AttemptResult.orRetryIf} before the controller starts another
 * attempt; the controller throws `unclassified_attempt` otherwise.
 *
 * @example
 * ```ts
 * for (;;) {
 *   const decision = (await backoff.tryAsync(() => fetchReport(id))).orRetry()
 *
 *   if (decision.kind === "retry") continue
 *   if (decision.kind === "failure") throw decision.error
 *   return decision.value
 * }
 * ```
 */
export class AttemptResult<T, E> {
  private classified = false

  constructor(
    private outcome: AttemptOutcome<T, E>,
    private readonly sink: AttemptSink<E>,
  ) {}

  /**
   * Re-tag a `timed_out` outcome before classification, for example into
   * `maybe_retryable` to keep going past the deadline.
   */
  onTimeout(transform: (lastError: E) => AttemptError<E>): this {
    this.assertUnclassified()

    if (!this.outcome.ok) {
      this.outcome = { ok: false, error: onTimeout(this.outcome.error, transform) }
    }

    return this
  }

  /** Observe a failure without changing it. Not called on success. */
  inspect(observer: (error: AttemptError<E>) => void): this {
    this.assertUnclassified()

    if (!this.outcome.ok) observer(this.outcome.error)

    return this
  }

  /** Classify by the error's own capability (`canRetry()` or `isRetryable`). */
  orRetry(): RetryDecision<T, E> {
    return this.classify((error) => canRetry(error))
  }

  /**
   * Classify with a caller-supplied predicate. The predicate only sees
   * `maybe_retryable` errors: `fatal` and `timed_out` always fail.
   */
  orRetryIf(predicate: RetryPredicate<E>): RetryDecision<T, E> {
    const shouldRetry: ErrorPredicateFn<E> =
      typeof predicate === "function" ? predicate : predicate.shouldRetry.bind(predicate)

    return this.classify((error) => shouldRetry(error, this.sink.context()))
  }

  private classify(shouldRetry: (error: E) => boolean): RetryDecision<T, E> {
    this.assertUnclassified()

    const outcome = this.outcome

    if (outcome.ok) {
      this.classified = true
      this.sink.succeeded()
      return { kind: "success", value: outcome.value }
    }

    const failure = outcome.error
    // a throwing predicate leaves the result unclassified
    const retry = failure.kind === "maybe_retryable" && shouldRetry(failure.error)

    this.classified = true

    if (retry && failure.kind === "maybe_retryable") {
      this.sink.failedRetryable(failure.error)
      return { kind: "retry" }
    }

    this.sink.failedTerminal()
    return { kind: "failure", error: intoInner(failure) }
  }

  private assertUnclassified(): void {
    if (this.classified) {
      throw new BackoffError("Attempt result was already classified", {
        code: "already_classified",
        isOperational: false,
      })
    }
  }
}
