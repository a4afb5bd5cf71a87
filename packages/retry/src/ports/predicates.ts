import type { AttemptContext } from "./attempt-context"

/**
 * Decides whether a failure is worth another attempt.
 */
export interface ErrorPredicate<E> {
  shouldRetry(error: E, ctx: AttemptContext): boolean
}

export type ErrorPredicateFn<E> = (error: E, ctx: AttemptContext) => boolean

export type RetryPredicate<E> = ErrorPredicate<E> | ErrorPredicateFn<E>
