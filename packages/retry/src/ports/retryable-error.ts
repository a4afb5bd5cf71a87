/**
 * Capability of an error type to say whether another attempt might succeed.
 *
 * `AttemptResult.orRetry()` consults it. Errors from `@ebb/errors` need not
 * implement it: their `isRetryable` flag is read instead.
 */
export interface RetryableError {
  canRetry(): boolean
}
