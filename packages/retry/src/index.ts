export {
  type LogAttemptErrorOptions,
  logAttemptError,
} from "./adapters/log-attempt-error"
export {
  fatal,
  intoInner,
  mapAttemptError,
  maybeRetryable,
  onTimeout,
  timedOut,
} from "./core/attempt-error"
export type { AttemptOutcome, NextRetry } from "./core/attempt-host"
export { AttemptResult } from "./core/attempt-result"
export { Backoff, type BackoffDeps } from "./core/backoff"
export { canRetry, isRetryableError } from "./core/retryable"
export { type MakeTimeoutError, TryAsync } from "./core/try-async"
export type { AttemptContext } from "./ports/attempt-context"
export type { AttemptError, AttemptErrorKind } from "./ports/attempt-error"
export type { AsyncOperation, BlockingOperation, TryAsyncOptions } from "./ports/operation"
export type { ErrorPredicate, ErrorPredicateFn, RetryPredicate } from "./ports/predicates"
export type { RetryDecision } from "./ports/retry-decision"
export type { RetryableError } from "./ports/retryable-error"
