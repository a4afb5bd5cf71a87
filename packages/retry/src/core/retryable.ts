import { isAppError } from "@ebb/errors"
import type { RetryableError } from "../ports/retryable-error"

export function isRetryableError(value: unknown): value is RetryableError {
  return (
    typeof value === "object" &&
    value !== null &&
    "canRetry" in value &&
    typeof value.canRetry === "function"
  )
}

/**
 * Retryability by capability: an own `canRetry()`, else the `isRetryable`
 * flag of an application error. Anything else is not retried.
 */
export function canRetry(error: unknown): boolean {
  if (isRetryableError(error)) return error.canRetry()
  if (isAppError(error)) return error.isRetryable

  return false
}
