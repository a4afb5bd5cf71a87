import { BaseError } from "@ebb/errors"

export type BackoffErrorCode =
  | "invalid_option"
  | "invalid_config"
  | "unclassified_attempt"
  | "already_classified"
  | "concurrent_attempt"
  | "missing_last_error"

/**
 * Raised for misuse of the backoff API or unusable configuration.
 *
 * Failures of the operation being retried are never wrapped in this type.
 */
export class BackoffError extends BaseError<BackoffErrorCode> {}
