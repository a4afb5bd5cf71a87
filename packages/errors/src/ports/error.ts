export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (attempt numbers, deadlines, option
 * names) so callers never have to parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * `true` if another attempt might succeed.
   *
   * @remarks
   * Retry classification reads this flag when an error type does not implement
   * its own `canRetry()`.
   */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`) versus misuse or a broken invariant (`false`).
   *
   * @remarks
   * - Operational: invalid configuration values, an upstream that timed out.
   * - Non-operational: a result that was never classified, two attempts running
   *   on one controller at once.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logs.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
