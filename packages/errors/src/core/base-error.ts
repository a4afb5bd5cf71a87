import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends string = string> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * Root of every error this workspace throws: a stable `code`, frozen
 * structured `context`, and the retry/operational flags that retry
 * classification and log serialization read.
 */
export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    const { code, context = {}, isRetryable = false, isOperational = true } = options

    this.name = new.target.name
    this.code = code
    this.context = Object.freeze({ ...context })
    this.isRetryable = isRetryable
    this.isOperational = isOperational
    this.timestamp = new Date()

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Turn anything an operation threw into a {@link SerializedError}.
 *
 * BaseError keeps its code, context and flags. A plain Error gets code
 * "unknown" and is retryable only when it carries its own `canRetry()`.
 * Any other thrown value lands under `context.value`.
 */
export function serializeError(
  err: unknown,
  options?: SerializeOptions,
): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isRetryable: false,
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const own =
    err instanceof BaseError
      ? {
          code: err.code,
          context: { ...err.context },
          isRetryable: err.isRetryable,
          isOperational: err.isOperational,
          timestamp: err.timestamp.toISOString(),
        }
      : {
          code: "unknown",
          context: {},
          isRetryable: ownCanRetry(err),
          isOperational: false,
          timestamp: new Date().toISOString(),
        }

  return {
    name: err.name,
    message: err.message,
    ...own,
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(options?.includeStack === true && err.stack !== undefined && { stack: err.stack }),
  }
}

function ownCanRetry(err: Error): boolean {
  return "canRetry" in err && typeof err.canRetry === "function" && err.canRetry() === true
}
