import { serializeError } from "@ebb/errors"
import type { Logger } from "@ebb/logger"
import { intoInner } from "../core/attempt-error"
import type { AttemptError } from "../ports/attempt-error"

export type LogAttemptErrorOptions = {
  /** @default "attempt failed" */
  message?: string
  /** @default "warn" */
  level?: "debug" | "info" | "warn" | "error"
  /** @default false */
  includeStack?: boolean
}

/**
 * Observer for {@link AttemptResult.inspect} that logs each failure with its
 * tag and the serialized error.
 *
 * @example
 * ```ts
 * const decision = (await backoff.tryAsync(() => sync(batch)))
 *   .inspect(logAttemptError(logger.child({ operation: "sync-batch" })))
 *   .orRetry()
 * ```
 */
export function logAttemptError<E>(
  logger: Logger,
  opts: LogAttemptErrorOptions = {},
): (error: AttemptError<E>) => void {
  const message = opts.message ?? "attempt failed"
  const level = opts.level ?? "warn"
  const includeStack = opts.includeStack ?? false

  return (error) => {
    logger[level](message, {
      kind: error.kind,
      err: serializeError(intoInner(error), { includeStack }),
    })
  }
}
