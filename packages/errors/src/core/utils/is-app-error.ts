import type { AppError } from "../../ports/error"

type FieldCheck = (value: unknown) => boolean

const isString: FieldCheck = (v) => typeof v === "string"
const isBoolean: FieldCheck = (v) => typeof v === "boolean"

const appErrorShape: Readonly<Record<keyof AppError & string, FieldCheck | undefined>> = {
  name: isString,
  message: isString,
  code: isString,
  context: (v) => typeof v === "object" && v !== null,
  isRetryable: isBoolean,
  isOperational: isBoolean,
  timestamp: (v) => v instanceof Date && !Number.isNaN(v.getTime()),
  // optional on every Error
  stack: undefined,
  cause: undefined,
}

/**
 * Structural check for {@link AppError}.
 *
 * Matches on shape rather than `instanceof`, so errors raised by a second
 * installed copy of this package are still recognised.
 *
 * @example
 * ```ts
 * const retry = isAppError(err) && err.isRetryable
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (typeof e !== "object" || e === null) return false

  return Object.entries(appErrorShape).every(
    ([field, check]) => check === undefined || check(Reflect.get(e, field)),
  )
}
