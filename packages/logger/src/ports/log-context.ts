import type { Milliseconds, UnixMs } from "@ebb/clock"

/**
 * Fields that scope log entries to one retry sequence.
 */
export type LogContext = {
  /** Caller-chosen name of the operation being retried */
  operation: string

  /** Identifier of one retry sequence, when the caller runs several */
  sequence: string

  attempt: number
  delayMs: Milliseconds
  retryAt: UnixMs
  deadline: UnixMs

  service: string
  module: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
