import type { LogLevelName } from "./log-level"

/**
 * Logging policy shared by every adapter.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Retry bookkeeping logs at "debug", so "info" keeps it quiet.
   */
  level: LogLevelName

  /**
   * Pretty-print for humans instead of emitting JSON lines.
   *
   * @remarks
   * Meant for local development; keep structured output in production.
   */
  prettify?: boolean
}
