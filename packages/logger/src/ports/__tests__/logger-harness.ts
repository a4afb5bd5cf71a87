import type { LogContextPatch } from "../log-context"
import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

/** One entry as the adapter wrote it. */
export type CapturedLog = {
  level: LogLevelName
  payload: Record<string, unknown>
}

export type LoggerHarnessOptions = {
  level?: LogLevelName
  /** Bindings the logger is constructed with, before any child() */
  context?: LogContextPatch
}

export type LoggerHarness = {
  name: string
  make: (opts?: LoggerHarnessOptions) => {
    logger: Logger
    read: () => CapturedLog[]
    clear: () => void
  }
}
