import type { Milliseconds, UnixMs } from "@ebb/clock"

/** Snapshot of a retry sequence handed to predicates. */
export type AttemptContext = Readonly<{
  /** Retries scheduled so far in this sequence; 0 for the first attempt */
  attempt: number

  /** Epoch ms when the sequence started */
  startedAt: UnixMs

  /** ms since the sequence started */
  elapsedMs: Milliseconds

  /** Absolute cutoff, `undefined` when unlimited */
  deadline: UnixMs | undefined
}>
