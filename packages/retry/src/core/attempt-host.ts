import type { Clock, UnixMs } from "@ebb/clock"
import type { AttemptContext } from "../ports/attempt-context"
import type { AttemptError } from "../ports/attempt-error"
import type { AttemptResult } from "./attempt-result"

/** How a classified attempt reports back to its controller. */
export interface AttemptSink<E> {
  context(): AttemptContext
  succeeded(): void
  failedRetryable(error: E): void
  failedTerminal(): void
}

export type NextRetry<E> =
  | Readonly<{ ok: true; retryAt: UnixMs | null }>
  | Readonly<{ ok: false; error: AttemptError<E> }>

export type AttemptOutcome<T, E> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: AttemptError<E> }>

/** Controller internals an execution adapter drives one attempt through. */
export interface AttemptHost<E> {
  readonly clock: Clock
  readonly deadline: UnixMs | undefined

  /** Claim the controller for one attempt. */
  begin(): void

  /** True while a retryable failure is stored, i.e. the coming attempt is a retry. */
  hasLastError(): boolean

  nextRetryAt(): NextRetry<E>

  /** Move the stored error out. */
  takeLastError(): E | undefined

  /** Release the claim and hand out a result that must be classified. */
  settle<T>(outcome: AttemptOutcome<T, E>): AttemptResult<T, E>

  /** Release the claim without a result. */
  abandon(): void
}
