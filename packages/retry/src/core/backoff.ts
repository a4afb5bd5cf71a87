import {
  BackoffError,
  BackoffOptions,
  type BackoffSchedule,
  MAX_DURATION,
  type RandomSource,
  systemRandom,
} from "@ebb/backoff"
import { type Clock, type Milliseconds, SystemClock, type UnixMs } from "@ebb/clock"
import { createNullLogger, type Logger } from "@ebb/logger"
import type { AttemptContext } from "../ports/attempt-context"
import type { AsyncOperation, BlockingOperation, TryAsyncOptions } from "../ports/operation"
import { nextAttempt } from "./attempt-counter"
import { maybeRetryable, timedOut } from "./attempt-error"
import type { AttemptHost, AttemptOutcome, AttemptSink, NextRetry } from "./attempt-host"
import { AttemptResult } from "./attempt-result"
import { TryAsync } from "./try-async"

export type BackoffDeps = {
  /** @default new SystemClock() */
  clock?: Clock
  /** @default systemRandom */
  random?: RandomSource
  /** Receives debug entries for each scheduling decision. Silent by default. */
  logger?: Logger
}

/**
 * State of one retry sequence: attempt counter, deadline and last error.
 *
 * Not safe to share between sequences; share {@link BackoffOptions} instead.
 * The first attempt always runs, the deadline only gates retries.
 *
 * @example
 * ```ts
 * const backoff = Backoff.startTimeout<UploadError>(30_000)
 *
 * for (;;) {
 *   const decision = (await backoff.tryAsync(() => upload(file))).orRetry()
 *
 *   if (decision.kind === "success") return decision.value
 *   if (decision.kind === "failure") throw decision.error
 * }
 * ```
 */
export class Backoff<E = unknown> {
  private readonly schedule: BackoffSchedule
  private readonly clock: Clock
  private readonly random: RandomSource
  private readonly logger: Logger
  private readonly host: AttemptHost<E>
  private readonly sink: AttemptSink<E>

  private attempts = 0
  private lastError: { value: E } | null = null
  private running = false
  private unclassified = false

  private constructor(
    readonly options: BackoffOptions,
    readonly startedAt: UnixMs,
    readonly deadline: UnixMs | undefined,
    deps: Required<BackoffDeps>,
  ) {
    this.schedule = options.toSchedule()
    this.clock = deps.clock
    this.random = deps.random
    this.logger = deps.logger
    this.sink = this.createSink()
    this.host = this.createHost()
  }

  /** Retry until an attempt succeeds or fails fatally. */
  static startUnlimited<E = unknown>(
    options: BackoffOptions = BackoffOptions.DEFAULT,
    deps: BackoffDeps = {},
  ): Backoff<E> {
    return Backoff.start<E>(options, deps, () => undefined)
  }

  /**
   * Stop retrying once `timeout` ms have passed since now. A timeout too
   * large to represent as an instant means no deadline.
   */
  static startTimeout<E = unknown>(
    timeout: Milliseconds,
    options: BackoffOptions = BackoffOptions.DEFAULT,
    deps: BackoffDeps = {},
  ): Backoff<E> {
    assertTimeout(timeout)

    return Backoff.start<E>(options, deps, (now) => {
      const deadline = now + timeout
      return deadline <= MAX_DURATION ? deadline : undefined
    })
  }

  static startTimeoutOpt<E = unknown>(
    timeout: Milliseconds | undefined,
    options: BackoffOptions = BackoffOptions.DEFAULT,
    deps: BackoffDeps = {},
  ): Backoff<E> {
    return timeout === undefined
      ? Backoff.startUnlimited<E>(options, deps)
      : Backoff.startTimeout<E>(timeout, options, deps)
  }

  /**
   * Stop retrying at the instant `deadline`. An instant past
   * `MAX_DURATION`, `Infinity` included, means no deadline.
   */
  static startDeadline<E = unknown>(
    deadline: UnixMs,
    options: BackoffOptions = BackoffOptions.DEFAULT,
    deps: BackoffDeps = {},
  ): Backoff<E> {
    if (Number.isNaN(deadline)) {
      throw new BackoffError("deadline must be an instant in epoch milliseconds", {
        code: "invalid_option",
        context: { option: "deadline", value: deadline },
        isOperational: false,
      })
    }

    return Backoff.start<E>(options, deps, () => (deadline <= MAX_DURATION ? deadline : undefined))
  }

  static startDeadlineOpt<E = unknown>(
    deadline: UnixMs | undefined,
    options: BackoffOptions = BackoffOptions.DEFAULT,
    deps: BackoffDeps = {},
  ): Backoff<E> {
    return deadline === undefined
      ? Backoff.startUnlimited<E>(options, deps)
      : Backoff.startDeadline<E>(deadline, options, deps)
  }

  private static start<E>(
    options: BackoffOptions,
    deps: BackoffDeps,
    deadlineFrom: (now: UnixMs) => UnixMs | undefined,
  ): Backoff<E> {
    const clock = deps.clock ?? new SystemClock()
    const now = clock.nowMs()

    return new Backoff<E>(options, now, deadlineFrom(now), {
      clock,
      random: deps.random ?? systemRandom,
      logger: deps.logger ?? createNullLogger(),
    })
  }

  /** Retries scheduled since the last success. Saturates at 2^32 - 1. */
  get numAttempts(): number {
    return this.attempts
  }

  get hasLastError(): boolean {
    return this.lastError !== null
  }

  /**
   * When the next attempt is due.
   *
   * - `retryAt: null`: attempt now
   * - `retryAt`: wait until that instant, then attempt
   * - `ok: false`: the deadline leaves no room; carries `timed_out` with the
   *   stored last error, which is consumed
   *
   * With no stored error (first attempt, or after a success) the counter is
   * reset and the deadline is not consulted.
   */
  nextRetryAt(): NextRetry<E> {
    const now = this.clock.nowMs()
    const isFirst = this.lastError === null

    this.attempts = isFirst ? 0 : nextAttempt(this.attempts)

    const result = this.schedule.nthRetryAt(
      this.attempts,
      now,
      isFirst ? undefined : this.deadline,
      this.random,
    )

    if (result.ok) {
      if (result.retryAt !== null) {
        this.logger.debug("retry scheduled", {
          attempt: this.attempts,
          retryAt: result.retryAt,
          delayMs: result.retryAt - now,
        })
      }
      return result
    }

    this.logger.debug("deadline exceeded", {
      attempt: this.attempts,
      deadline: result.error.deadline,
    })

    const lastError = this.lastError

    if (lastError === null) {
      throw new BackoffError("Deadline exceeded with no stored error", {
        code: "missing_last_error",
        context: { attempt: this.attempts },
        isOperational: false,
      })
    }

    this.lastError = null
    return { ok: false, error: timedOut(lastError.value) }
  }

  /**
   * Wait for the next attempt by blocking the thread, then run `op` once.
   *
   * The deadline is only checked before `op` starts; a running `op` is never
   * interrupted.
   */
  tryBlocking<T>(op: BlockingOperation<T>): AttemptResult<T, E> {
    this.host.begin()

    try {
      const next = this.nextRetryAt()

      if (!next.ok) return this.host.settle<T>(next)
      if (next.retryAt !== null) this.clock.sleepUntilSync(next.retryAt)
    } catch (err) {
      this.host.abandon()
      throw err
    }

    let value: T

    try {
      value = op()
    } catch (error) {
      return this.host.settle<T>({ ok: false, error: maybeRetryable(error as E) })
    }

    return this.host.settle({ ok: true, value })
  }

  /**
   * Wait for the next attempt without blocking, then run `op` once.
   *
   * Nothing happens until the returned value is awaited. Pass a factory
   * rather than a promise to defer starting the operation until the
   * attempt is due.
   */
  tryAsync<T>(op: AsyncOperation<T>, options: TryAsyncOptions = {}): TryAsync<T, E> {
    return new TryAsync<T, E>(this.host, op, options)
  }

  private context(): AttemptContext {
    return {
      attempt: this.attempts,
      startedAt: this.startedAt,
      elapsedMs: this.clock.nowMs() - this.startedAt,
      deadline: this.deadline,
    }
  }

  private createSink(): AttemptSink<E> {
    return {
      context: () => this.context(),
      succeeded: () => {
        this.lastError = null
        this.unclassified = false
      },
      failedRetryable: (error) => {
        this.lastError = { value: error }
        this.unclassified = false
      },
      failedTerminal: () => {
        this.unclassified = false
      },
    }
  }

  private createHost(): AttemptHost<E> {
    return {
      clock: this.clock,
      deadline: this.deadline,
      begin: () => {
        if (this.running) {
          throw new BackoffError("Another attempt is still running on this backoff", {
            code: "concurrent_attempt",
            isOperational: false,
          })
        }
        if (this.unclassified) {
          throw new BackoffError(
            "Previous attempt result was never classified; call orRetry() or orRetryIf()",
            { code: "unclassified_attempt", isOperational: false },
          )
        }
        this.running = true
      },
      hasLastError: () => this.lastError !== null,
      nextRetryAt: () => this.nextRetryAt(),
      takeLastError: () => {
        const lastError = this.lastError
        this.lastError = null
        return lastError?.value
      },
      settle: <T>(outcome: AttemptOutcome<T, E>) => {
        this.running = false
        this.unclassified = true
        return new AttemptResult<T, E>(outcome, this.sink)
      },
      abandon: () => {
        this.running = false
      },
    }
  }
}

function assertTimeout(timeout: Milliseconds): void {
  if (!(timeout >= 0)) {
    throw new BackoffError("timeout must be a non-negative duration in milliseconds", {
      code: "invalid_option",
      context: { option: "timeout", value: timeout },
      isOperational: false,
    })
  }
}
