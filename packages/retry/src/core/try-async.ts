import type { UnixMs } from "@ebb/clock"
import type { AsyncOperation, TryAsyncOptions } from "../ports/operation"
import { maybeRetryable, timedOut } from "./attempt-error"
import type { AttemptHost, AttemptOutcome } from "./attempt-host"
import type { AttemptResult } from "./attempt-result"

/**
 * Builds the error reported when an enforced deadline cuts an attempt short.
 * Receives the error stored by the previous attempt, if any.
 */
export type MakeTimeoutError<E> = (lastError: E | undefined) => E

type TryAsyncConfig<E> = TryAsyncOptions & {
  makeError?: MakeTimeoutError<E>
}

type Enforcement<E> = {
  deadline: UnixMs
  makeError: MakeTimeoutError<E>
}

type Contender<T, E> =
  | { kind: "settled"; outcome: AttemptOutcome<T, E> }
  | { kind: "deadline"; enforcement: Enforcement<E> }

/**
 * One pending asynchronous attempt.
 *
 * Lazy: nothing runs until it is awaited, and awaiting it again yields the
 * same result.
 */
export class TryAsync<T, E> implements PromiseLike<AttemptResult<T, E>> {
  private run: Promise<AttemptResult<T, E>> | undefined

  constructor(
    private readonly host: AttemptHost<E>,
    private readonly op: AsyncOperation<T>,
    private readonly config: TryAsyncConfig<E> = {},
  ) {
    // A started promise may reject during the wait or never be attempted;
    // invoke() still reads its outcome from the original.
    if (typeof op !== "function") void Promise.resolve(op).then(undefined, ignoreRejection)
  }

  /**
   * Race the operation against the sequence deadline.
   *
   * If the deadline passes first the operation is abandoned (its signal is
   * aborted) and the attempt reports `timed_out` with `makeError(lastError)`.
   * A retry that comes due after the deadline is not started at all. The
   * first attempt always starts, even past the deadline, and still races it.
   * Without a deadline this changes nothing.
   */
  enforceDeadlineWith(makeError: MakeTimeoutError<E>): TryAsync<T, E> {
    return new TryAsync<T, E>(this.host, this.op, { ...this.config, makeError })
  }

  then<R1 = AttemptResult<T, E>, R2 = never>(
    onfulfilled?: ((value: AttemptResult<T, E>) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null,
  ): Promise<R1 | R2> {
    this.run ??= this.execute()

    return this.run.then(onfulfilled, onrejected)
  }

  private async execute(): Promise<AttemptResult<T, E>> {
    const { signal } = this.config
    const host = this.host

    signal?.throwIfAborted()
    host.begin()

    try {
      const isRetry = host.hasLastError()
      const next = host.nextRetryAt()

      if (!next.ok) return host.settle<T>(next)

      if (next.retryAt !== null) {
        await host.clock.sleepUntil(next.retryAt, signal)
        signal?.throwIfAborted()
      }

      const enforcement = this.enforcement()

      if (isRetry && enforcement && host.clock.nowMs() > enforcement.deadline) {
        return host.settle<T>(this.cutShort(enforcement))
      }

      return host.settle(await this.attempt(enforcement))
    } catch (err) {
      host.abandon()
      throw err
    }
  }

  private enforcement(): Enforcement<E> | undefined {
    const { makeError } = this.config
    const { deadline } = this.host

    return makeError && deadline !== undefined ? { deadline, makeError } : undefined
  }

  private async attempt(enforcement: Enforcement<E> | undefined): Promise<AttemptOutcome<T, E>> {
    const { signal } = this.config
    const attempt = new AbortController()
    const forwardAbort = () => attempt.abort(signal?.reason)

    signal?.addEventListener("abort", forwardAbort, { once: true })

    try {
      const contenders: Promise<Contender<T, E>>[] = [this.invoke(attempt.signal)]

      if (enforcement) {
        contenders.push(
          this.host.clock
            .sleepUntil(enforcement.deadline, attempt.signal)
            .then((): Contender<T, E> => ({ kind: "deadline", enforcement })),
        )
      }

      if (signal) contenders.push(rejectOnAbort(attempt.signal))

      const winner = await Promise.race(contenders)

      signal?.throwIfAborted()

      return winner.kind === "settled" ? winner.outcome : this.cutShort(winner.enforcement)
    } finally {
      signal?.removeEventListener("abort", forwardAbort)
      attempt.abort()
    }
  }

  private invoke(signal: AbortSignal): Promise<Contender<T, E>> {
    let pending: PromiseLike<T>

    try {
      pending = typeof this.op === "function" ? this.op(signal) : this.op
    } catch (error) {
      return Promise.resolve(failed<T, E>(error))
    }

    return Promise.resolve(pending).then(
      (value): Contender<T, E> => ({ kind: "settled", outcome: { ok: true, value } }),
      (error: unknown) => failed<T, E>(error),
    )
  }

  private cutShort(enforcement: Enforcement<E>): AttemptOutcome<T, E> {
    return {
      ok: false,
      error: timedOut(enforcement.makeError(this.host.takeLastError())),
    }
  }
}

function ignoreRejection(): void {}

function failed<T, E>(error: unknown): Contender<T, E> {
  return { kind: "settled", outcome: { ok: false, error: maybeRetryable(error as E) } }
}

/** Rejects with the signal's reason once it aborts. */
function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason)
      return
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true })
  })
}
