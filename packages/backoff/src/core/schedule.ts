import type { Milliseconds, UnixMs } from "@ebb/clock"
import { systemRandom } from "../adapters/random"
import type { RandomSource } from "../ports/random-source"
import { saturatingAdd, saturatingScale } from "./duration"
import { applyJitter } from "./jitter"
import type { BackoffOptions } from "./options"

/** The attempt would start after the deadline. */
export type DeadlineExceeded = Readonly<{
  attempt: number
  /** Nominal (un-jittered) instant the attempt would have been due. */
  retryAt: UnixMs
  deadline: UnixMs
}>

export type ScheduleResult =
  | Readonly<{ ok: true; retryAt: UnixMs | null }>
  | Readonly<{ ok: false; error: DeadlineExceeded }>

/**
 * Pure retry schedule derived from {@link BackoffOptions}.
 *
 * Holds no per-sequence state, so one schedule can serve any number of
 * concurrent sequences.
 */
export class BackoffSchedule {
  constructor(readonly options: BackoffOptions) {}

  /**
   * Un-jittered delay before attempt `n`.
   *
   * - `n = 0`: `initialDelay` (only applied when initial jitter is enabled)
   * - `n >= 1`: `min(initialDelay * multiplier^(n-1), maxDelay)`
   */
  nominalDelay(n: number): Milliseconds {
    assertAttempt(n)

    const initialDelay = this.options.getInitialDelay()

    if (n === 0) return initialDelay

    const grown = saturatingScale(initialDelay, this.options.getMultiplier() ** (n - 1))

    return Math.min(grown, this.options.getMaxDelay())
  }

  /**
   * Recommended start instant of attempt `n` in a sequence observed at `now`.
   *
   * @returns
   * - `{ ok: true, retryAt: null }` when attempt 0 may run immediately
   * - `{ ok: true, retryAt }` with the jittered instant otherwise
   * - `{ ok: false }` when the nominal instant falls after `deadline`
   *
   * Jitter only ever moves an attempt earlier. The deadline check uses the
   * nominal instant, so an attempt admitted here stays inside the deadline
   * for every possible random draw.
   */
  nthRetryAt(
    n: number,
    now: UnixMs,
    deadline?: UnixMs,
    random: RandomSource = systemRandom,
  ): ScheduleResult {
    const isFirst = n === 0
    const jitter = isFirst ? this.options.getInitialJitter() : this.options.getJitter()

    if (isFirst && !(jitter > 0)) {
      assertAttempt(n)
      return { ok: true, retryAt: null }
    }

    const delay = this.nominalDelay(n)
    const nominal = saturatingAdd(now, delay)

    if (deadline !== undefined && nominal > deadline) {
      return { ok: false, error: { attempt: n, retryAt: nominal, deadline } }
    }

    const reduction = applyJitter(delay, jitter, random.next())

    return { ok: true, retryAt: saturatingAdd(now, delay - reduction) }
  }
}

function assertAttempt(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`attempt index must be a non-negative integer, got ${n}`)
  }
}
