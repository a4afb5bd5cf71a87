import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): UnixMs
}

export interface Sleeper {
  /** Delay execution for `ms` milliseconds. Resolves early if `signal` is aborted. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>

  /**
   * Delay execution until the clock reads at least `at`.
   *
   * @remarks
   * Resolves immediately when `at` has already passed, and early if `signal` is
   * aborted. Any pending timer is released in both cases.
   */
  sleepUntil(at: UnixMs, signal?: AbortSignal): Promise<void>
}

/**
 * Suspends the calling thread; nothing else runs on it until the sleep ends.
 */
export interface BlockingSleeper {
  sleepSync(ms: Milliseconds): void
  sleepUntilSync(at: UnixMs): void
}

export type Clock = TimeSource & Sleeper & BlockingSleeper
