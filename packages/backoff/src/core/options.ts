import type { Milliseconds } from "@ebb/clock"
import { BackoffError } from "./backoff-error"
import { BackoffSchedule } from "./schedule"

export type BackoffOptionsValues = Readonly<{
  multiplier: number
  jitter: number
  initialJitter: number
  initialDelay: Milliseconds
  maxDelay: Milliseconds
}>

/**
 * Immutable tuning for a backoff sequence.
 *
 * Every setter returns a new instance; an instance can be shared freely
 * between sequences.
 *
 * @example
 * ```ts
 * const options = BackoffOptions.DEFAULT
 *   .initialDelay(1_000)
 *   .jitter(0)
 *   .maxDelay(30_000)
 * ```
 */
export class BackoffOptions {
  /** multiplier 2, jitter 0.25, no initial jitter, 150 ms initial delay, 60 s cap. */
  static readonly DEFAULT: BackoffOptions = new BackoffOptions({
    multiplier: 2,
    jitter: 0.25,
    initialJitter: 0,
    initialDelay: 150,
    maxDelay: 60_000,
  })

  private readonly values: BackoffOptionsValues

  private constructor(values: BackoffOptionsValues) {
    this.values = Object.freeze({ ...values })
    Object.freeze(this)
  }

  /**
   * Growth factor between consecutive retry delays.
   *
   * Values below 1 shrink the delay, NaN or overflowing growth saturates at
   * {@link BackoffOptions.maxDelay}.
   */
  multiplier(multiplier: number): BackoffOptions {
    return this.with({ multiplier })
  }

  /**
   * Fraction of each retry delay that may be randomly removed.
   *
   * `1` or more lets a retry happen immediately; `0`, negative or NaN disables jitter.
   */
  jitter(jitter: number): BackoffOptions {
    return this.with({ jitter })
  }

  /**
   * Jitter for the first attempt. When positive the first attempt is delayed by
   * `initialDelay` minus jitter, which spreads out a fleet starting at once.
   */
  initialJitter(initialJitter: number): BackoffOptions {
    return this.with({ initialJitter })
  }

  initialDelay(initialDelay: Milliseconds): BackoffOptions {
    return this.with({ initialDelay: assertDuration("initialDelay", initialDelay) })
  }

  /** Ceiling on a single retry delay. `Infinity` removes the ceiling. */
  maxDelay(maxDelay: Milliseconds): BackoffOptions {
    return this.with({ maxDelay: assertDuration("maxDelay", maxDelay) })
  }

  getMultiplier(): number {
    return this.values.multiplier
  }

  getJitter(): number {
    return this.values.jitter
  }

  getInitialJitter(): number {
    return this.values.initialJitter
  }

  getInitialDelay(): Milliseconds {
    return this.values.initialDelay
  }

  getMaxDelay(): Milliseconds {
    return this.values.maxDelay
  }

  /** Stateless schedule for callers that drive attempts themselves. */
  toSchedule(): BackoffSchedule {
    return new BackoffSchedule(this)
  }

  equals(other: BackoffOptions): boolean {
    return (
      Object.is(this.values.multiplier, other.values.multiplier) &&
      Object.is(this.values.jitter, other.values.jitter) &&
      Object.is(this.values.initialJitter, other.values.initialJitter) &&
      this.values.initialDelay === other.values.initialDelay &&
      this.values.maxDelay === other.values.maxDelay
    )
  }

  toJSON(): BackoffOptionsValues {
    return this.values
  }

  private with(patch: Partial<BackoffOptionsValues>): BackoffOptions {
    return new BackoffOptions({ ...this.values, ...patch })
  }
}

function assertDuration(name: string, value: Milliseconds): Milliseconds {
  if (!(value >= 0)) {
    throw new BackoffError(`${name} must be a non-negative duration in milliseconds`, {
      code: "invalid_option",
      context: { option: name, value },
      isOperational: false,
    })
  }

  return value
}
