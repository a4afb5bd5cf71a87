import type { Milliseconds, UnixMs } from "@ebb/clock"

/** Largest duration, or instant, the schedule will ever produce. */
export const MAX_DURATION: Milliseconds = Number.MAX_SAFE_INTEGER

/**
 * `duration * factor`, saturating at {@link MAX_DURATION}.
 *
 * Never throws: NaN, negative and overflowing products all saturate, and the
 * caller clamps the result against its own ceiling. Zero stays zero.
 */
export function saturatingScale(duration: Milliseconds, factor: number): Milliseconds {
  if (duration === 0) return 0

  const scaled = duration * factor

  return scaled >= 0 && scaled <= MAX_DURATION ? scaled : MAX_DURATION
}

/** `instant + duration`, saturating at {@link MAX_DURATION}. */
export function saturatingAdd(instant: UnixMs, duration: Milliseconds): UnixMs {
  const sum = instant + duration

  return sum <= MAX_DURATION ? sum : MAX_DURATION
}
