import type { Milliseconds } from "@ebb/clock"
import { saturatingScale } from "./duration"

/**
 * Resolve a configured jitter fraction to the share of a delay that may be removed.
 *
 * - `0 < jitter < 1` → `jitter`
 * - `jitter >= 1` → `1` (the attempt may happen immediately)
 * - `jitter <= 0` or NaN → `0` (no jitter)
 */
export function resolveJitterFactor(jitter: number): number {
  if (jitter >= 1) return 1
  if (jitter > 0) return jitter

  return 0
}

/**
 * Amount to subtract from `base`: `base * factor * random`.
 *
 * The result lies in `[0, factor * base)`. It is only ever subtracted, so a
 * jittered attempt is never later than its nominal instant. A `random` value
 * outside [0, 1) is treated as 0.
 */
export function applyJitter(
  base: Milliseconds,
  jitter: number,
  random: number,
): Milliseconds {
  const factor = resolveJitterFactor(jitter)
  const unit = random >= 0 && random < 1 ? random : 0

  if (factor === 0 || unit === 0) return 0

  return Math.min(saturatingScale(base, factor * unit), base)
}
