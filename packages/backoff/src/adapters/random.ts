import type { RandomSource } from "../ports/random-source"

export const systemRandom: RandomSource = {
  next(): number {
    return Math.random()
  },
}

/**
 * Replays `values` in order, wrapping around at the end.
 *
 * Feeding a recorded draw back in reproduces a schedule exactly.
 */
export function replayRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new RangeError("replayRandom needs at least one value")
  }

  for (const value of values) {
    if (!(value >= 0 && value < 1)) {
      throw new RangeError(`random values must lie in [0, 1), got ${value}`)
    }
  }

  const recorded = [...values]
  let index = 0

  return {
    next(): number {
      const value = recorded[index % recorded.length] ?? 0
      index++
      return value
    },
  }
}
