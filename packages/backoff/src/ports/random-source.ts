/**
 * Where jitter gets its randomness.
 *
 * `next()` yields a float in [0, 1). A schedule draws at most one value per
 * retry instant, and none when the deadline gate fails first, so a fixed
 * sequence of values reproduces a schedule exactly.
 */
export interface RandomSource {
  next(): number
}
