/** Largest value the attempt counter reaches; it stays there once hit. */
export const MAX_ATTEMPTS = 2 ** 32 - 1

export function nextAttempt(attempts: number): number {
  return Math.min(attempts + 1, MAX_ATTEMPTS)
}
