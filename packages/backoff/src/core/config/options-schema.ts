import { z } from "zod"

const duration = z.coerce.number().nonnegative()

/**
 * Settings accepted from configuration sources. Every key is optional and
 * falls back to the base options.
 */
export const backoffOptionsSchema = z.object({
  MULTIPLIER: z.coerce.number().optional(),
  JITTER: z.coerce.number().optional(),
  INITIAL_JITTER: z.coerce.number().optional(),
  INITIAL_DELAY_MS: duration.optional(),
  MAX_DELAY_MS: duration.optional(),
})

export type BackoffOptionsInput = z.infer<typeof backoffOptionsSchema>

export type BackoffOptionKey = keyof BackoffOptionsInput

export const backoffOptionKeys: readonly BackoffOptionKey[] = Object.freeze([
  "MULTIPLIER",
  "JITTER",
  "INITIAL_JITTER",
  "INITIAL_DELAY_MS",
  "MAX_DELAY_MS",
])
