import { z } from "zod"
import { EnvOptionsSource } from "../../adapters/env/env-options-source"
import type { OptionsSource } from "../../ports/options-source"
import { BackoffError } from "../backoff-error"
import { BackoffOptions } from "../options"
import {
  type BackoffOptionKey,
  type BackoffOptionsInput,
  backoffOptionKeys,
  backoffOptionsSchema,
} from "./options-schema"

export type LoadBackoffOptionsParams = {
  /** @default [new EnvOptionsSource()] */
  sources?: OptionsSource[]
  /** @default BackoffOptions.DEFAULT */
  base?: BackoffOptions
}

/** Options assembled from configuration, with where each value came from. */
export class LoadedBackoffOptions {
  constructor(
    readonly options: BackoffOptions,
    private readonly provenance: Readonly<Partial<Record<BackoffOptionKey, string>>>,
    private readonly mergedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this)
  }

  /** Name of the source that set `key`, or `"default"` when none did. */
  explain(key: BackoffOptionKey): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    const sources = Object.values(this.provenance).filter(
      (name): name is string => name !== undefined,
    )

    return [...new Set(sources)]
  }

  /** Keys supplied by a source that no setting reads, usually typos. */
  unknownKeys(): string[] {
    const known = new Set<string>(backoffOptionKeys)

    return [...this.mergedKeys].filter((k) => !known.has(k))
  }
}

export async function loadBackoffOptions({
  sources,
  base = BackoffOptions.DEFAULT,
}: LoadBackoffOptionsParams = {}): Promise<LoadedBackoffOptions> {
  const merged: Record<string, unknown> = {}
  const sourceOf: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvOptionsSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        sourceOf[key] = source.name
      }
    }
  }

  const result = backoffOptionsSchema.safeParse(merged)

  if (!result.success) {
    throw new BackoffError(
      `Backoff configuration validation failed:\n${z.prettifyError(result.error)}`,
      { code: "invalid_config", context: { sources: resolvedSources.map((s) => s.name) } },
    )
  }

  const provenance: Partial<Record<BackoffOptionKey, string>> = {}

  for (const key of backoffOptionKeys) {
    const name = sourceOf[key]
    if (name !== undefined) provenance[key] = name
  }

  return new LoadedBackoffOptions(
    applyInput(base, result.data),
    provenance,
    new Set(Object.keys(merged)),
  )
}

function applyInput(base: BackoffOptions, input: BackoffOptionsInput): BackoffOptions {
  let options = base

  if (input.MULTIPLIER !== undefined) options = options.multiplier(input.MULTIPLIER)
  if (input.JITTER !== undefined) options = options.jitter(input.JITTER)
  if (input.INITIAL_JITTER !== undefined) options = options.initialJitter(input.INITIAL_JITTER)
  if (input.INITIAL_DELAY_MS !== undefined) options = options.initialDelay(input.INITIAL_DELAY_MS)
  if (input.MAX_DELAY_MS !== undefined) options = options.maxDelay(input.MAX_DELAY_MS)

  return options
}
