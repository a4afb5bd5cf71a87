import type { OptionsSource } from "../../ports/options-source"
import { pickPrefixed } from "../utils/pick-prefixed"

export type EnvOptionsSourceOptions = {
  /** @default "BACKOFF_" */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvOptionsSource implements OptionsSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvOptionsSourceOptions = {}) {
    this.prefix = options.prefix ?? "BACKOFF_"
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    return pickPrefixed(this.env, this.prefix)
  }
}
