import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { OptionsSource } from "../../ports/options-source"
import { pickPrefixed } from "../utils/pick-prefixed"

export type DotenvOptionsSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.backoff"
   */
  file: string

  /**
   * - `true`: loading throws if the file is missing.
   * - `false`: a missing file supplies nothing.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /** @default "BACKOFF_" */
  prefix?: string
}

export class DotenvOptionsSource implements OptionsSource {
  readonly name: string

  constructor(private readonly opts: DotenvOptionsSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return pickPrefixed(parse(content), this.opts.prefix ?? "BACKOFF_")
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) {
        return {}
      }
      throw err
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
