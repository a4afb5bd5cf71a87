import type { OptionsSource } from "../../ports/options-source"

export class ObjectOptionsSource implements OptionsSource {
  readonly name: string

  constructor(
    private readonly obj: Record<string, unknown>,
    name = "object:overrides",
  ) {
    this.name = name
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
