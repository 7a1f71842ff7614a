import type { ConfigSource } from "../../ports/source"

/**
 * In-memory values, typically command-line overrides applied last.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly obj: Record<string, unknown>,
    label = "overrides",
  ) {
    this.name = `object:${label}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
