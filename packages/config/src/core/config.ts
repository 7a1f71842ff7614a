import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  private readonly declared: ReadonlySet<string>

  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly providedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
    this.declared = new Set(Object.keys(this.data))
  }

  get value(): T {
    return this.data
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  extras(): string[] {
    return [...this.providedKeys].filter((k) => !this.declared.has(k))
  }
}
