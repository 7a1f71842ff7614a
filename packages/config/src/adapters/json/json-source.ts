import fs from "node:fs/promises"
import path from "node:path"
import type { ConfigSource } from "../../ports/source"

export type JsonSourceOptions = {
  /**
   * Absolute, or relative to `cwd`.
   *
   * @example "conf/dev/config.json"
   */
  file: string

  /**
   * `true` rejects when the file is missing; `false` yields `{}`.
   */
  required: boolean

  /**
   * @default process.cwd()
   */
  cwd?: string
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${this.opts.file}`
  }

  get path(): string {
    return path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)
  }

  async load(): Promise<Record<string, unknown>> {
    let content: string

    try {
      content = await fs.readFile(this.path, "utf-8")
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) {
        return {}
      }
      throw err
    }

    const parsed: unknown = JSON.parse(content)

    if (!isPlainObject(parsed)) {
      throw new TypeError(`${this.path} must contain a JSON object at the top level`)
    }

    return parsed
  }
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && Reflect.get(err, "code") === "ENOENT"
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}
