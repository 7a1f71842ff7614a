import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"
import { isMissingFile } from "../json/json-source"

export type DotenvSourceOptions = {
  /**
   * Absolute, or relative to `cwd`.
   *
   * @example ".env", ".env.ci"
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

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    try {
      return parse(await fs.readFile(filePath, "utf-8"))
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) {
        return {}
      }
      throw err
    }
  }
}
