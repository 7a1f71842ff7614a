import { BaseError } from "@driverwright/errors"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources?: ConfigSource[]
}

export class ConfigValidationError extends BaseError<"invalid_settings"> {}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      {
        code: "invalid_settings",
        context: { sources: resolvedSources.map((s) => s.name) },
        cause: result.error,
      },
    )
  }

  for (const key of Object.keys(result.data)) {
    if (!(key in provenance)) {
      provenance[key] = "default"
    }
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
