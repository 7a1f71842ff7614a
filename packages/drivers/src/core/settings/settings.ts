import {
  DotenvSource,
  EnvSource,
  type IConfig,
  loadConfig,
  ObjectSource,
} from "@driverwright/config"
import { logLevelNames } from "@driverwright/logger"
import { z } from "zod"

export const DEFAULT_ENVIRONMENT = "dev"

export const driverSettingsSchema = z.object({
  DRIVERS_ENV: z.string().optional(),
  ENV: z.string().optional(),
  ENVIRONMENT: z.string().optional(),
  DRIVERS_CONFIG_DIR: z.string().min(1).default("conf"),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type DriverSettings = z.infer<typeof driverSettingsSchema>

export type EnvironmentVariables = Readonly<
  Partial<Record<"DRIVERS_ENV" | "ENV" | "ENVIRONMENT", string>>
>

/**
 * First non-blank of DRIVERS_ENV, ENV and ENVIRONMENT, else "dev".
 */
export function detectEnvironment(vars: EnvironmentVariables = process.env): string {
  const candidates = [vars.DRIVERS_ENV, vars.ENV, vars.ENVIRONMENT]

  return candidates.find((v) => v !== undefined && v.trim() !== "")?.trim() ?? DEFAULT_ENVIRONMENT
}

export type LoadDriverSettingsOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>
  /** Directory holding the optional `.env` file. @default process.cwd() */
  cwd?: string
  /** Applied last, e.g. command-line flags. */
  overrides?: Record<string, string | undefined>
}

export function loadDriverSettings(
  opts: LoadDriverSettingsOptions = {},
): Promise<IConfig<DriverSettings>> {
  return loadConfig<DriverSettings>({
    schema: driverSettingsSchema,
    sources: [
      new DotenvSource({ file: ".env", required: false, ...(opts.cwd ? { cwd: opts.cwd } : {}) }),
      new EnvSource(opts.env ? { env: opts.env } : {}),
      new ObjectSource(opts.overrides ?? {}, "cli"),
    ],
  })
}
