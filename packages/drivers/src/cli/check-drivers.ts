#!/usr/bin/env node
import { pathToFileURL } from "node:url"
import { ConfigValidationError } from "@driverwright/config"
import { type Logger, PinoLogger } from "@driverwright/logger"
import { JsonConfigTreeProvider } from "../adapters/json/json-config-tree-provider"
import { DriverManager } from "../core/driver-manager"
import { ConfigTreeError } from "../core/errors"
import { formatDriverReport } from "../core/report/format-report"
import { detectEnvironment, loadDriverSettings } from "../core/settings/settings"
import type { DriverRuntime } from "../ports/driver-runtime"
import type { DriverRegistry } from "../ports/registry"
import { CliUsageError, parseArgs, USAGE } from "./parse-args"

export type CheckDriversDeps = {
  stdout?: NodeJS.WritableStream
  /** Receives logs as well as errors, so stdout only ever holds the report. */
  stderr?: NodeJS.WritableStream
  /** @default process.env */
  env?: Record<string, string | undefined>
  /** @default process.cwd() */
  cwd?: string
  registry?: DriverRegistry
  runtime?: DriverRuntime
  logger?: Logger
}

export const ExitCode = {
  Ok: 0,
  DriversMissing: 1,
  ConfigError: 2,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

/**
 * Probe (or, with --load, load) the drivers of one environment and print
 * the report. Resolves to the process exit code.
 */
export async function runCheckDrivers(
  argv: readonly string[],
  deps: CheckDriversDeps = {},
): Promise<ExitCode> {
  const stdout = deps.stdout ?? process.stdout
  const stderr = deps.stderr ?? process.stderr

  try {
    const args = parseArgs(argv)

    if (args.help) {
      stdout.write(USAGE)
      return ExitCode.Ok
    }

    const settings = await loadDriverSettings({
      ...(deps.env && { env: deps.env }),
      ...(deps.cwd ? { cwd: deps.cwd } : {}),
      overrides: { DRIVERS_ENV: args.env, DRIVERS_CONFIG_DIR: args.configDir },
    })

    const logger =
      deps.logger ??
      new PinoLogger(
        { destination: stderr },
        { level: settings.value.LOG_LEVEL, prettify: settings.value.LOG_PRETTY },
        { service: "check-drivers" },
      )

    const environment = detectEnvironment(settings.value)
    const configTrees = new JsonConfigTreeProvider(
      { logger },
      {
        configDir: settings.value.DRIVERS_CONFIG_DIR,
        ...(deps.cwd ? { cwd: deps.cwd } : {}),
      },
    )
    const manager = new DriverManager(
      {
        configTrees,
        logger,
        ...(deps.registry && { registry: deps.registry }),
        ...(deps.runtime && { runtime: deps.runtime }),
      },
      { environment },
    )

    const outcome = args.load
      ? await manager.loadForEnvironment(environment)
      : await manager.validateEnvironment(environment)

    if (args.format === "json") {
      const mode = args.load ? "load" : "validate"
      stdout.write(`${JSON.stringify({ environment, mode, ...outcome }, null, 2)}\n`)
    } else {
      stdout.write(
        `${formatDriverReport(outcome, { environment, supportedKeys: manager.supportedKeys() })}\n`,
      )
    }

    return outcome.success && outcome.unknown.length === 0 ? ExitCode.Ok : ExitCode.DriversMissing
  } catch (err) {
    if (
      err instanceof CliUsageError ||
      err instanceof ConfigTreeError ||
      err instanceof ConfigValidationError
    ) {
      stderr.write(`${err.message}\n`)
      if (err instanceof CliUsageError) stderr.write(`\n${USAGE}`)
      return ExitCode.ConfigError
    }

    throw err
  }
}

const entry = process.argv[1]

if (entry && import.meta.url === pathToFileURL(entry).href) {
  runCheckDrivers(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code
    })
    .catch((err) => {
      console.error(err)
      process.exitCode = ExitCode.ConfigError
    })
}
