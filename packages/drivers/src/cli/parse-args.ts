export type OutputFormat = "text" | "json"

export type CliArgs = {
  readonly env?: string
  readonly configDir?: string
  readonly load: boolean
  readonly format: OutputFormat
  readonly help: boolean
}

export class CliUsageError extends Error {}

export const USAGE = `
check-drivers: verify the database drivers an environment needs

Usage: check-drivers [options]

Options:
  --env <name>            Environment to check (default: DRIVERS_ENV, ENV, ENVIRONMENT or "dev")
  --config-dir <path>     Directory holding <env>/config.json (default: DRIVERS_CONFIG_DIR or "conf")
  --load                  Load and register the drivers instead of only probing them
  --format text|json      Output format (default: text)
  --help                  Show this help message
`.trimStart()

export function parseArgs(argv: readonly string[]): CliArgs {
  let env: string | undefined
  let configDir: string | undefined
  let load = false
  let format: OutputFormat = "text"
  let help = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    switch (arg) {
      case "--env":
        env = valueOf(argv, ++i, arg)
        break
      case "--config-dir":
        configDir = valueOf(argv, ++i, arg)
        break
      case "--load":
        load = true
        break
      case "--format": {
        const value = valueOf(argv, ++i, arg)
        if (value !== "text" && value !== "json") {
          throw new CliUsageError(`--format must be "text" or "json", got "${value}"`)
        }
        format = value
        break
      }
      case "--help":
      case "-h":
        help = true
        break
      default:
        throw new CliUsageError(`Unknown option: ${arg}`)
    }
  }

  return {
    load,
    format,
    help,
    ...(env !== undefined && { env }),
    ...(configDir !== undefined && { configDir }),
  }
}

function valueOf(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index]

  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${flag} needs a value`)
  }

  return value
}
