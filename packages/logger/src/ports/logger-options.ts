import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local runs of the CLI.
   * Leave off in deployments so logs stay one JSON object per line.
   */
  prettify?: boolean
}
