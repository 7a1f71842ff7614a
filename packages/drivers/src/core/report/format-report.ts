import type { LoadOutcome } from "../../ports/outcome"
import type { ConfigKey } from "../../ports/registry"

export type ReportOptions = {
  environment: string
  /** Listed next to unknown keys so authors can spot typos. */
  supportedKeys?: readonly ConfigKey[]
}

export const INACTIVE_REMINDER =
  'Either add the missing dependencies to package.json or move the corresponding databases to "inactive" in your configuration.'

export function formatDriverReport(outcome: LoadOutcome, opts: ReportOptions): string {
  const lines: string[] = [
    `Database drivers for environment "${opts.environment}": ` +
      `${outcome.loaded.length} loaded, ${outcome.failed.length} failed, ${outcome.unknown.length} unknown`,
  ]

  if (outcome.loaded.length > 0) {
    lines.push("", "Loaded:", ...outcome.loaded.map((id) => `  - ${id}`))
  }

  if (outcome.failed.length > 0) {
    lines.push("", "Failed to load required database drivers:")

    for (const f of outcome.failed) {
      lines.push(
        `  - ${f.driverId} (${f.cause}: ${f.message})`,
        `    config keys: ${f.configKeys.join(", ")}`,
        `    ${f.suggestion}`,
      )
    }
  }

  if (outcome.unknown.length > 0) {
    lines.push(
      "",
      "Unknown database configuration keys (no driver registered):",
      ...outcome.unknown.map((key) => `  - ${key}`),
    )

    if (opts.supportedKeys && opts.supportedKeys.length > 0) {
      lines.push(`  Supported keys: ${opts.supportedKeys.join(", ")}`)
    }
  }

  if (outcome.failed.length > 0 || outcome.unknown.length > 0) {
    lines.push("", INACTIVE_REMINDER)
  }

  return lines.join("\n")
}
