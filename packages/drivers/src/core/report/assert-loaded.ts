import type { LoadOutcome } from "../../ports/outcome"
import type { ConfigKey } from "../../ports/registry"
import { DriverResolutionError } from "../errors"
import { formatDriverReport } from "./format-report"

/**
 * Startup policy: throw unless every required driver loaded and every
 * active key is known. Missing drivers take precedence over unknown keys.
 */
export function assertLoaded(
  outcome: LoadOutcome,
  environment: string,
  supportedKeys?: readonly ConfigKey[],
): void {
  if (outcome.failed.length === 0 && outcome.unknown.length === 0) return

  throw new DriverResolutionError(
    formatDriverReport(outcome, { environment, ...(supportedKeys && { supportedKeys }) }),
    {
      code: outcome.failed.length > 0 ? "missing_drivers" : "unknown_config_keys",
      environment,
      outcome,
    },
  )
}
