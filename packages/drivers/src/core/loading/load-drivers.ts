import type { Logger } from "@driverwright/logger"
import type { DriverRuntime } from "../../ports/driver-runtime"
import type { DriverResolution, LoadOutcome } from "../../ports/outcome"
import { collectOutcome } from "./collect-outcome"

export type DriverAttemptDeps = {
  runtime: DriverRuntime
  logger?: Logger
}

/**
 * Load and register every required driver, in driver id order.
 */
export function loadDrivers(resolution: DriverResolution, deps: DriverAttemptDeps): LoadOutcome {
  const outcome = collectOutcome(resolution, (id) => deps.runtime.load(id), "load", deps.logger)

  deps.logger?.info("Loaded database drivers", {
    requiredCount: resolution.required.length,
    loadedCount: outcome.loaded.length,
    failedCount: outcome.failed.length,
    unknownCount: outcome.unknown.length,
  })

  if (outcome.failed.length > 0) {
    deps.logger?.error("Required database drivers are not available", {
      failed: outcome.failed,
    })
  }

  return outcome
}

/**
 * Same partition as `loadDrivers`, using the runtime's side-effect-free probe.
 */
export function probeDrivers(resolution: DriverResolution, deps: DriverAttemptDeps): LoadOutcome {
  const outcome = collectOutcome(resolution, (id) => deps.runtime.resolve(id), "probe", deps.logger)

  deps.logger?.info("Validated database drivers", {
    requiredCount: resolution.required.length,
    availableCount: outcome.loaded.length,
    missingCount: outcome.failed.length,
    unknownCount: outcome.unknown.length,
  })

  return outcome
}
