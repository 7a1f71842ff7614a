import { toAppError } from "@driverwright/errors"
import type { Logger } from "@driverwright/logger"
import type { RuntimeResult } from "../../ports/driver-runtime"
import type { DriverResolution, FailureDetail, LoadOutcome } from "../../ports/outcome"
import type { DriverId } from "../../ports/registry"

export type AttemptMode = "load" | "probe"

/**
 * Run `attempt` for every required driver and partition the results.
 * A failing driver never stops the remaining attempts.
 */
export function collectOutcome(
  resolution: DriverResolution,
  attempt: (driverId: DriverId) => RuntimeResult,
  mode: AttemptMode,
  logger?: Logger,
): LoadOutcome {
  const loaded: DriverId[] = []
  const failed: FailureDetail[] = []

  for (const driver of resolution.required) {
    const result = safeAttempt(attempt, driver.driverId)

    if (result.ok) {
      loaded.push(driver.driverId)
      logger?.debug(mode === "load" ? "Loaded database driver" : "Database driver is available", {
        driverId: driver.driverId,
      })
      continue
    }

    const message = firstLine(toAppError(result.error, result.kind).message)

    failed.push({
      driverId: driver.driverId,
      configKeys: driver.configKeys,
      cause: result.kind,
      message,
      coordinate: driver.coordinate,
      suggestion: driver.suggestion,
    })

    if (result.kind === "driver_load_error") {
      logger?.warn("Database driver was found but failed to load", {
        driverId: driver.driverId,
        err: result.error,
      })
    } else {
      logger?.debug("Database driver is not installed", { driverId: driver.driverId, message })
    }
  }

  return {
    success: failed.length === 0,
    loaded,
    failed,
    unknown: [...resolution.unknown],
  }
}

function safeAttempt(
  attempt: (driverId: DriverId) => RuntimeResult,
  driverId: DriverId,
): RuntimeResult {
  try {
    return attempt(driverId)
  } catch (error) {
    return { ok: false, kind: "driver_load_error", error }
  }
}

function firstLine(message: string): string {
  const [line] = message.split("\n")
  return line?.trim() || message
}
