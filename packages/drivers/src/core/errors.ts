import { BaseError } from "@driverwright/errors"
import type { LoadOutcome } from "../ports/outcome"

export type RegistryErrorCode = "duplicate_config_key" | "invalid_registry_entry"

/** A malformed driver registry. Raised while building it, never at lookup time. */
export class RegistryError extends BaseError<RegistryErrorCode> {}

export type ConfigTreeErrorCode =
  | "config_not_found"
  | "invalid_config_tree"
  | "invalid_environment"

export class ConfigTreeError extends BaseError<ConfigTreeErrorCode> {}

export type DriverResolutionErrorCode = "missing_drivers" | "unknown_config_keys"

/**
 * Thrown by `assertLoaded` when an outcome should stop startup.
 * The message is the full driver report.
 */
export class DriverResolutionError extends BaseError<DriverResolutionErrorCode> {
  readonly outcome: LoadOutcome

  constructor(
    message: string,
    options: { code: DriverResolutionErrorCode; environment: string; outcome: LoadOutcome },
  ) {
    super(message, {
      code: options.code,
      context: {
        environment: options.environment,
        failed: options.outcome.failed.map((f) => f.driverId),
        unknown: [...options.outcome.unknown],
      },
    })
    this.outcome = options.outcome
  }
}
