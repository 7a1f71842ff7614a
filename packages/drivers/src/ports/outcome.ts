import type { RuntimeFailureKind } from "./driver-runtime"
import type { ConfigKey, DriverId } from "./registry"

export type RequiredDriver = Readonly<{
  driverId: DriverId
  /** Active config keys that need this driver, sorted. */
  configKeys: readonly ConfigKey[]
  coordinate: string
  suggestion: string
}>

export type DriverResolution = Readonly<{
  /** Sorted by driver id; one entry per distinct driver. */
  required: readonly RequiredDriver[]
  /** Active keys with no registry entry, sorted. */
  unknown: readonly ConfigKey[]
}>

export type FailureDetail = Readonly<{
  driverId: DriverId
  configKeys: readonly ConfigKey[]
  cause: RuntimeFailureKind
  /** First line of the runtime's error message. */
  message: string
  coordinate: string
  suggestion: string
}>

/**
 * Result of loading or probing the drivers of one environment.
 *
 * `success` only reflects `failed`; unknown keys are never attempted and
 * must be reported separately.
 */
export type LoadOutcome = Readonly<{
  success: boolean
  loaded: readonly DriverId[]
  failed: readonly FailureDetail[]
  unknown: readonly ConfigKey[]
}>

export type DriverRequirements = Readonly<{
  environment: string
  required: readonly DriverId[]
  unknown: readonly ConfigKey[]
}>

export type ActiveDatabaseSummary = Readonly<{
  environment: string
  activeKeys: readonly ConfigKey[]
  inactiveKeys: readonly ConfigKey[]
  ambiguousKeys: readonly ConfigKey[]
  requiredDrivers: readonly DriverId[]
  unknownKeys: readonly ConfigKey[]
  validation: LoadOutcome
}>
