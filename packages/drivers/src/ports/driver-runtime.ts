import type { DriverId } from "./registry"

export type RuntimeFailureKind =
  /** The identifier does not resolve to any module. */
  | "driver_unavailable"
  /** The module resolves but throws while being evaluated. */
  | "driver_load_error"

export type RuntimeResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly kind: RuntimeFailureKind; readonly error: unknown }

/**
 * The platform's way of finding a driver by identifier.
 *
 * Implementations must not throw; every failure is returned as a result.
 */
export interface DriverRuntime {
  /**
   * Capability probe: can `driverId` be found? Must not evaluate the module
   * or register anything.
   */
  resolve(driverId: DriverId): RuntimeResult

  /**
   * Evaluate the driver and register it in the driver catalog.
   * Loading a driver that is already registered succeeds without
   * evaluating it again.
   */
  load(driverId: DriverId): RuntimeResult
}
