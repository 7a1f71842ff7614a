export { JsonConfigTreeProvider, configTreeSchema } from "./adapters/json/json-config-tree-provider"
export type {
  JsonConfigTreeProviderDeps,
  JsonConfigTreeProviderOptions,
} from "./adapters/json/json-config-tree-provider"
export { MemoryConfigTreeProvider } from "./adapters/memory/memory-config-tree-provider"
export { MemoryDriverRuntime } from "./adapters/memory/memory-driver-runtime"
export type {
  MemoryDriverRuntimeDeps,
  MemoryDriverRuntimeOptions,
} from "./adapters/memory/memory-driver-runtime"
export { NodeModuleRuntime } from "./adapters/node/node-module-runtime"
export type {
  NodeModuleRuntimeDeps,
  NodeModuleRuntimeOptions,
} from "./adapters/node/node-module-runtime"
export { activeKeys, analyzeConfigTree } from "./core/analysis/active-keys"
export { DriverCatalog, defaultDriverCatalog } from "./core/catalog/driver-catalog"
export {
  DriverManager,
  type DriverManagerDeps,
  type DriverManagerOptions,
} from "./core/driver-manager"
export {
  ConfigTreeError,
  type ConfigTreeErrorCode,
  DriverResolutionError,
  type DriverResolutionErrorCode,
  RegistryError,
  type RegistryErrorCode,
} from "./core/errors"
export { type DriverAttemptDeps, loadDrivers, probeDrivers } from "./core/loading/load-drivers"
export { DEFAULT_DRIVERS, defaultRegistry } from "./core/registry/default-registry"
export {
  type DriverDefinition,
  defineDriver,
  StaticDriverRegistry,
} from "./core/registry/static-registry"
export { assertLoaded } from "./core/report/assert-loaded"
export { formatDriverReport, INACTIVE_REMINDER, type ReportOptions } from "./core/report/format-report"
export { resolveDrivers } from "./core/resolution/resolve-drivers"
export {
  DEFAULT_ENVIRONMENT,
  type DriverSettings,
  detectEnvironment,
  driverSettingsSchema,
  type EnvironmentVariables,
  type LoadDriverSettingsOptions,
  loadDriverSettings,
} from "./core/settings/settings"
export type {
  ActiveKeyAnalysis,
  ActiveKeySet,
  ConfigTree,
  ConfigTreeProvider,
} from "./ports/config-tree"
export type { DriverRuntime, RuntimeFailureKind, RuntimeResult } from "./ports/driver-runtime"
export type {
  ActiveDatabaseSummary,
  DriverRequirements,
  DriverResolution,
  FailureDetail,
  LoadOutcome,
  RequiredDriver,
} from "./ports/outcome"
export type { ConfigKey, DriverId, DriverRegistry, RegistryEntry } from "./ports/registry"
