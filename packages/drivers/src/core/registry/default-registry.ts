import type { DriverRegistry } from "../../ports/registry"
import { defineDriver, StaticDriverRegistry } from "./static-registry"

export const DEFAULT_DRIVERS = [
  defineDriver({ configKey: "sqlite", driverId: "better-sqlite3", version: "^11.7.0" }),
  defineDriver({ configKey: "postgresql", driverId: "pg", version: "^8.13.1" }),
  defineDriver({ configKey: "mysql", driverId: "mysql2", version: "^3.11.5" }),
  defineDriver({ configKey: "mssql", driverId: "mssql", version: "^11.0.1" }),
] as const

export const defaultRegistry: DriverRegistry = new StaticDriverRegistry(DEFAULT_DRIVERS)
