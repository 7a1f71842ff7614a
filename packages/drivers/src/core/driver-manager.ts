import { type Logger, NullLogger } from "@driverwright/logger"
import { JsonConfigTreeProvider } from "../adapters/json/json-config-tree-provider"
import { NodeModuleRuntime } from "../adapters/node/node-module-runtime"
import type { ConfigTree, ConfigTreeProvider } from "../ports/config-tree"
import type { DriverRuntime } from "../ports/driver-runtime"
import type {
  ActiveDatabaseSummary,
  DriverRequirements,
  DriverResolution,
  LoadOutcome,
} from "../ports/outcome"
import type { DriverRegistry } from "../ports/registry"
import { activeKeys, analyzeConfigTree } from "./analysis/active-keys"
import { loadDrivers, probeDrivers } from "./loading/load-drivers"
import { defaultRegistry } from "./registry/default-registry"
import { resolveDrivers } from "./resolution/resolve-drivers"
import { detectEnvironment } from "./settings/settings"

export type DriverManagerDeps = {
  /** @default defaultRegistry */
  registry?: DriverRegistry
  /** @default new NodeModuleRuntime() */
  runtime?: DriverRuntime
  /** @default new JsonConfigTreeProvider() reading conf/<env>/config.json */
  configTrees?: ConfigTreeProvider
  logger?: Logger
}

export type DriverManagerOptions = {
  /**
   * Environment used when none is passed.
   * @default detectEnvironment(process.env)
   */
  environment?: string
}

/**
 * Entry point for applications: works out which drivers an environment
 * needs and loads or validates them.
 *
 * @example
 * ```ts
 * const drivers = new DriverManager({ logger })
 * const outcome = await drivers.loadForEnvironment("prod")
 * assertLoaded(outcome, "prod", drivers.supportedKeys())
 * ```
 */
export class DriverManager {
  private readonly registry: DriverRegistry
  private readonly runtime: DriverRuntime
  private readonly configTrees: ConfigTreeProvider
  private readonly logger: Logger

  constructor(
    deps: DriverManagerDeps = {},
    private readonly opts: DriverManagerOptions = {},
  ) {
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "drivers" })
    this.registry = deps.registry ?? defaultRegistry
    this.runtime = deps.runtime ?? new NodeModuleRuntime()
    this.configTrees = deps.configTrees ?? new JsonConfigTreeProvider({ logger: this.logger })
  }

  defaultEnvironment(): string {
    return this.opts.environment ?? detectEnvironment()
  }

  supportedKeys(): string[] {
    return this.registry.entries().map((e) => e.configKey)
  }

  resolve(tree: ConfigTree, environment: string): DriverResolution {
    const logger = this.logger.child({ env: environment })
    return resolveDrivers(activeKeys(tree, environment, logger), this.registry)
  }

  listRequiredDrivers(tree: ConfigTree, environment: string): DriverRequirements {
    const { required, unknown } = this.resolve(tree, environment)

    return {
      environment,
      required: required.map((d) => d.driverId),
      unknown,
    }
  }

  /** Read the environment's configuration, then load its drivers. */
  loadForEnvironment(environment?: string): Promise<LoadOutcome>
  /** Load the drivers required by an already-loaded configuration tree. */
  loadForEnvironment(tree: ConfigTree, environment: string): LoadOutcome
  loadForEnvironment(
    treeOrEnvironment?: ConfigTree | string,
    environment?: string,
  ): Promise<LoadOutcome> | LoadOutcome {
    if (typeof treeOrEnvironment === "object") {
      return this.load(treeOrEnvironment, environment ?? this.defaultEnvironment())
    }

    const env = treeOrEnvironment ?? this.defaultEnvironment()
    this.logger.info("Loading database drivers for environment", { env })

    return this.configTrees.load(env).then((tree) => this.load(tree, env))
  }

  /**
   * Dry run of `loadForEnvironment`: probes each driver without loading or
   * registering it.
   */
  validate(tree: ConfigTree, environment: string): LoadOutcome {
    const logger = this.logger.child({ env: environment })

    return probeDrivers(this.resolve(tree, environment), { runtime: this.runtime, logger })
  }

  async validateEnvironment(environment?: string): Promise<LoadOutcome> {
    const env = environment ?? this.defaultEnvironment()
    const tree = await this.configTrees.load(env)

    return this.validate(tree, env)
  }

  summarize(tree: ConfigTree, environment: string): ActiveDatabaseSummary {
    const analysis = analyzeConfigTree(tree)
    const { required, unknown } = resolveDrivers(analysis.active, this.registry)

    return {
      environment,
      activeKeys: analysis.active,
      inactiveKeys: analysis.inactive,
      ambiguousKeys: analysis.ambiguous,
      requiredDrivers: required.map((d) => d.driverId),
      unknownKeys: unknown,
      validation: this.validate(tree, environment),
    }
  }

  private load(tree: ConfigTree, environment: string): LoadOutcome {
    const logger = this.logger.child({ env: environment })
    const outcome = loadDrivers(this.resolve(tree, environment), { runtime: this.runtime, logger })

    logger.info("Database driver loading completed", { success: outcome.success })

    return outcome
  }
}
