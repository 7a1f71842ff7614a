import path from "node:path"
import { isMissingFile, JsonSource } from "@driverwright/config"
import { type Logger, NullLogger } from "@driverwright/logger"
import { z } from "zod"
import { ConfigTreeError } from "../../core/errors"
import type { ConfigTree, ConfigTreeProvider } from "../../ports/config-tree"

const databaseGroupSchema = z.record(z.string(), z.record(z.string(), z.unknown()))

export const configTreeSchema = z.looseObject({
  active: databaseGroupSchema.optional(),
  inactive: databaseGroupSchema.optional(),
})

const ENVIRONMENT_NAME = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/

export type JsonConfigTreeProviderDeps = {
  logger?: Logger
}

export type JsonConfigTreeProviderOptions = {
  /** @default "conf" */
  configDir?: string
  /** @default "config.json" */
  fileName?: string
  /** @default process.cwd() */
  cwd?: string
}

/**
 * Reads `<configDir>/<environment>/<fileName>` and caches the parsed tree
 * per environment.
 */
export class JsonConfigTreeProvider implements ConfigTreeProvider {
  private readonly logger: Logger
  private readonly cache = new Map<string, ConfigTree>()

  constructor(
    deps: JsonConfigTreeProviderDeps = {},
    private readonly opts: JsonConfigTreeProviderOptions = {},
  ) {
    this.logger = deps.logger ?? new NullLogger()
  }

  fileFor(environment: string): string {
    return path.join(this.opts.configDir ?? "conf", environment, this.opts.fileName ?? "config.json")
  }

  async load(environment: string): Promise<ConfigTree> {
    const cached = this.cache.get(environment)
    if (cached) {
      this.logger.debug("Using cached database configuration", { env: environment })
      return cached
    }

    if (!ENVIRONMENT_NAME.test(environment) || environment.includes("..")) {
      throw new ConfigTreeError(`Invalid environment name "${environment}"`, {
        code: "invalid_environment",
        context: { env: environment },
      })
    }

    const file = this.fileFor(environment)
    const source = new JsonSource({
      file,
      required: true,
      ...(this.opts.cwd ? { cwd: this.opts.cwd } : {}),
    })

    this.logger.info("Loading database configuration", { env: environment, path: file })

    const tree = parseTree(await readTree(source, environment), source.path, environment)
    this.cache.set(environment, tree)

    return tree
  }

  clearCache(): void {
    this.logger.debug("Clearing database configuration cache")
    this.cache.clear()
  }
}

async function readTree(source: JsonSource, environment: string): Promise<unknown> {
  try {
    return await source.load()
  } catch (err) {
    if (isMissingFile(err)) {
      throw new ConfigTreeError(`Configuration file not found: ${source.path}`, {
        code: "config_not_found",
        context: { env: environment, path: source.path },
        cause: err,
      })
    }

    throw new ConfigTreeError(`Could not read configuration file ${source.path}`, {
      code: "invalid_config_tree",
      context: { env: environment, path: source.path },
      cause: err,
    })
  }
}

function parseTree(raw: unknown, file: string, environment: string): ConfigTree {
  const result = configTreeSchema.safeParse(raw)

  if (!result.success) {
    throw new ConfigTreeError(
      `Invalid database configuration in ${file}:\n${z.prettifyError(result.error)}`,
      {
        code: "invalid_config_tree",
        context: { env: environment, path: file },
        cause: result.error,
      },
    )
  }

  return result.data
}
