import { ConfigTreeError } from "../../core/errors"
import type { ConfigTree, ConfigTreeProvider } from "../../ports/config-tree"

/**
 * Configuration trees held in memory, keyed by environment.
 */
export class MemoryConfigTreeProvider implements ConfigTreeProvider {
  private readonly trees: Map<string, ConfigTree>

  constructor(trees: Record<string, ConfigTree> = {}) {
    this.trees = new Map(Object.entries(trees))
  }

  set(environment: string, tree: ConfigTree): void {
    this.trees.set(environment, tree)
  }

  async load(environment: string): Promise<ConfigTree> {
    const tree = this.trees.get(environment)

    if (!tree) {
      throw new ConfigTreeError(`No configuration for environment "${environment}"`, {
        code: "config_not_found",
        context: { env: environment },
      })
    }

    return tree
  }
}
