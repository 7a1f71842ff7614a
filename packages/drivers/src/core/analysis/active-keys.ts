import type { Logger } from "@driverwright/logger"
import type { ActiveKeyAnalysis, ActiveKeySet, ConfigTree } from "../../ports/config-tree"
import type { ConfigKey } from "../../ports/registry"
import { compare } from "../registry/static-registry"

type Group = "active" | "inactive"

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function groupKeys(tree: ConfigTree, group: Group): ConfigKey[] {
  const value = tree[group]

  return isMapping(value) ? Object.keys(value) : []
}

/** Groups that are present but not a mapping of database keys. */
function malformedGroups(tree: ConfigTree): Group[] {
  return (["active", "inactive"] as const).filter(
    (group) => tree[group] !== undefined && !isMapping(tree[group]),
  )
}

/**
 * Split a tree into active, inactive-only and ambiguous keys.
 * A key listed in both groups is active.
 */
export function analyzeConfigTree(tree: ConfigTree): ActiveKeyAnalysis {
  const active = new Set(groupKeys(tree, "active"))
  const inactive = groupKeys(tree, "inactive")

  return {
    active: [...active].sort(compare),
    inactive: inactive.filter((k) => !active.has(k)).sort(compare),
    ambiguous: inactive.filter((k) => active.has(k)).sort(compare),
  }
}

export function activeKeys(
  tree: ConfigTree,
  environment: string,
  logger?: Logger,
): ActiveKeySet {
  const analysis = analyzeConfigTree(tree)

  for (const group of malformedGroups(tree)) {
    logger?.warn("Database group is not a mapping of database keys; ignoring it", {
      env: environment,
      group,
    })
  }

  if (analysis.ambiguous.length > 0) {
    logger?.warn("Database configured as both active and inactive; treating it as active", {
      env: environment,
      configKeys: analysis.ambiguous,
    })
  }

  logger?.debug("Analyzed database configuration", {
    env: environment,
    active: analysis.active,
    inactive: analysis.inactive,
  })

  return analysis.active
}
