/**
 * Dependency resolution shared by work-order graphs and stage graphs.
 *
 * Provides:
 *  - Duplicate and unknown reference detection
 *  - Cycle detection using DFS with visited/inStack sets
 *  - Topological ordering with a deterministic tie-break
 */

import { ConfigurationError, DependencyCycleError } from '../../core/errors.js'

/** A node in a dependency graph; declaration order is the array order */
export interface DependencyNode {
  id: string
  dependencies: Iterable<string>
}

// ---------------------------------------------------------------------------
// validateReferences
// ---------------------------------------------------------------------------

/**
 * @returns messages for duplicate ids and references to unknown nodes (empty if valid)
 */
export function validateReferences(nodes: readonly DependencyNode[]): string[] {
  const errors: string[] = []
  const ids = new Set<string>()
  for (const node of nodes) {
    if (ids.has(node.id)) {
      errors.push(`Duplicate id "${node.id}"`)
    }
    ids.add(node.id)
  }
  for (const node of nodes) {
    for (const dep of node.dependencies) {
      if (!ids.has(dep)) {
        errors.push(`"${node.id}" references unknown dependency "${dep}"`)
      }
    }
  }
  return errors
}

// ---------------------------------------------------------------------------
// detectCycle
// ---------------------------------------------------------------------------

/**
 * @returns the cycle path (e.g. ['a', 'b', 'a']) or null when the graph is acyclic
 */
export function detectCycle(nodes: readonly DependencyNode[]): string[] | null {
  const byId = new Map(nodes.map((n) => [n.id, [...n.dependencies]]))
  const visited = new Set<string>()
  const inStack = new Set<string>()

  function dfs(nodeId: string, path: string[]): string[] | null {
    visited.add(nodeId)
    inStack.add(nodeId)

    for (const dep of byId.get(nodeId) ?? []) {
      if (inStack.has(dep)) {
        const cycleStart = path.indexOf(dep)
        return [...path.slice(cycleStart), dep]
      }
      if (!visited.has(dep)) {
        const cycle = dfs(dep, [...path, dep])
        if (cycle) return cycle
      }
    }

    inStack.delete(nodeId)
    return null
  }

  for (const node of nodes) {
    if (!visited.has(node.id)) {
      const cycle = dfs(node.id, [node.id])
      if (cycle) return cycle
    }
  }
  return null
}

// ---------------------------------------------------------------------------
// topologicalOrder
// ---------------------------------------------------------------------------

/**
 * Order nodes so every node follows its dependencies. Among nodes that are
 * ready at the same time, fewer declared dependencies wins, then declaration
 * order.
 *
 * @throws {ConfigurationError} on duplicate ids or unknown references
 * @throws {DependencyCycleError} when the graph contains a cycle
 */
export function topologicalOrder<T extends DependencyNode>(nodes: readonly T[]): T[] {
  const problems = validateReferences(nodes)
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid dependency graph: ${problems.join('; ')}`, { problems })
  }
  const cycle = detectCycle(nodes)
  if (cycle !== null) {
    throw new DependencyCycleError(cycle)
  }

  const entries = nodes.map((node, index) => ({
    node,
    index,
    deps: new Set(node.dependencies),
  }))
  const placed = new Set<string>()
  const ordered: T[] = []
  let remaining = entries

  while (remaining.length > 0) {
    const ready = remaining.filter((e) => [...e.deps].every((d) => placed.has(d)))
    // Non-empty: the graph was checked acyclic above
    const next = ready.reduce((best, e) =>
      e.deps.size < best.deps.size || (e.deps.size === best.deps.size && e.index < best.index) ? e : best,
    )
    ordered.push(next.node)
    placed.add(next.node.id)
    remaining = remaining.filter((e) => e !== next)
  }

  return ordered
}
