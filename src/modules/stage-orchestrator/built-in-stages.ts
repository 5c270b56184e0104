/**
 * Built-in stage definitions and the stage registry.
 *
 * The standard pipeline is a chain:
 *   1. implementation      produces the artifact
 *   2. testing             verifies implementation; artifact defects roll back
 *   3. quality_validation  quality gates
 *   4. integration
 *   5. deployment
 */

import { DependencyCycleError, UnknownStageError } from '../../core/errors.js'
import type { StageName } from '../../core/types.js'
import type { StageOverride } from '../config/index.js'
import { detectCycle, topologicalOrder } from '../pipeline-scheduler/index.js'
import type { PipelinePreset, StageDefinition } from './types.js'

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

export function createBuiltInStages(): StageDefinition[] {
  return [
    {
      name: 'implementation',
      description: 'Implement the requested change',
      kind: 'production',
      dependencies: [],
      dispatchMode: 'dependency_graph',
      strategy: 'implementation',
      defaultExecutor: 'fullstack-engineer',
    },
    {
      name: 'testing',
      description: 'Write and run tests against the implementation',
      kind: 'verification',
      dependencies: ['implementation'],
      dispatchMode: 'parallel',
      strategy: 'testing',
      verifies: 'implementation',
      defaultExecutor: 'test-engineer',
    },
    {
      name: 'quality_validation',
      description: 'Evaluate the quality gates',
      kind: 'gate',
      dependencies: ['testing'],
      dispatchMode: 'parallel',
      strategy: 'quality_gate',
      defaultExecutor: 'code-reviewer',
    },
    {
      name: 'integration',
      description: 'Integrate the change with the surrounding system',
      kind: 'production',
      dependencies: ['quality_validation'],
      dispatchMode: 'sequential',
      strategy: 'integration',
      defaultExecutor: 'backend-architect',
    },
    {
      name: 'deployment',
      description: 'Deploy the integrated change',
      kind: 'production',
      dependencies: ['integration'],
      dispatchMode: 'sequential',
      strategy: 'deployment',
      defaultExecutor: 'devops-engineer',
    },
  ]
}

export const PRESET_STAGES: Readonly<Record<PipelinePreset, readonly StageName[]>> = {
  full: ['implementation', 'testing', 'quality_validation', 'integration', 'deployment'],
  implementation_only: ['implementation'],
  testing_only: ['testing'],
  quality_only: ['quality_validation'],
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class StageRegistry {
  private readonly _stages = new Map<StageName, StageDefinition>()

  constructor(definitions: readonly StageDefinition[] = []) {
    for (const def of definitions) this.register(def)
  }

  /** Add a stage, replacing any stage of the same name */
  register(definition: StageDefinition): void {
    this._stages.set(definition.name, definition)
  }

  has(name: StageName): boolean {
    return this._stages.has(name)
  }

  /**
   * @throws {UnknownStageError}
   */
  get(name: StageName): StageDefinition {
    const def = this._stages.get(name)
    if (def === undefined) throw new UnknownStageError(name)
    return def
  }

  list(): StageDefinition[] {
    return [...this._stages.values()]
  }

  /**
   * Check every registered stage's references and the stage graph.
   * @throws {UnknownStageError} for a dependency or `verifies` naming no stage
   * @throws {DependencyCycleError} when the stage graph contains a cycle
   */
  validate(): void {
    for (const def of this._stages.values()) {
      for (const dep of def.dependencies) {
        if (!this._stages.has(dep)) throw new UnknownStageError(dep, { dependent: def.name })
      }
      if (def.verifies !== undefined && !this._stages.has(def.verifies)) {
        throw new UnknownStageError(def.verifies, { verifier: def.name })
      }
    }
    const cycle = detectCycle(this.list().map((d) => ({ id: d.name, dependencies: d.dependencies })))
    if (cycle !== null) throw new DependencyCycleError(cycle)
  }

  /**
   * Order a subset of stages for execution. Dependencies outside the subset
   * are treated as satisfied.
   * @throws {UnknownStageError} for a name that is not registered
   */
  plan(names: readonly StageName[]): StageDefinition[] {
    for (const name of names) this.get(name)
    const inRun = new Set(names)
    // Registry order, so the chain order wins over the order of the request
    const selected = this.list().filter((d) => inRun.has(d.name))
    const ordered = topologicalOrder(
      selected.map((def) => ({ id: def.name, dependencies: def.dependencies.filter((d) => inRun.has(d)), def })),
    )
    return ordered.map((node) => node.def)
  }
}

/**
 * Apply `stages` overrides from configuration to a set of definitions.
 * @throws {UnknownStageError} for an override naming no stage
 */
export function applyStageOverrides(
  definitions: readonly StageDefinition[],
  overrides: Readonly<Record<StageName, StageOverride>>,
): StageDefinition[] {
  const names = new Set(definitions.map((d) => d.name))
  for (const name of Object.keys(overrides)) {
    if (!names.has(name)) throw new UnknownStageError(name, { source: 'config' })
  }
  return definitions.map((def) => {
    const override = overrides[def.name]
    if (override === undefined) return def
    return {
      ...def,
      strategy: override.strategy ?? def.strategy,
      defaultExecutor: override.default_executor ?? def.defaultExecutor,
      dispatchMode: override.dispatch_mode ?? def.dispatchMode,
    }
  })
}

export function createStageRegistry(overrides: Readonly<Record<StageName, StageOverride>> = {}): StageRegistry {
  return new StageRegistry(applyStageOverrides(createBuiltInStages(), overrides))
}
