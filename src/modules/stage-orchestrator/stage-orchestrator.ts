/**
 * StageOrchestrator interface.
 *
 * Runs the selected stages in dependency order, one at a time. Each stage is
 * dispatched through the PipelineScheduler, validated work order by work
 * order, and every failure is decided by the FeedbackEngine.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { StageName } from '../../core/types.js'
import type { FeedbackEngine } from '../feedback-engine/index.js'
import type { PipelineScheduler } from '../pipeline-scheduler/index.js'
import type { StageRegistry } from './built-in-stages.js'
import type { RunRequest, RunResult, StageDefinition, StagePlanner, StageValidator } from './types.js'

export interface StageOrchestratorOptions {
  engine: FeedbackEngine
  scheduler: PipelineScheduler
  /** Defaults to the built-in stages */
  stages?: StageRegistry
  /** Per-stage planners; stages without one use defaultStagePlanner */
  planners?: Readonly<Record<StageName, StagePlanner>>
  /** Per-stage validators */
  validators?: Readonly<Record<StageName, StageValidator>>
  /** Validator for stages without their own; accepts every delivered work order by default */
  defaultValidator?: StageValidator
  /** Maximum dispatches of one stage within a run (default 3) */
  stageEntryCeiling?: number
  eventBus?: TypedEventBus
  now?: () => Date
}

export interface StageOrchestrator {
  /**
   * Run a pipeline to completion or to its first terminal stage failure.
   * @throws {UnknownStageError} for an unknown stage or stage reference
   * @throws {DependencyCycleError} when the stage graph contains a cycle
   * @throws {MissingStrategyError} when a selected stage's strategy is not configured
   */
  runPipeline(request: RunRequest): Promise<RunResult>

  /** Registered stage definitions */
  getStages(): StageDefinition[]
}
