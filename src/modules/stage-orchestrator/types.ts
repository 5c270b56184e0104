/**
 * Types for the Stage Orchestrator module.
 *
 * Defines stage definitions, the pluggable planning and validation hooks,
 * and the per-stage and per-run results.
 */

import { z } from 'zod'
import type { ExecutorId, LoopId, RunId, StageName, TaskId } from '../../core/types.js'
import type { RunFeedbackStatus, ValidationResult, ValidationResultInput } from '../feedback-engine/index.js'
import type { DispatchMode, PipelineRun } from '../pipeline-scheduler/index.js'
import type { WorkOrder, WorkOrderInput } from '../work-order/index.js'

// ---------------------------------------------------------------------------
// StageDefinition
// ---------------------------------------------------------------------------

export const StageKindEnum = z.enum(['production', 'verification', 'gate'])

/**
 * - production: creates an artifact
 * - verification: checks the artifact of the stage named in `verifies`
 * - gate: evaluates quality gate reports
 */
export type StageKind = z.infer<typeof StageKindEnum>

export interface StageDefinition {
  /** Unique name for this stage (e.g., 'implementation', 'testing') */
  name: StageName
  description: string
  kind: StageKind
  /** Stages that must be COMPLETED before this one starts */
  dependencies: readonly StageName[]
  dispatchMode: DispatchMode
  /** Retry strategy key */
  strategy: string
  /** Producing stage whose artifact a verification stage checks */
  verifies?: StageName
  /** Executor for planned work orders that name none */
  defaultExecutor: ExecutorId
}

export const PipelinePresetEnum = z.enum(['full', 'implementation_only', 'testing_only', 'quality_only'])
export type PipelinePreset = z.infer<typeof PipelinePresetEnum>

// ---------------------------------------------------------------------------
// Stage state
// ---------------------------------------------------------------------------

export type StageStatus = 'pending' | 'running' | 'completed' | 'failed' | 'suspended'

/**
 * unresolved_loops: the entry ceiling was hit while loops were still open
 * no_recourse: the feedback engine aborted
 */
export type StageFailureKind = 'unresolved_loops' | 'no_recourse'

export interface StageResult {
  stage: StageName
  status: StageStatus
  failureKind?: StageFailureKind
  /** Loop-bound work orders of the latest attempt */
  workOrders: WorkOrder[]
  /** Latest validation result per work order */
  validation: Record<TaskId, ValidationResult>
  /** Every feedback loop this stage opened or inherited */
  loopIds: LoopId[]
  /** Dispatches after the first */
  retryCount: number
  /** Dispatches of this stage, across re-entries */
  entries: number
}

// ---------------------------------------------------------------------------
// Hooks
// ---------------------------------------------------------------------------

export interface PlanContext {
  runId: RunId
  stage: StageDefinition
  request: RunRequest
  /** Results of every stage that has completed so far */
  upstream: ReadonlyMap<StageName, StageResult>
}

/** A planned work order; `verifies` names the producer work order it checks */
export interface PlannedWorkOrder {
  input: WorkOrderInput
  verifies?: TaskId
}

/** Builds the work orders for a stage's first entry */
export type StagePlanner = (context: PlanContext) => PlannedWorkOrder[] | Promise<PlannedWorkOrder[]>

export interface ValidationContext {
  runId: RunId
  stage: StageDefinition
  /** 1-based dispatch number of the stage */
  attempt: number
  run: PipelineRun
}

/**
 * Judges one dispatched work order. Executors report back through this hook;
 * a thrown error counts as a failed validation.
 */
export type StageValidator = (
  order: WorkOrder,
  context: ValidationContext,
) => ValidationResultInput | Promise<ValidationResultInput>

// ---------------------------------------------------------------------------
// Run request and result
// ---------------------------------------------------------------------------

export interface RunRequest {
  /** Generated when omitted */
  runId?: RunId
  /** Task description handed to the default planner */
  task: string
  /** Explicit stage list; takes precedence over `preset` */
  stages?: readonly StageName[]
  /** Defaults to 'full' */
  preset?: PipelinePreset
  /** Explicit work orders per stage, used instead of the default plan */
  workOrders?: Readonly<Record<StageName, readonly WorkOrderInput[]>>
}

export type RunStatus = 'completed' | 'failed'

export interface RunResult {
  runId: RunId
  status: RunStatus
  requiresManualIntervention: boolean
  /** In execution order; stages never reached stay pending */
  stages: StageResult[]
  failedStage?: StageName
  /** Rendered remediation for every loop left unresolved by a terminal failure */
  remediationInstructions: string[]
  feedbackSummary: RunFeedbackStatus
  nextSteps: string[]
  elapsedMs: number
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export const DEFAULT_STAGE_ENTRY_CEILING = 3
