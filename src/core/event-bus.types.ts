/**
 * RelayEvents: the typed event map carried by the event bus.
 *
 * Event naming convention: {module}:{action}. Payloads use plain string
 * unions rather than module types so this file imports nothing from modules.
 */

import type { ExecutorId, LoopId, RunId, StageName, TaskId } from './types.js'

export type FeedbackActionName = 'retry' | 'escalate' | 'abort' | 'continue' | 'rollback'
export type LoopOutcomeName = 'resolved' | 'aborted' | 'escalated' | 'expired'

export interface RelayEvents {
  // -------------------------------------------------------------------------
  // Relay lifecycle
  // -------------------------------------------------------------------------

  'relay:ready': { stages: StageName[] }

  'relay:shutdown': { reason: string }

  // -------------------------------------------------------------------------
  // Scheduler
  // -------------------------------------------------------------------------

  /** A PipelineRun finished dispatching */
  'pipeline:dispatched': {
    runId: RunId
    mode: 'parallel' | 'sequential' | 'dependency_graph'
    label?: string
    successCount: number
    failureCount: number
    elapsedMs: number
  }

  /** Instruction production failed for one work order */
  'workorder:failed': {
    runId: RunId
    taskId: TaskId
    executorId: ExecutorId
    error: string
  }

  // -------------------------------------------------------------------------
  // Feedback engine
  // -------------------------------------------------------------------------

  'feedback:registered': {
    loopId: LoopId
    runId: RunId
    stage: StageName
    executorId: ExecutorId
    workOrderId: TaskId
  }

  'feedback:decided': {
    loopId: LoopId
    runId: RunId
    stage: StageName
    action: FeedbackActionName
    retryCount: number
    targetExecutor?: ExecutorId
  }

  /** A loop left the active set */
  'feedback:closed': {
    loopId: LoopId
    runId: RunId
    stage: StageName
    outcome: LoopOutcomeName
  }

  // -------------------------------------------------------------------------
  // Stage orchestrator
  // -------------------------------------------------------------------------

  'stage:started': { runId: RunId; stage: StageName; attempt: number }

  'stage:completed': { runId: RunId; stage: StageName; attempt: number }

  'stage:failed': {
    runId: RunId
    stage: StageName
    reason: 'unresolved_loops' | 'no_recourse'
    detail: string
  }

  /** A verification stage was suspended while its producer remediates */
  'stage:suspended': { runId: RunId; stage: StageName; redirectedTo: StageName }

  'run:completed': {
    runId: RunId
    status: 'completed' | 'failed'
    requiresManualIntervention: boolean
  }
}
