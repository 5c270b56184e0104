/**
 * Types for the Feedback Decision Engine.
 *
 * Inputs (validation results) are zod schemas since they arrive from outside
 * the process; decisions are a tagged union on `action`, one variant per
 * outcome, each carrying only the fields that outcome needs.
 */

import { z } from 'zod'
import type { ExecutorId, LoopId, RunId, StageName, TaskId } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Validation result (input)
// ---------------------------------------------------------------------------

export const FailureRecordSchema = z.object({
  type: z.string().min(1),
  message: z.string().default(''),
  workOrderId: z.string().optional(),
  expected: z.unknown().optional(),
  actual: z.unknown().optional(),
  details: z.record(z.unknown()).default({}),
})
export type FailureRecord = z.infer<typeof FailureRecordSchema>
export type FailureRecordInput = z.input<typeof FailureRecordSchema>

export const ValidationResultSchema = z.object({
  success: z.boolean(),
  failures: z.array(FailureRecordSchema).default([]),
})
export type ValidationResult = z.infer<typeof ValidationResultSchema>
export type ValidationResultInput = z.input<typeof ValidationResultSchema>

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export type Severity = 'critical' | 'high' | 'medium' | 'low'

/** Whether a verification failure belongs to the artifact or to the verifier */
export type FailureOrigin = 'artifact' | 'verifier'

// ---------------------------------------------------------------------------
// Retry strategy
// ---------------------------------------------------------------------------

export type CriterionValue = string | number | boolean

export interface EscalationPolicy {
  /** failure keyword -> specialist executor, matched in declaration order */
  specialists: Readonly<Record<string, ExecutorId>>
  defaultExecutor: ExecutorId
  /** Tried in order when the specialist and default equal the current executor */
  fallbackExecutors: readonly ExecutorId[]
}

export interface RetryStrategy {
  maxAttempts: number
  backoffFactor: number
  timeoutMultiplier: number
  escalationThreshold: number
  /** Lower-case keywords; a substring match in the failure reason aborts */
  abortConditions: readonly string[]
  /** failure keyword -> remediation guidance */
  remediationHints: Readonly<Record<string, string>>
  /** Stage-level focus points always listed in a retry instruction */
  guidance: readonly string[]
  successCriteria: Readonly<Record<string, CriterionValue>>
  escalation: EscalationPolicy
}

export type StrategyMap = Readonly<Record<string, RetryStrategy>>

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

export interface ValidationRequirements {
  stage: StageName
  attempt: number
  previousFailures: number
  validationType: 'standard' | 'enhanced'
  timeoutSeconds: number
  failureSensitive: boolean
  successCriteria: Readonly<Record<string, CriterionValue>>
}

/** Fields shared by every decision that hands work to an executor */
export interface RemediationPlan {
  loopId: LoopId
  targetExecutor: ExecutorId
  augmentedInstruction: string
  validationRequirements: ValidationRequirements
  successCriteria: Readonly<Record<string, CriterionValue>>
  /** 0..1, two decimal places */
  confidence: number
  estimatedRemediationSeconds: number
  severity: Severity
  reasoning: string
}

export interface RetryDecision extends RemediationPlan {
  action: 'retry'
  /** Suggested wait before re-dispatch, from the strategy's backoff factor */
  retryAfterMs: number
}

export interface EscalateDecision extends RemediationPlan {
  action: 'escalate'
  previousLoopId: LoopId
  previousExecutor: ExecutorId
}

export type AbortTrigger =
  | 'max_attempts'
  | 'abort_condition'
  | 'time_ceiling'
  | 'escalation_exhausted'
  | 'no_alternate_executor'

export interface AbortDecision {
  action: 'abort'
  loopId: LoopId
  trigger: AbortTrigger
  severity: Severity
  confidence: number
  reasoning: string
}

export interface ContinueDecision {
  action: 'continue'
  loopId: LoopId
  reasoning: string
}

/** Outcome of routing a failure to another stage's loop */
export type RedirectedDecision = RetryDecision | EscalateDecision | AbortDecision

export interface RollbackDecision {
  action: 'rollback'
  /** The verifying stage's loop, left open while the producer remediates */
  loopId: LoopId
  targetStage: StageName
  redirectedLoopId: LoopId
  redirected: RedirectedDecision
  reasoning: string
}

export type FeedbackDecision =
  | RetryDecision
  | EscalateDecision
  | AbortDecision
  | ContinueDecision
  | RollbackDecision

export type FeedbackAction = FeedbackDecision['action']

// ---------------------------------------------------------------------------
// Operation inputs and reports
// ---------------------------------------------------------------------------

export interface RegisterLoopInput {
  runId: RunId
  stage: StageName
  executorId: ExecutorId
  workOrderId: TaskId
  originalInstruction: string
  /** Strategy key; defaults to the stage name */
  strategy?: string
  metadata?: Record<string, unknown>
}

export interface RouteToProducerInput {
  /** The verifying stage's active loop */
  verifierLoopId: LoopId
  producerStage: StageName
  producerExecutorId: ExecutorId
  producerWorkOrderId: TaskId
  producerInstruction: string
  /** Strategy key for the producer loop; defaults to the producer stage name */
  producerStrategy?: string
  validationResult: ValidationResultInput
  failureReason: string
}

export interface RunFeedbackStatus {
  runId: RunId
  activeLoops: number
  totalFailures: number
  totalRetries: number
  /** Share of closed loops that ended resolved; 0 when nothing has closed */
  successRate: number
  active: Array<{ loopId: LoopId; stage: StageName; executorId: ExecutorId; retryCount: number; failureReason: string }>
  recentHistory: Array<{
    loopId: LoopId
    stage: StageName
    executorId: ExecutorId
    retryCount: number
    outcome: string
    closedAt: string
  }>
}
