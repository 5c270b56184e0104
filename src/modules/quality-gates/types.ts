/**
 * Shared types for the Quality Gates module.
 */

import { z } from 'zod'
import type { ExecutorId } from '../../core/types.js'
import type { FailureRecord } from '../feedback-engine/types.js'

// ---------------------------------------------------------------------------
// Gate report (input)
// ---------------------------------------------------------------------------

export const GateStatusEnum = z.enum(['passed', 'warning', 'failed', 'blocked'])
export type GateStatus = z.infer<typeof GateStatusEnum>

export const GateViolationSchema = z.union([
  z.string(),
  z.object({ message: z.string() }).passthrough(),
])
export type GateViolation = z.infer<typeof GateViolationSchema>

/** One gate's verdict as reported by the checking executor */
export const QualityGateReportSchema = z.object({
  gate: z.string().min(1),
  status: GateStatusEnum,
  /** 0..10 */
  score: z.number().min(0).max(10),
  message: z.string().default(''),
  violations: z.array(GateViolationSchema).default([]),
  suggestions: z.array(z.string()).default([]),
})
export type QualityGateReport = z.infer<typeof QualityGateReportSchema>
export type QualityGateReportInput = z.input<typeof QualityGateReportSchema>

// ---------------------------------------------------------------------------
// Evaluator
// ---------------------------------------------------------------------------

/**
 * Result of running a gate evaluator against a report.
 */
export interface GateEvaluation {
  pass: boolean
  issues: string[]
  severity: 'info' | 'warning' | 'error'
}

/**
 * Function that evaluates a report and returns a GateEvaluation.
 */
export type EvaluatorFn = (report: QualityGateReport) => GateEvaluation

// ---------------------------------------------------------------------------
// Gate configuration
// ---------------------------------------------------------------------------

export interface GateConfig {
  /** Gate name as it appears in reports */
  name: string
  /** Executor that receives this gate's remediation work */
  executorId: ExecutorId
  evaluator: EvaluatorFn
}

/**
 * Routing for gates, taken from the `quality_gates` config section.
 */
export interface GateRouting {
  /** gate name -> responsible executor */
  executors: Readonly<Record<string, ExecutorId>>
  /** Executor for gates without an entry in `executors` */
  defaultExecutor: ExecutorId
  /** Target score quoted in fix prompts */
  passingScore: number
}

// ---------------------------------------------------------------------------
// Gate result
// ---------------------------------------------------------------------------

/**
 * Result of evaluating one report through its gate.
 */
export interface GateResult {
  gate: string
  passed: boolean
  executorId: ExecutorId
  issues: string[]
  severity: GateEvaluation['severity']
  /** Set when the gate failed */
  fixPrompt?: string
}

// ---------------------------------------------------------------------------
// Pipeline result
// ---------------------------------------------------------------------------

export interface GateRemediation {
  gate: string
  executorId: ExecutorId
  fixPrompt: string
}

/**
 * Overall result of running a GatePipeline over a set of reports.
 */
export interface GatePipelineResult {
  passed: boolean
  /** Number of reports evaluated */
  gatesRun: number
  gatesPassed: number
  results: GateResult[]
  /** One failure record per failed gate, ready for the feedback engine */
  failures: FailureRecord[]
  remediations: GateRemediation[]
}
