/**
 * GatePipeline: runs every gate report through its gate.
 *
 * Unlike a short-circuiting chain, every report is evaluated so one pass
 * collects all failing gates. Each failure becomes a FailureRecord for the
 * feedback engine and a remediation entry for the gate's executor.
 */

import { z } from 'zod'
import { ConfigurationError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { FailureRecord, ValidationResult } from '../feedback-engine/types.js'
import type { WorkOrder } from '../work-order/index.js'
import type { GateRegistry } from './gate-registry.js'
import {
  QualityGateReportSchema,
  type GatePipelineResult,
  type GateRemediation,
  type GateResult,
  type QualityGateReport,
  type QualityGateReportInput,
} from './types.js'

const logger = createLogger('quality-gates')

const GateReportListSchema = z.array(QualityGateReportSchema)

/** Failure record type for a failed gate, e.g. `security_gate_blocked` */
export function gateFailureType(report: QualityGateReport): string {
  return `${report.gate}_gate_${report.status}`
}

export interface GatePipeline {
  /**
   * Evaluate all reports.
   * @throws {ConfigurationError} if a report does not match the report schema
   */
  run(reports: readonly QualityGateReportInput[]): GatePipelineResult
}

/**
 * Concrete GatePipeline implementation.
 */
export class GatePipelineImpl implements GatePipeline {
  private readonly _registry: GateRegistry

  constructor(registry: GateRegistry) {
    this._registry = registry
  }

  run(reports: readonly QualityGateReportInput[]): GatePipelineResult {
    const parsed = GateReportListSchema.safeParse(reports)
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
      throw new ConfigurationError(`Invalid quality gate report: ${issues.join('; ')}`, { issues })
    }

    const results: GateResult[] = []
    const failures: FailureRecord[] = []
    const remediations: GateRemediation[] = []

    for (const report of parsed.data) {
      const result = this._registry.getGate(report.gate).evaluate(report)
      results.push(result)
      if (result.passed || result.fixPrompt === undefined) continue

      failures.push({
        type: gateFailureType(report),
        message: result.issues.join('; '),
        details: {
          gate: report.gate,
          status: report.status,
          score: report.score,
          executorId: result.executorId,
          fixPrompt: result.fixPrompt,
        },
      })
      remediations.push({ gate: report.gate, executorId: result.executorId, fixPrompt: result.fixPrompt })
    }

    const gatesPassed = results.filter((r) => r.passed).length
    logger.debug({ gatesRun: results.length, gatesPassed }, 'Quality gates evaluated')

    return {
      passed: failures.length === 0,
      gatesRun: results.length,
      gatesPassed,
      results,
      failures,
      remediations,
    }
  }
}

/**
 * Factory function to create a GatePipeline over a registry.
 */
export function createGatePipeline(registry: GateRegistry): GatePipeline {
  return new GatePipelineImpl(registry)
}

// ---------------------------------------------------------------------------
// Stage validation
// ---------------------------------------------------------------------------

/** Where a gate stage finds the reports for one of its work orders */
export type GateReportSource = (order: WorkOrder) => unknown

/** Reads `result.gates` from the work order's reported result */
export const resultGateReports: GateReportSource = (order) => order.result?.gates

/**
 * Build a per-work-order validator for a gate stage. Missing or malformed
 * reports fail validation instead of throwing, since they come from an
 * executor rather than from configuration.
 */
export function createGateValidator(
  pipeline: GatePipeline,
  source: GateReportSource = resultGateReports,
): (order: WorkOrder) => ValidationResult {
  return (order) => {
    const raw = source(order)
    const reports = GateReportListSchema.safeParse(raw)
    if (!reports.success || reports.data.length === 0) {
      return {
        success: false,
        failures: [
          {
            type: 'gate_report_missing',
            message: `No usable quality gate reports for ${order.taskId}`,
            workOrderId: order.taskId,
            details: {},
          },
        ],
      }
    }
    const result = pipeline.run(reports.data)
    return {
      success: result.passed,
      failures: result.failures.map((f) => ({ ...f, workOrderId: order.taskId })),
    }
  }
}
