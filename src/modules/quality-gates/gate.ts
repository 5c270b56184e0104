/**
 * QualityGate interface definition.
 *
 * A quality gate judges one gate report, names the executor responsible
 * for fixing it, and writes the fix prompt when it fails.
 */

import type { GateConfig, GateResult, QualityGateReport } from './types.js'

export interface QualityGate {
  /** Name of this gate (from config) */
  readonly name: string
  /**
   * Evaluate a report for this gate.
   * - pass → `{ passed: true }`
   * - fail → `{ passed: false, fixPrompt }`
   */
  evaluate(report: QualityGateReport): GateResult
  readonly config: GateConfig
}
