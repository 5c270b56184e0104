/**
 * Gate Registry: maps gate names to the executors that fix them.
 *
 * Every gate uses the status evaluator unless a custom evaluator has been
 * registered for its name. Gates missing from the routing table go to the
 * default executor.
 */

import type { QualityGatesConfig } from '../config/index.js'
import type { QualityGate } from './gate.js'
import { createQualityGate, violationText } from './gate-impl.js'
import type { EvaluatorFn, GateEvaluation, GateRouting, QualityGateReport } from './types.js'

// ---------------------------------------------------------------------------
// Built-in evaluator
// ---------------------------------------------------------------------------

/** `passed` and `warning` pass; `failed` and `blocked` do not */
export function statusEvaluator(report: QualityGateReport): GateEvaluation {
  const issues = report.violations.map(violationText)
  switch (report.status) {
    case 'passed':
      return { pass: true, issues, severity: 'info' }
    case 'warning':
      return { pass: true, issues, severity: 'warning' }
    case 'failed':
    case 'blocked':
      return {
        pass: false,
        issues: issues.length > 0 ? issues : [report.message !== '' ? report.message : `${report.gate} ${report.status}`],
        severity: 'error',
      }
  }
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class GateRegistry {
  private readonly _routing: GateRouting
  private readonly _evaluators = new Map<string, EvaluatorFn>()

  constructor(routing: GateRouting) {
    this._routing = routing
  }

  get passingScore(): number {
    return this._routing.passingScore
  }

  /** Replace the status evaluator for one gate name */
  registerEvaluator(gate: string, evaluator: EvaluatorFn): void {
    this._evaluators.set(gate, evaluator)
  }

  executorFor(gate: string): string {
    return Object.hasOwn(this._routing.executors, gate)
      ? this._routing.executors[gate]
      : this._routing.defaultExecutor
  }

  getGate(gate: string): QualityGate {
    return createQualityGate(
      {
        name: gate,
        executorId: this.executorFor(gate),
        evaluator: this._evaluators.get(gate) ?? statusEvaluator,
      },
      this._routing.passingScore,
    )
  }

  /** Gate names with an explicit executor */
  getKnownGates(): string[] {
    return Object.keys(this._routing.executors)
  }
}

export function createGateRegistry(config: QualityGatesConfig): GateRegistry {
  return new GateRegistry({
    executors: config.executors,
    defaultExecutor: config.default_executor,
    passingScore: config.passing_score,
  })
}
