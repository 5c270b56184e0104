/**
 * QualityGate implementation.
 *
 * Runs the configured evaluator over a gate report and, on failure,
 * attaches a fix prompt for the executor that owns the gate.
 */

import type { QualityGate } from './gate.js'
import type { GateConfig, GateResult, GateViolation, QualityGateReport } from './types.js'

const MAX_PROMPT_VIOLATIONS = 5
const MAX_PROMPT_SUGGESTIONS = 3

export function violationText(violation: GateViolation): string {
  return typeof violation === 'string' ? violation : violation.message
}

/**
 * Build the remediation prompt for a failed gate.
 *
 * Only the first five violations and first three suggestions are listed.
 */
export function buildGateFixPrompt(report: QualityGateReport, passingScore: number): string {
  const lines: string[] = [
    `## Quality gate fix: ${report.gate}`,
    '',
    `Failure: ${report.message !== '' ? report.message : report.status}`,
    `Score: ${report.score.toFixed(1)} / 10`,
  ]

  const violations = report.violations.slice(0, MAX_PROMPT_VIOLATIONS)
  if (violations.length > 0) {
    lines.push('', '### Violations', ...violations.map((v) => `- ${violationText(v)}`))
  }

  const suggestions = report.suggestions.slice(0, MAX_PROMPT_SUGGESTIONS)
  if (suggestions.length > 0) {
    lines.push('', '### Suggestions', ...suggestions.map((s) => `- ${s}`))
  }

  lines.push(
    '',
    '### Requirements',
    '- Resolve every violation listed above.',
    `- Reach a ${report.gate} score of at least ${passingScore.toFixed(1)}.`,
    '- Keep existing behaviour intact.',
  )
  return lines.join('\n')
}

/**
 * Concrete implementation of QualityGate.
 */
export class QualityGateImpl implements QualityGate {
  readonly config: GateConfig
  private readonly _passingScore: number

  constructor(config: GateConfig, passingScore: number) {
    this.config = config
    this._passingScore = passingScore
  }

  get name(): string {
    return this.config.name
  }

  evaluate(report: QualityGateReport): GateResult {
    const evaluation = this.config.evaluator(report)
    const base = {
      gate: this.config.name,
      passed: evaluation.pass,
      executorId: this.config.executorId,
      issues: evaluation.issues,
      severity: evaluation.severity,
    }
    if (evaluation.pass) return base
    return { ...base, fixPrompt: buildGateFixPrompt(report, this._passingScore) }
  }
}

/**
 * Factory function to create a QualityGate instance from config.
 */
export function createQualityGate(config: GateConfig, passingScore: number): QualityGate {
  return new QualityGateImpl(config, passingScore)
}
