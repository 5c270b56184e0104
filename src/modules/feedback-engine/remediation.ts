/**
 * Remediation text: augmented retry instructions, escalation instructions
 * and the rendered form of a decision.
 */

import { formatDuration } from '../../utils/helpers.js'
import { renderInvocation } from '../pipeline-scheduler/instruction-batch.js'
import type { FeedbackContext } from '../state-store/types.js'
import { describeFailure, normalizeText } from './classification.js'
import type {
  CriterionValue,
  FeedbackDecision,
  RemediationPlan,
  RetryStrategy,
  Severity,
} from './types.js'

export const BASE_SUCCESS_CRITERIA: Readonly<Record<string, CriterionValue>> = {
  execution_success: true,
  no_critical_errors: true,
  validation_passed: true,
}

const SEVERITY_NOTES: Record<Severity, string> = {
  critical: 'Blocking. Fix this before touching anything else.',
  high: 'The work does not run as delivered.',
  medium: 'The work runs but falls short of the required standard.',
  low: 'Minor; a targeted fix should be enough.',
}

export function successCriteriaFor(strategy: RetryStrategy): Record<string, CriterionValue> {
  return { ...BASE_SUCCESS_CRITERIA, ...strategy.successCriteria }
}

/** Hints whose keyword appears in the failure reason, in table order */
export function matchRemediationHints(strategy: RetryStrategy, failureReason: string): string[] {
  const text = normalizeText(failureReason)
  return Object.entries(strategy.remediationHints)
    .filter(([keyword]) => text.includes(normalizeText(keyword)))
    .map(([, hint]) => hint)
}

function formatCriteria(criteria: Readonly<Record<string, CriterionValue>>): string[] {
  return Object.entries(criteria).map(([name, value]) => `- ${name}: ${String(value)}`)
}

function formatValidationFailures(context: FeedbackContext): string[] {
  const failures = context.validationResult?.failures ?? []
  if (failures.length === 0) return ['- none reported']
  return failures.map((failure) => {
    const line = `- ${describeFailure(failure)}`
    if (failure.expected === undefined && failure.actual === undefined) return line
    return `${line} (expected ${JSON.stringify(failure.expected)}, actual ${JSON.stringify(failure.actual)})`
  })
}

// ---------------------------------------------------------------------------
// Instructions handed to executors
// ---------------------------------------------------------------------------

export function buildRetryInstruction(
  context: FeedbackContext,
  strategy: RetryStrategy,
  severity: Severity,
): string {
  const lines = [
    '## Previous attempt failed',
    '',
    `Failure: ${context.failureReason}`,
    `Attempt: ${String(context.retryCount + 1)} of ${String(strategy.maxAttempts)}`,
    `Severity: ${severity}. ${SEVERITY_NOTES[severity]}`,
    '',
    '### Validation failures',
    ...formatValidationFailures(context),
  ]

  if (strategy.guidance.length > 0) {
    lines.push('', `### Focus for the ${context.stage} stage`, ...strategy.guidance.map((g) => `- ${g}`))
  }

  const hints = matchRemediationHints(strategy, context.failureReason)
  if (hints.length > 0) {
    lines.push('', '### Specific fixes', ...hints.map((h) => `- ${h}`))
  }

  lines.push(
    '',
    '### Success criteria',
    ...formatCriteria(successCriteriaFor(strategy)),
    '',
    '---',
    '',
    '## Original task',
    '',
    context.originalInstruction,
  )
  return lines.join('\n')
}

export function buildEscalationInstruction(
  context: FeedbackContext,
  strategy: RetryStrategy,
  targetExecutor: string,
): string {
  const history = context.failureHistory.map(
    (snapshot) => `${String(snapshot.attempt)}. ${snapshot.executorId}: ${snapshot.reason}`,
  )

  return [
    '## Escalated task',
    '',
    `Previous executor: ${context.executorId}`,
    `Assigned executor: ${targetExecutor}`,
    `Reason: ${String(context.retryCount)} failed attempts in the ${context.stage} stage`,
    '',
    '### Failure history',
    ...(history.length > 0 ? history : ['(none recorded)']),
    '',
    '### Latest validation failures',
    ...formatValidationFailures(context),
    '',
    '### Expectations',
    '- Find the root cause before changing code; earlier fixes did not hold.',
    '- Review the design around the failure, not only the failing line.',
    '- Do not merely patch the symptom.',
    '',
    '### Success criteria',
    ...formatCriteria(successCriteriaFor(strategy)),
    '',
    '---',
    '',
    '## Original task',
    '',
    context.originalInstruction,
  ].join('\n')
}

// ---------------------------------------------------------------------------
// Decision rendering
// ---------------------------------------------------------------------------

function renderPlan(plan: RemediationPlan, extra: string[]): string[] {
  const req = plan.validationRequirements
  return [
    `Target executor: ${plan.targetExecutor}`,
    `Confidence: ${plan.confidence.toFixed(2)}`,
    `Estimated remediation time: ${formatDuration(plan.estimatedRemediationSeconds * 1000)}`,
    ...extra,
    `Reasoning: ${plan.reasoning}`,
    '',
    '## Validation requirements',
    `- stage: ${req.stage}`,
    `- attempt: ${String(req.attempt)}`,
    `- validation type: ${req.validationType}`,
    `- timeout: ${String(req.timeoutSeconds)}s`,
    `- previous failures: ${String(req.previousFailures)}`,
    '',
    '## Success criteria',
    ...formatCriteria(plan.successCriteria),
    '',
    renderInvocation({
      taskId: plan.loopId,
      executorId: plan.targetExecutor,
      instruction: plan.augmentedInstruction,
    }),
  ]
}

function renderBody(decision: FeedbackDecision): string[] {
  switch (decision.action) {
    case 'retry':
      return renderPlan(decision, [`Retry after: ${formatDuration(decision.retryAfterMs)}`])
    case 'escalate':
      return renderPlan(decision, [`Escalated from: ${decision.previousExecutor} (loop ${decision.previousLoopId})`])
    case 'abort':
      return [
        `Trigger: ${decision.trigger}`,
        `Severity: ${decision.severity}`,
        `Reasoning: ${decision.reasoning}`,
        'No executor is assigned. Manual intervention is required.',
      ]
    case 'continue':
      return [`Reasoning: ${decision.reasoning}`]
    case 'rollback':
      return [
        `Target stage: ${decision.targetStage}`,
        `Redirected loop: ${decision.redirectedLoopId}`,
        `Reasoning: ${decision.reasoning}`,
        '',
        `# Redirected decision: ${decision.redirected.action}`,
        ...renderBody(decision.redirected),
      ]
  }
}

/** Human-readable document for a decision; ends with the executor invocation when there is one */
export function renderDecision(decision: FeedbackDecision): string {
  return [`# Feedback decision: ${decision.action} (loop ${decision.loopId})`, ...renderBody(decision)].join('\n') + '\n'
}
