/**
 * Failure classification rule tables.
 *
 * Both tables are ordered: the first matching rule wins. Callers may pass
 * their own table to the classify functions.
 */

import type { FailureOrigin, FailureRecord, FailureRecordInput, Severity, ValidationResult } from './types.js'

/** Lower-case and join words with underscores so "Data loss" matches "data_loss" */
export function normalizeText(text: string): string {
  return text.trim().toLowerCase().replace(/[\s-]+/g, '_')
}

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword))
}

// ---------------------------------------------------------------------------
// Severity
// ---------------------------------------------------------------------------

export interface SeverityRule {
  severity: Severity
  keywords: readonly string[]
}

export const SEVERITY_RULES: readonly SeverityRule[] = [
  { severity: 'critical', keywords: ['security', 'vulnerability', 'data_loss', 'corruption'] },
  { severity: 'high', keywords: ['crash', 'exception', 'error', 'failure', 'timeout'] },
  { severity: 'medium', keywords: ['warning', 'deprecated', 'slow', 'performance'] },
]

export function classifySeverity(failureReason: string, rules: readonly SeverityRule[] = SEVERITY_RULES): Severity {
  const text = normalizeText(failureReason)
  return rules.find((rule) => containsAny(text, rule.keywords))?.severity ?? 'low'
}

// ---------------------------------------------------------------------------
// Failure origin (cross-stage routing)
// ---------------------------------------------------------------------------

export interface OriginRule {
  name: string
  origin: FailureOrigin
  /** `text` is the normalized type and message of the record */
  matches(record: FailureRecordInput, text: string): boolean
}

const ARTIFACT_KEYWORDS = [
  'assertion_error',
  'logic_error',
  'return_value_error',
  'behavior_mismatch',
  'expected_vs_actual',
  'function_not_working',
  'incorrect_result',
]

const VERIFIER_KEYWORDS = [
  'test_setup_error',
  'test_framework_error',
  'invalid_test_case',
  'test_configuration_error',
  'mock_error',
  'setup_error',
  'framework_error',
  'configuration_error',
]

function hasExpectedAndActual(record: FailureRecordInput): boolean {
  if (record.expected !== undefined && record.actual !== undefined) return true
  const details = record.details
  return details !== undefined && details['expected'] !== undefined && details['actual'] !== undefined
}

export const ORIGIN_RULES: readonly OriginRule[] = [
  {
    name: 'expected_actual_pair',
    origin: 'artifact',
    matches: (record) => hasExpectedAndActual(record),
  },
  {
    name: 'artifact_keyword',
    origin: 'artifact',
    matches: (_record, text) => containsAny(text, ARTIFACT_KEYWORDS),
  },
  {
    name: 'verifier_keyword',
    origin: 'verifier',
    matches: (_record, text) => containsAny(text, VERIFIER_KEYWORDS),
  },
  {
    name: 'expected_actual_mention',
    origin: 'artifact',
    matches: (_record, text) => text.includes('expected') && text.includes('actual'),
  },
  {
    // Anything unrecognised is charged to the verifier; see DESIGN.md.
    name: 'ambiguous_default',
    origin: 'verifier',
    matches: () => true,
  },
]

/** Return the first rule that matches, so callers can log which one fired */
export function matchOriginRule(
  record: FailureRecordInput,
  rules: readonly OriginRule[] = ORIGIN_RULES,
): OriginRule | undefined {
  const text = normalizeText(`${record.type} ${record.message ?? ''}`)
  return rules.find((rule) => rule.matches(record, text))
}

export function classifyFailureOrigin(
  record: FailureRecordInput,
  rules: readonly OriginRule[] = ORIGIN_RULES,
): FailureOrigin {
  return matchOriginRule(record, rules)?.origin ?? 'verifier'
}

// ---------------------------------------------------------------------------
// Failure reason
// ---------------------------------------------------------------------------

export function describeFailure(record: FailureRecord): string {
  return record.message === '' ? record.type : `${record.type}: ${record.message}`
}

/** One-line reason summarising every failure in a validation result */
export function describeFailures(validation: ValidationResult): string {
  if (validation.failures.length === 0) {
    return validation.success ? '' : 'validation failed'
  }
  return validation.failures.map(describeFailure).join('; ')
}
