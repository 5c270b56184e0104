/**
 * Unit tests for config-schema.ts
 */

import { describe, it, expect } from 'vitest'
import {
  StrategyConfigSchema,
  PartialTaskRelayConfigSchema,
  QualityGatesConfigSchema,
} from '../config-schema.js'

const validStrategy = {
  max_attempts: 3,
  backoff_factor: 1.5,
  timeout_multiplier: 1.2,
  escalation_threshold: 2,
  abort_conditions: ['fatal_error'],
  remediation_hints: { import_error: 'Check imports.' },
  guidance: ['Read the failure output.'],
  success_criteria: { all_tests_pass: true, coverage_threshold: '>= 80%', max_warnings: 0 },
  escalation: { specialists: {}, default_executor: 'code-reviewer', fallback_executors: [] },
}

describe('StrategyConfigSchema', () => {
  it('accepts a complete strategy', () => {
    expect(StrategyConfigSchema.safeParse(validStrategy).success).toBe(true)
  })

  it('rejects a backoff factor below 1', () => {
    expect(StrategyConfigSchema.safeParse({ ...validStrategy, backoff_factor: 0.5 }).success).toBe(false)
  })

  it('rejects zero attempts', () => {
    expect(StrategyConfigSchema.safeParse({ ...validStrategy, max_attempts: 0 }).success).toBe(false)
  })

  it('rejects unknown fields', () => {
    expect(StrategyConfigSchema.safeParse({ ...validStrategy, jitter: true }).success).toBe(false)
  })
})

describe('PartialTaskRelayConfigSchema', () => {
  it('accepts a single nested field', () => {
    const result = PartialTaskRelayConfigSchema.safeParse({ strategies: { testing: { max_attempts: 6 } } })
    expect(result.success).toBe(true)
  })

  it('accepts a partial escalation policy', () => {
    const result = PartialTaskRelayConfigSchema.safeParse({
      strategies: { testing: { escalation: { default_executor: 'qa-lead' } } },
    })
    expect(result.success).toBe(true)
  })

  it('rejects an unknown top-level section', () => {
    expect(PartialTaskRelayConfigSchema.safeParse({ providers: {} }).success).toBe(false)
  })

  it('rejects an unsupported format version', () => {
    expect(PartialTaskRelayConfigSchema.safeParse({ config_format_version: '2' }).success).toBe(false)
  })
})

describe('QualityGatesConfigSchema', () => {
  it('bounds the passing score to 0..10', () => {
    const base = { default_executor: 'code-reviewer', executors: {} }
    expect(QualityGatesConfigSchema.safeParse({ ...base, passing_score: 8 }).success).toBe(true)
    expect(QualityGatesConfigSchema.safeParse({ ...base, passing_score: 11 }).success).toBe(false)
  })
})
