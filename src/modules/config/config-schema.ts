/**
 * Zod validation schemas for the taskrelay configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - per-stage overrides
 *  - retry strategies (one per strategy key)
 *  - quality gate routing
 *  - full config document
 *
 * Keys are snake_case as written in YAML; `toStrategies()` converts the
 * strategy section into the engine's camelCase `RetryStrategy` objects.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Concurrent instruction productions per parallel dispatch */
    worker_pool_size: z.number().int().min(1).max(256),
    production_timeout_ms: z.number().int().positive(),
    /** Times a single stage may be entered in one run */
    stage_retry_ceiling: z.number().int().min(1),
    /** A loop older than this aborts on its next failure */
    loop_time_ceiling_ms: z.number().int().positive(),
    loop_max_age_hours: z.number().positive(),
    history_retention_hours: z.number().positive(),
    /** ':memory:' keeps state for the life of the process only */
    state_db_path: z.string().min(1),
    base_retry_delay_ms: z.number().int().min(0),
    base_validation_timeout_seconds: z.number().positive(),
    abort_conditions: z.array(z.string().min(1)),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Retry strategies
// ---------------------------------------------------------------------------

export const CriterionValueSchema = z.union([z.string(), z.number(), z.boolean()])

export const EscalationConfigSchema = z
  .object({
    /** failure keyword -> specialist executor, matched in declaration order */
    specialists: z.record(z.string().min(1)),
    default_executor: z.string().min(1),
    fallback_executors: z.array(z.string().min(1)),
  })
  .strict()

export type EscalationConfig = z.infer<typeof EscalationConfigSchema>

export const StrategyConfigSchema = z
  .object({
    max_attempts: z.number().int().min(1),
    backoff_factor: z.number().min(1),
    timeout_multiplier: z.number().min(1),
    escalation_threshold: z.number().int().min(1),
    abort_conditions: z.array(z.string().min(1)),
    remediation_hints: z.record(z.string()),
    guidance: z.array(z.string()),
    success_criteria: z.record(CriterionValueSchema),
    escalation: EscalationConfigSchema,
  })
  .strict()
  .refine((s) => s.escalation_threshold <= s.max_attempts, {
    message: 'escalation_threshold must not exceed max_attempts',
    path: ['escalation_threshold'],
  })

export type StrategyConfig = z.infer<typeof StrategyConfigSchema>

// ---------------------------------------------------------------------------
// Stage overrides
// ---------------------------------------------------------------------------

export const DispatchModeConfigSchema = z.enum(['parallel', 'sequential', 'dependency_graph'])

export const StageOverrideSchema = z
  .object({
    /** Strategy key under `strategies` */
    strategy: z.string().min(1).optional(),
    default_executor: z.string().min(1).optional(),
    dispatch_mode: DispatchModeConfigSchema.optional(),
  })
  .strict()

export type StageOverride = z.infer<typeof StageOverrideSchema>

// ---------------------------------------------------------------------------
// Quality gates
// ---------------------------------------------------------------------------

export const QualityGatesConfigSchema = z
  .object({
    /** Minimum score a gate must reach for its fix prompt's target */
    passing_score: z.number().min(0).max(10),
    default_executor: z.string().min(1),
    /** gate name -> executor responsible for its remediation */
    executors: z.record(z.string().min(1)),
  })
  .strict()

export type QualityGatesConfig = z.infer<typeof QualityGatesConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const TaskRelayConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION),
    global: GlobalSettingsSchema,
    stages: z.record(StageOverrideSchema),
    strategies: z.record(StrategyConfigSchema),
    quality_gates: QualityGatesConfigSchema,
  })
  .strict()
  .superRefine((config, ctx) => {
    for (const [stage, override] of Object.entries(config.stages)) {
      if (override.strategy !== undefined && !(override.strategy in config.strategies)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['stages', stage, 'strategy'],
          message: `Unknown strategy "${override.strategy}"`,
        })
      }
    }
  })

export type TaskRelayConfig = z.infer<typeof TaskRelayConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (one layer before merging)
// ---------------------------------------------------------------------------

export const PartialStrategyConfigSchema = z
  .object({
    max_attempts: z.number().int().min(1),
    backoff_factor: z.number().min(1),
    timeout_multiplier: z.number().min(1),
    escalation_threshold: z.number().int().min(1),
    abort_conditions: z.array(z.string().min(1)),
    remediation_hints: z.record(z.string()),
    guidance: z.array(z.string()),
    success_criteria: z.record(CriterionValueSchema),
    escalation: EscalationConfigSchema.partial(),
  })
  .partial()
  .strict()

export const PartialTaskRelayConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION).optional(),
    global: GlobalSettingsSchema.partial().optional(),
    stages: z.record(StageOverrideSchema).optional(),
    strategies: z.record(PartialStrategyConfigSchema).optional(),
    quality_gates: QualityGatesConfigSchema.partial().optional(),
  })
  .strict()

export type PartialTaskRelayConfig = z.infer<typeof PartialTaskRelayConfigSchema>
