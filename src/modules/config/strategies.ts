/**
 * Conversion from the snake_case YAML strategy section to the engine's
 * `RetryStrategy` objects.
 */

import type { RetryStrategy, StrategyMap } from '../feedback-engine/types.js'
import type { StrategyConfig, TaskRelayConfig } from './config-schema.js'

export function toRetryStrategy(config: StrategyConfig): RetryStrategy {
  return {
    maxAttempts: config.max_attempts,
    backoffFactor: config.backoff_factor,
    timeoutMultiplier: config.timeout_multiplier,
    escalationThreshold: config.escalation_threshold,
    abortConditions: config.abort_conditions.map((c) => c.toLowerCase()),
    remediationHints: { ...config.remediation_hints },
    guidance: [...config.guidance],
    successCriteria: { ...config.success_criteria },
    escalation: {
      specialists: { ...config.escalation.specialists },
      defaultExecutor: config.escalation.default_executor,
      fallbackExecutors: [...config.escalation.fallback_executors],
    },
  }
}

export function toStrategies(config: TaskRelayConfig): StrategyMap {
  const strategies: Record<string, RetryStrategy> = {}
  for (const [key, strategy] of Object.entries(config.strategies)) {
    strategies[key] = toRetryStrategy(strategy)
  }
  return strategies
}
