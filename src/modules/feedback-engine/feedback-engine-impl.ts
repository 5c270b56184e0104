/**
 * FeedbackEngineImpl: loop bookkeeping on top of the State Store plus the
 * abort / escalate / retry analysis.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { RelayEvents } from '../../core/event-bus.types.js'
import { ConfigurationError, FeedbackLoopNotFoundError, MissingStrategyError } from '../../core/errors.js'
import type { LoopId, RunId } from '../../core/types.js'
import { formatDuration, generateId, roundTo } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { CleanupOptions, CleanupReport, FeedbackContext, LoopOutcome, StateStore } from '../state-store/index.js'
import { classifyFailureOrigin, classifySeverity, describeFailures, normalizeText } from './classification.js'
import { selectEscalationTarget } from './escalation.js'
import type { FeedbackEngine, FeedbackEngineOptions } from './feedback-engine.js'
import {
  DEFAULT_BASE_RETRY_DELAY_MS,
  DEFAULT_BASE_VALIDATION_TIMEOUT_SECONDS,
  DEFAULT_LOOP_TIME_CEILING_MS,
} from './feedback-engine.js'
import {
  buildEscalationInstruction,
  buildRetryInstruction,
  renderDecision,
  successCriteriaFor,
} from './remediation.js'
import { ValidationResultSchema } from './types.js'
import type {
  AbortDecision,
  AbortTrigger,
  ContinueDecision,
  EscalateDecision,
  FailureOrigin,
  FailureRecordInput,
  FeedbackDecision,
  RedirectedDecision,
  RegisterLoopInput,
  RetryDecision,
  RetryStrategy,
  RollbackDecision,
  RouteToProducerInput,
  RunFeedbackStatus,
  Severity,
  StrategyMap,
  ValidationRequirements,
  ValidationResult,
  ValidationResultInput,
} from './types.js'

const logger = createLogger('feedback-engine')

const ESCALATION_CONFIDENCE = 0.7
const ABORT_CONFIDENCE = 0.9
const BASE_REMEDIATION_SECONDS = 300
const ESCALATION_REMEDIATION_SECONDS = 600
const RECENT_HISTORY_LIMIT = 5

interface AbortCheck {
  trigger: AbortTrigger
  reasoning: string
}

export class FeedbackEngineImpl implements FeedbackEngine {
  private readonly _store: StateStore
  private readonly _strategies: StrategyMap
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _now: () => Date
  private readonly _loopTimeCeilingMs: number
  private readonly _baseRetryDelayMs: number
  private readonly _baseValidationTimeoutSeconds: number
  private readonly _abortConditions: readonly string[]

  constructor(options: FeedbackEngineOptions) {
    this._store = options.stateStore
    this._strategies = options.strategies
    this._eventBus = options.eventBus
    this._now = options.now ?? (() => new Date())
    this._loopTimeCeilingMs = options.loopTimeCeilingMs ?? DEFAULT_LOOP_TIME_CEILING_MS
    this._baseRetryDelayMs = options.baseRetryDelayMs ?? DEFAULT_BASE_RETRY_DELAY_MS
    this._baseValidationTimeoutSeconds =
      options.baseValidationTimeoutSeconds ?? DEFAULT_BASE_VALIDATION_TIMEOUT_SECONDS
    this._abortConditions = (options.abortConditions ?? []).map(normalizeText)
  }

  getStrategy(key: string): RetryStrategy | undefined {
    return Object.hasOwn(this._strategies, key) ? this._strategies[key] : undefined
  }

  // -------------------------------------------------------------------------
  // Loop lifecycle
  // -------------------------------------------------------------------------

  registerLoop(input: RegisterLoopInput): FeedbackContext {
    const existing = this._store.findActiveByKey(input)
    if (existing !== undefined) {
      return existing
    }

    const strategyKey = input.strategy ?? input.stage
    const strategy = this.getStrategy(strategyKey)
    if (strategy === undefined) {
      throw new MissingStrategyError(input.stage, strategyKey)
    }

    const loopId = generateId('loop')
    const at = this._now().toISOString()
    const stored = this._store.putActive({
      loopId,
      rootLoopId: loopId,
      runId: input.runId,
      stage: input.stage,
      executorId: input.executorId,
      workOrderId: input.workOrderId,
      originalInstruction: input.originalInstruction,
      validationResult: null,
      failureReason: '',
      failureHistory: [],
      retryCount: 0,
      maxRetries: strategy.maxAttempts,
      hasEscalated: false,
      escalatedFrom: null,
      metadata: { ...input.metadata, strategy: strategyKey },
      createdAt: at,
      updatedAt: at,
    })

    this._emitRegistered(stored)
    logger.debug({ loopId, runId: input.runId, stage: input.stage, workOrderId: input.workOrderId }, 'Feedback loop registered')
    return stored
  }

  processFailure(loopId: LoopId, validation: ValidationResultInput, failureReason?: string): RedirectedDecision {
    const context = this._store.getActive(loopId)
    if (context === undefined) {
      throw new FeedbackLoopNotFoundError(loopId)
    }

    const parsed = this._parseValidation(validation)
    const reason = failureReason ?? (describeFailures(parsed) || 'validation failed')
    const now = this._now()
    const at = now.toISOString()

    const updated = this._store.putActive({
      ...context,
      validationResult: parsed,
      failureReason: reason,
      retryCount: Math.min(context.retryCount + 1, context.maxRetries),
      failureHistory: [
        ...context.failureHistory,
        { attempt: context.failureHistory.length + 1, executorId: context.executorId, reason, at },
      ],
      updatedAt: at,
    })

    const decision = this.analyze(updated, now)
    this._apply(updated, decision)
    this._emitDecided(updated, decision)

    logger.info(
      {
        loopId,
        stage: updated.stage,
        action: decision.action,
        retryCount: updated.retryCount,
        targetExecutor: decision.action === 'abort' ? undefined : decision.targetExecutor,
      },
      'Feedback decision made',
    )
    return decision
  }

  processSuccess(loopId: LoopId, validation?: ValidationResultInput): ContinueDecision | null {
    const context = this._store.getActive(loopId)
    if (context === undefined) {
      return null
    }

    if (validation !== undefined) {
      this._store.putActive({
        ...context,
        validationResult: this._parseValidation(validation),
        updatedAt: this._now().toISOString(),
      })
    }

    this._close(context, 'resolved')
    const decision: ContinueDecision = {
      action: 'continue',
      loopId,
      reasoning: `Validation passed for ${context.workOrderId} after ${String(context.retryCount)} failed attempt(s)`,
    }
    this._emitDecided(context, decision)
    return decision
  }

  // -------------------------------------------------------------------------
  // Analysis
  // -------------------------------------------------------------------------

  analyze(context: FeedbackContext, now: Date = this._now()): RedirectedDecision {
    const strategy = this._strategyFor(context)
    const severity = classifySeverity(context.failureReason)

    const abort = this._abortCheck(context, strategy, now)
    if (abort !== null) {
      return this._abortDecision(context, abort, severity)
    }

    if (context.retryCount >= strategy.escalationThreshold) {
      if (context.hasEscalated) {
        return this._abortDecision(
          context,
          {
            trigger: 'escalation_exhausted',
            reasoning: `Loop ${context.rootLoopId} was already escalated to ${context.executorId} and failed again`,
          },
          severity,
        )
      }

      const failureText = [
        context.failureReason,
        ...(context.validationResult?.failures.map((f) => f.type) ?? []),
      ].join(' ')
      const target = selectEscalationTarget(strategy.escalation, context.executorId, failureText)
      if (target === null) {
        return this._abortDecision(
          context,
          {
            trigger: 'no_alternate_executor',
            reasoning: `No executor other than ${context.executorId} is configured for escalation`,
          },
          severity,
        )
      }
      return this._escalateDecision(context, strategy, severity, target)
    }

    return this._retryDecision(context, strategy, severity)
  }

  classifyFailure(record: FailureRecordInput): FailureOrigin {
    return classifyFailureOrigin(record)
  }

  // -------------------------------------------------------------------------
  // Cross-stage routing
  // -------------------------------------------------------------------------

  routeToProducer(input: RouteToProducerInput): RollbackDecision {
    const verifier = this._store.getActive(input.verifierLoopId)
    if (verifier === undefined) {
      throw new FeedbackLoopNotFoundError(input.verifierLoopId)
    }

    const parsed = this._parseValidation(input.validationResult)
    // The verifier did its job; its retry count is left alone
    this._store.putActive({
      ...verifier,
      validationResult: parsed,
      failureReason: input.failureReason,
      updatedAt: this._now().toISOString(),
    })

    const producer = this.registerLoop({
      runId: verifier.runId,
      stage: input.producerStage,
      executorId: input.producerExecutorId,
      workOrderId: input.producerWorkOrderId,
      originalInstruction: input.producerInstruction,
      ...(input.producerStrategy !== undefined ? { strategy: input.producerStrategy } : {}),
      metadata: { redirectedFrom: verifier.stage, verifierLoopId: verifier.loopId },
    })

    const redirected = this.processFailure(producer.loopId, parsed, input.failureReason)
    const decision: RollbackDecision = {
      action: 'rollback',
      loopId: verifier.loopId,
      targetStage: input.producerStage,
      redirectedLoopId: redirected.loopId,
      redirected,
      reasoning: `${verifier.stage} found a defect in the ${input.producerStage} output of ${input.producerWorkOrderId}; routed to ${input.producerExecutorId}`,
    }
    this._emitDecided(verifier, decision)
    logger.info(
      { verifierLoopId: verifier.loopId, producerLoopId: producer.loopId, targetStage: input.producerStage },
      'Failure routed to producing stage',
    )
    return decision
  }

  renderInstruction(decision: FeedbackDecision): string {
    return renderDecision(decision)
  }

  // -------------------------------------------------------------------------
  // Reporting and maintenance
  // -------------------------------------------------------------------------

  getRunStatus(runId: RunId): RunFeedbackStatus {
    const active = this._store.listActive({ runId })
    const history = this._store.listHistory({ runId })
    // An escalated entry lives on in its successor, so only chain tips count
    const closedTips = history.filter((entry) => entry.outcome !== 'escalated')
    const tips = [...active, ...closedTips]
    const resolved = closedTips.filter((entry) => entry.outcome === 'resolved').length

    return {
      runId,
      activeLoops: active.length,
      totalFailures: tips.reduce((sum, ctx) => sum + ctx.failureHistory.length, 0),
      totalRetries: tips.reduce((sum, ctx) => sum + ctx.retryCount, 0),
      successRate: closedTips.length === 0 ? 0 : roundTo(resolved / closedTips.length),
      active: active.map((ctx) => ({
        loopId: ctx.loopId,
        stage: ctx.stage,
        executorId: ctx.executorId,
        retryCount: ctx.retryCount,
        failureReason: ctx.failureReason,
      })),
      recentHistory: history.slice(-RECENT_HISTORY_LIMIT).map((entry) => ({
        loopId: entry.loopId,
        stage: entry.stage,
        executorId: entry.executorId,
        retryCount: entry.retryCount,
        outcome: entry.outcome,
        closedAt: entry.closedAt,
      })),
    }
  }

  getActiveLoops(runId?: RunId): FeedbackContext[] {
    return this._store.listActive(runId === undefined ? {} : { runId })
  }

  cleanup(options: CleanupOptions = {}): CleanupReport {
    const report = this._store.cleanup(options)
    if (report.expiredLoops > 0 || report.prunedHistory > 0) {
      logger.info(report, 'Feedback state cleaned up')
    }
    return report
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _strategyFor(context: FeedbackContext): RetryStrategy {
    const named = context.metadata['strategy']
    const key = typeof named === 'string' ? named : context.stage
    const strategy = this.getStrategy(key)
    if (strategy === undefined) {
      throw new MissingStrategyError(context.stage, key)
    }
    return strategy
  }

  private _parseValidation(validation: ValidationResultInput): ValidationResult {
    const result = ValidationResultSchema.safeParse(validation)
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
      throw new ConfigurationError(`Invalid validation result: ${issues}`, { issues: result.error.issues })
    }
    return result.data
  }

  private _abortCheck(context: FeedbackContext, strategy: RetryStrategy, now: Date): AbortCheck | null {
    if (context.retryCount >= strategy.maxAttempts) {
      return {
        trigger: 'max_attempts',
        reasoning: `Reached ${String(context.retryCount)} of ${String(strategy.maxAttempts)} attempts: ${context.failureReason}`,
      }
    }

    const reason = normalizeText(context.failureReason)
    const condition = [...strategy.abortConditions, ...this._abortConditions].find((c) =>
      reason.includes(normalizeText(c)),
    )
    if (condition !== undefined) {
      return {
        trigger: 'abort_condition',
        reasoning: `Abort condition "${condition}" matched: ${context.failureReason}`,
      }
    }

    const elapsed = now.getTime() - Date.parse(context.createdAt)
    if (elapsed > this._loopTimeCeilingMs) {
      return {
        trigger: 'time_ceiling',
        reasoning: `Loop open for ${formatDuration(elapsed)}, past the ${formatDuration(this._loopTimeCeilingMs)} ceiling`,
      }
    }
    return null
  }

  private _requirements(
    context: FeedbackContext,
    strategy: RetryStrategy,
    severity: Severity,
    escalated: boolean,
  ): ValidationRequirements {
    return {
      stage: context.stage,
      attempt: context.retryCount + 1,
      previousFailures: context.failureHistory.length,
      validationType: escalated || context.retryCount > 1 ? 'enhanced' : 'standard',
      timeoutSeconds: roundTo(this._baseValidationTimeoutSeconds * strategy.timeoutMultiplier ** context.retryCount),
      failureSensitive: severity === 'critical' || severity === 'high',
      successCriteria: successCriteriaFor(strategy),
    }
  }

  private _retryDecision(context: FeedbackContext, strategy: RetryStrategy, severity: Severity): RetryDecision {
    const rc = context.retryCount
    return {
      action: 'retry',
      loopId: context.loopId,
      targetExecutor: context.executorId,
      augmentedInstruction: buildRetryInstruction(context, strategy, severity),
      validationRequirements: this._requirements(context, strategy, severity, false),
      successCriteria: successCriteriaFor(strategy),
      confidence: roundTo(Math.max(0.3, 0.9 - 0.2 * rc)),
      estimatedRemediationSeconds: Math.round(BASE_REMEDIATION_SECONDS * (1 + 0.5 * rc)),
      retryAfterMs: Math.round(this._baseRetryDelayMs * strategy.backoffFactor ** Math.max(0, rc - 1)),
      severity,
      reasoning: `Retry ${String(rc + 1)} of ${String(strategy.maxAttempts)} with ${context.executorId}: ${context.failureReason}`,
    }
  }

  private _escalateDecision(
    context: FeedbackContext,
    strategy: RetryStrategy,
    severity: Severity,
    targetExecutor: string,
  ): EscalateDecision {
    return {
      action: 'escalate',
      loopId: generateId('loop'),
      previousLoopId: context.loopId,
      previousExecutor: context.executorId,
      targetExecutor,
      augmentedInstruction: buildEscalationInstruction(context, strategy, targetExecutor),
      validationRequirements: this._requirements(context, strategy, severity, true),
      successCriteria: successCriteriaFor(strategy),
      confidence: ESCALATION_CONFIDENCE,
      estimatedRemediationSeconds: ESCALATION_REMEDIATION_SECONDS,
      severity,
      reasoning: `Escalating from ${context.executorId} to ${targetExecutor} after ${String(context.retryCount)} failed attempts`,
    }
  }

  private _abortDecision(context: FeedbackContext, check: AbortCheck, severity: Severity): AbortDecision {
    return {
      action: 'abort',
      loopId: context.loopId,
      trigger: check.trigger,
      severity,
      confidence: ABORT_CONFIDENCE,
      reasoning: check.reasoning,
    }
  }

  private _apply(context: FeedbackContext, decision: RedirectedDecision): void {
    switch (decision.action) {
      case 'retry':
        return
      case 'abort':
        this._close(context, 'aborted')
        return
      case 'escalate': {
        this._close(context, 'escalated')
        const at = this._now().toISOString()
        const successor = this._store.putActive({
          ...context,
          loopId: decision.loopId,
          executorId: decision.targetExecutor,
          hasEscalated: true,
          escalatedFrom: context.loopId,
          createdAt: at,
          updatedAt: at,
        })
        this._emitRegistered(successor)
        return
      }
    }
  }

  private _close(context: FeedbackContext, outcome: LoopOutcome): void {
    if (this._store.closeLoop(context.loopId, outcome) === undefined) {
      return
    }
    this._emit('feedback:closed', { loopId: context.loopId, runId: context.runId, stage: context.stage, outcome })
  }

  private _emitRegistered(context: FeedbackContext): void {
    this._emit('feedback:registered', {
      loopId: context.loopId,
      runId: context.runId,
      stage: context.stage,
      executorId: context.executorId,
      workOrderId: context.workOrderId,
    })
  }

  private _emitDecided(context: FeedbackContext, decision: FeedbackDecision): void {
    const target =
      decision.action === 'retry' || decision.action === 'escalate' ? { targetExecutor: decision.targetExecutor } : {}
    this._emit('feedback:decided', {
      loopId: decision.loopId,
      runId: context.runId,
      stage: context.stage,
      action: decision.action,
      retryCount: context.retryCount,
      ...target,
    })
  }

  private _emit<K extends keyof RelayEvents & string>(event: K, payload: RelayEvents[K]): void {
    this._eventBus?.emit(event, payload)
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createFeedbackEngine(options: FeedbackEngineOptions): FeedbackEngine {
  return new FeedbackEngineImpl(options)
}
