/**
 * StageOrchestrator implementation.
 *
 * Factory: createStageOrchestrator(options) → StageOrchestrator
 *
 * Each stage entry dispatches the stage's open work orders, validates them,
 * and hands every failure to the feedback engine:
 *   continue → the work order is done
 *   retry / escalate → re-dispatched next entry with the remediation
 *   rollback → the verifier is suspended and the producer re-enters
 *   abort → terminal failure of the stage and the run
 */

import type { RelayEventName, TypedEventBus } from '../../core/event-bus.js'
import type { RelayEvents } from '../../core/event-bus.types.js'
import { MissingStrategyError } from '../../core/errors.js'
import type { LoopId, RunId, StageName, TaskId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { generateId, toError } from '../../utils/helpers.js'
import {
  ValidationResultSchema,
  describeFailures,
  type FeedbackDecision,
  type FeedbackEngine,
  type RedirectedDecision,
  type RollbackDecision,
  type ValidationResult,
} from '../feedback-engine/index.js'
import type { PipelineScheduler } from '../pipeline-scheduler/index.js'
import { createWorkOrder, type WorkOrder, type WorkOrderInput } from '../work-order/index.js'
import { PRESET_STAGES, StageRegistry, createBuiltInStages } from './built-in-stages.js'
import { defaultStagePlanner } from './planners.js'
import type { StageOrchestrator, StageOrchestratorOptions } from './stage-orchestrator.js'
import {
  DEFAULT_STAGE_ENTRY_CEILING,
  type RunRequest,
  type RunResult,
  type StageDefinition,
  type StageFailureKind,
  type StagePlanner,
  type StageResult,
  type StageValidator,
  type ValidationContext,
} from './types.js'

const logger = createLogger('stage-orchestrator')

// ---------------------------------------------------------------------------
// Run state
// ---------------------------------------------------------------------------

/** One loop-bound work order of a stage, across its re-dispatches */
interface WorkItem {
  taskId: TaskId
  loopId: LoopId
  /** Input for the next dispatch */
  input: WorkOrderInput
  originalInstruction: string
  verifies?: TaskId
  done: boolean
  lastOrder?: WorkOrder
  lastDecision?: FeedbackDecision
}

interface RunState {
  runId: RunId
  request: RunRequest
  results: Map<StageName, StageResult>
  items: Map<StageName, WorkItem[]>
  /** Gate fix work orders waiting for the next entry of a gate stage */
  gateFixes: Map<StageName, WorkOrderInput[]>
}

type StageOutcome =
  | { kind: 'completed' }
  | { kind: 'failed'; stage: StageName; failureKind: StageFailureKind }
  | { kind: 'rollback'; target: StageName }

const acceptDelivered: StageValidator = () => ({ success: true, failures: [] })

/** An open item whose retry or escalation has been applied but not yet dispatched */
function carriesDecision(item: WorkItem): boolean {
  const action = item.lastDecision?.action
  return !item.done && (action === 'retry' || action === 'escalate')
}

function productionFailure(order: WorkOrder): ValidationResult {
  return {
    success: false,
    failures: [
      {
        type: 'instruction_production_error',
        message: order.error ?? 'instruction production failed',
        workOrderId: order.taskId,
        details: {},
      },
    ],
  }
}

/** Gate fix prompts carried in the details of gate failure records */
function gateFixOrders(validation: ValidationResult, taskId: TaskId, entry: number): WorkOrderInput[] {
  const fixes: WorkOrderInput[] = []
  for (const failure of validation.failures) {
    const { gate, executorId, fixPrompt } = failure.details
    if (typeof gate !== 'string' || typeof executorId !== 'string' || typeof fixPrompt !== 'string') continue
    fixes.push({
      taskId: `${taskId}:fix-${gate}-${String(entry)}`,
      executorId,
      description: `Fix the ${gate} quality gate`,
      instructionText: fixPrompt,
    })
  }
  return fixes
}

// ---------------------------------------------------------------------------
// StageOrchestratorImpl
// ---------------------------------------------------------------------------

export class StageOrchestratorImpl implements StageOrchestrator {
  private readonly _engine: FeedbackEngine
  private readonly _scheduler: PipelineScheduler
  private readonly _stages: StageRegistry
  private readonly _planners: Readonly<Record<StageName, StagePlanner>>
  private readonly _validators: Readonly<Record<StageName, StageValidator>>
  private readonly _defaultValidator: StageValidator
  private readonly _ceiling: number
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _now: () => Date

  constructor(options: StageOrchestratorOptions) {
    this._engine = options.engine
    this._scheduler = options.scheduler
    this._stages = options.stages ?? new StageRegistry(createBuiltInStages())
    this._planners = options.planners ?? {}
    this._validators = options.validators ?? {}
    this._defaultValidator = options.defaultValidator ?? acceptDelivered
    this._ceiling = options.stageEntryCeiling ?? DEFAULT_STAGE_ENTRY_CEILING
    this._eventBus = options.eventBus
    this._now = options.now ?? (() => new Date())
  }

  getStages(): StageDefinition[] {
    return this._stages.list()
  }

  async runPipeline(request: RunRequest): Promise<RunResult> {
    this._stages.validate()
    const plan = this._stages.plan(request.stages ?? PRESET_STAGES[request.preset ?? 'full'])
    for (const def of plan) {
      if (this._engine.getStrategy(def.strategy) === undefined) {
        throw new MissingStrategyError(def.name, def.strategy)
      }
    }

    const startedAt = this._now().getTime()
    const state: RunState = {
      runId: request.runId ?? generateId('run'),
      request,
      results: new Map(plan.map((def) => [def.name, this._emptyResult(def.name)])),
      items: new Map(),
      gateFixes: new Map(),
    }
    logger.info({ runId: state.runId, stages: plan.map((d) => d.name) }, 'Pipeline run started')

    let failure: Extract<StageOutcome, { kind: 'failed' }> | undefined
    for (const def of plan) {
      const outcome = await this._runWithRollback(state, def, false)
      if (outcome.kind === 'failed') {
        failure = outcome
        break
      }
    }

    return this._buildResult(state, plan, failure, startedAt)
  }

  // -------------------------------------------------------------------------
  // Stage execution
  // -------------------------------------------------------------------------

  /**
   * Run a stage; when it rolls back, re-enter the producer and then run the
   * stage again from a fresh plan. Items still carrying a retry or escalation
   * keep it across the re-plan.
   */
  private async _runWithRollback(
    state: RunState,
    def: StageDefinition,
    resume: boolean,
  ): Promise<Exclude<StageOutcome, { kind: 'rollback' }>> {
    const outcome = await this._runStage(state, def, resume)
    if (outcome.kind !== 'rollback') return outcome

    const producer = await this._runWithRollback(state, this._stages.get(outcome.target), true)
    if (producer.kind === 'failed') return producer
    return this._runWithRollback(state, def, false)
  }

  private async _runStage(state: RunState, def: StageDefinition, resume: boolean): Promise<StageOutcome> {
    const result = this._result(state, def.name)
    const items = resume ? (state.items.get(def.name) ?? []) : await this._planItems(state, def)
    state.items.set(def.name, items)

    for (;;) {
      const open = items.filter((item) => !item.done)
      if (open.length === 0) return this._complete(state, def, items)
      if (result.entries >= this._ceiling) {
        return this._fail(state, def, 'unresolved_loops', `Stage entry ceiling of ${String(this._ceiling)} reached`)
      }

      result.entries += 1
      result.retryCount = result.entries - 1
      result.status = 'running'
      this._emit('stage:started', { runId: state.runId, stage: def.name, attempt: result.entries })

      const run = await this._dispatch(state, def, open)
      const delivered = new Map(run.workOrders.map((order) => [order.taskId, order]))
      const context: ValidationContext = { runId: state.runId, stage: def, attempt: result.entries, run }

      let aborted = false
      let rolledBack = false
      for (const item of open) {
        const order = delivered.get(item.taskId)
        // Not reached by a sequential dispatch; goes out again next entry
        if (order === undefined || order.status === 'pending') continue
        item.lastOrder = order

        const validation = order.status === 'failed' ? productionFailure(order) : await this._validate(def, order, context)
        result.validation[item.taskId] = validation

        if (validation.success) {
          const decision = this._engine.processSuccess(item.loopId, validation)
          if (decision !== null) item.lastDecision = decision
          item.done = true
          continue
        }

        const rollback = this._tryRollback(state, def, item, validation)
        const decision: RollbackDecision | RedirectedDecision =
          rollback ?? this._engine.processFailure(item.loopId, validation)
        item.lastDecision = decision
        const redirected: RedirectedDecision = decision.action === 'rollback' ? decision.redirected : decision

        if (redirected.action === 'abort') {
          aborted = true
          continue
        }
        if (decision.action === 'rollback') {
          rolledBack = true
          continue
        }
        if (redirected.action === 'escalate') result.loopIds.push(redirected.loopId)
        item.loopId = redirected.loopId
        item.input = { ...item.input, executorId: redirected.targetExecutor, instructionText: redirected.augmentedInstruction }
        if (def.kind === 'gate') {
          const fixes = gateFixOrders(validation, item.taskId, result.entries)
          state.gateFixes.set(def.name, [...(state.gateFixes.get(def.name) ?? []), ...fixes])
        }
      }

      result.workOrders = items.flatMap((item) => (item.lastOrder !== undefined ? [item.lastOrder] : []))

      if (aborted) {
        return this._fail(state, def, 'no_recourse', 'Feedback engine aborted a work order')
      }
      if (rolledBack && def.verifies !== undefined) {
        result.status = 'suspended'
        this._emit('stage:suspended', { runId: state.runId, stage: def.name, redirectedTo: def.verifies })
        logger.info({ runId: state.runId, stage: def.name, target: def.verifies }, 'Stage suspended for producer remediation')
        return { kind: 'rollback', target: def.verifies }
      }
    }
  }

  private async _planItems(state: RunState, def: StageDefinition): Promise<WorkItem[]> {
    const upstream = new Map<StageName, StageResult>()
    for (const [name, stageResult] of state.results) {
      if (stageResult.status === 'completed') upstream.set(name, stageResult)
    }
    const planner = this._planners[def.name] ?? defaultStagePlanner
    const planned = await planner({ runId: state.runId, stage: def, request: state.request, upstream })
    const result = this._result(state, def.name)
    const previous = new Map((state.items.get(def.name) ?? []).map((item) => [item.taskId, item]))

    return planned.map((entry) => {
      const carried = previous.get(entry.input.taskId)
      if (carried !== undefined && carriesDecision(carried)) return carried

      const instruction = entry.input.instructionText ?? ''
      const loop = this._engine.registerLoop({
        runId: state.runId,
        stage: def.name,
        executorId: entry.input.executorId,
        workOrderId: entry.input.taskId,
        originalInstruction: instruction,
        strategy: def.strategy,
      })
      if (!result.loopIds.includes(loop.loopId)) result.loopIds.push(loop.loopId)
      return {
        taskId: entry.input.taskId,
        loopId: loop.loopId,
        input: entry.input,
        originalInstruction: instruction,
        done: false,
        ...(entry.verifies !== undefined ? { verifies: entry.verifies } : {}),
      }
    })
  }

  private async _dispatch(state: RunState, def: StageDefinition, open: readonly WorkItem[]) {
    const inBatch = new Set(open.map((item) => item.taskId))
    const fixes = state.gateFixes.get(def.name) ?? []
    state.gateFixes.delete(def.name)
    const orders = [
      // Fixes go first so a sequential dispatch delivers them before the re-check
      ...fixes.map((input) => createWorkOrder(input)),
      ...open.map((item) =>
        createWorkOrder({
          ...item.input,
          dependencies: (item.input.dependencies ?? []).filter((dep) => inBatch.has(dep)),
        }),
      ),
    ]
    return this._scheduler.dispatch(def.dispatchMode, orders, { runId: state.runId, label: def.name })
  }

  private async _validate(def: StageDefinition, order: WorkOrder, context: ValidationContext): Promise<ValidationResult> {
    const validator = this._validators[def.name] ?? this._defaultValidator
    try {
      const raw = await validator(order, context)
      const parsed = ValidationResultSchema.safeParse(raw)
      if (parsed.success) return parsed.data
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
      return {
        success: false,
        failures: [{ type: 'invalid_validation_result', message: issues.join('; '), workOrderId: order.taskId, details: {} }],
      }
    } catch (err) {
      const error = toError(err)
      logger.warn({ stage: def.name, taskId: order.taskId, err: error }, 'Validator threw')
      return {
        success: false,
        failures: [{ type: 'validator_error', message: error.message, workOrderId: order.taskId, details: {} }],
      }
    }
  }

  /**
   * For a verification stage, charge an artifact defect to the producer
   * work order the failing item verifies. Returns undefined when the failure
   * belongs to the verifier or the producer is not part of this run.
   */
  private _tryRollback(
    state: RunState,
    def: StageDefinition,
    item: WorkItem,
    validation: ValidationResult,
  ): RollbackDecision | undefined {
    if (def.kind !== 'verification' || def.verifies === undefined || item.verifies === undefined) return undefined
    if (!validation.failures.some((f) => this._engine.classifyFailure(f) === 'artifact')) return undefined

    const producerDef = this._stages.get(def.verifies)
    const producer = state.items.get(producerDef.name)?.find((p) => p.taskId === item.verifies)
    if (producer === undefined) return undefined

    const decision = this._engine.routeToProducer({
      verifierLoopId: item.loopId,
      producerStage: producerDef.name,
      producerExecutorId: producer.input.executorId,
      producerWorkOrderId: producer.taskId,
      producerInstruction: producer.originalInstruction,
      producerStrategy: producerDef.strategy,
      validationResult: validation,
      failureReason: describeFailures(validation),
    })

    const redirected = decision.redirected
    producer.lastDecision = redirected
    producer.loopId = redirected.loopId
    const producerResult = this._result(state, producerDef.name)
    if (!producerResult.loopIds.includes(redirected.loopId)) producerResult.loopIds.push(redirected.loopId)
    if (redirected.action !== 'abort') {
      producer.done = false
      producer.input = {
        ...producer.input,
        executorId: redirected.targetExecutor,
        instructionText: redirected.augmentedInstruction,
      }
    }
    return decision
  }

  // -------------------------------------------------------------------------
  // Stage outcomes
  // -------------------------------------------------------------------------

  private _complete(state: RunState, def: StageDefinition, items: readonly WorkItem[]): StageOutcome {
    const result = this._result(state, def.name)
    result.status = 'completed'
    delete result.failureKind
    result.workOrders = items.flatMap((item) => (item.lastOrder !== undefined ? [item.lastOrder] : []))
    this._emit('stage:completed', { runId: state.runId, stage: def.name, attempt: result.entries })
    logger.info({ runId: state.runId, stage: def.name, entries: result.entries }, 'Stage completed')
    return { kind: 'completed' }
  }

  private _fail(state: RunState, def: StageDefinition, failureKind: StageFailureKind, detail: string): StageOutcome {
    const result = this._result(state, def.name)
    result.status = 'failed'
    result.failureKind = failureKind
    this._emit('stage:failed', { runId: state.runId, stage: def.name, reason: failureKind, detail })
    logger.warn({ runId: state.runId, stage: def.name, failureKind, detail }, 'Stage failed')
    return { kind: 'failed', stage: def.name, failureKind }
  }

  private _buildResult(
    state: RunState,
    plan: readonly StageDefinition[],
    failure: Extract<StageOutcome, { kind: 'failed' }> | undefined,
    startedAt: number,
  ): RunResult {
    const status = failure === undefined ? 'completed' : 'failed'
    const remediationInstructions: string[] = []
    if (failure !== undefined) {
      for (const def of plan) {
        for (const item of state.items.get(def.name) ?? []) {
          if (item.done || item.lastDecision === undefined) continue
          remediationInstructions.push(this._engine.renderInstruction(item.lastDecision))
        }
      }
    }

    const result: RunResult = {
      runId: state.runId,
      status,
      requiresManualIntervention: failure !== undefined,
      stages: plan.map((def) => this._result(state, def.name)),
      remediationInstructions,
      feedbackSummary: this._engine.getRunStatus(state.runId),
      nextSteps: failure === undefined ? [] : this._nextSteps(failure, remediationInstructions.length),
      elapsedMs: this._now().getTime() - startedAt,
      ...(failure !== undefined ? { failedStage: failure.stage } : {}),
    }

    this._emit('run:completed', {
      runId: state.runId,
      status,
      requiresManualIntervention: result.requiresManualIntervention,
    })
    logger.info({ runId: state.runId, status, elapsedMs: result.elapsedMs }, 'Pipeline run finished')
    return result
  }

  private _nextSteps(failure: Extract<StageOutcome, { kind: 'failed' }>, remediationCount: number): string[] {
    const steps =
      failure.failureKind === 'no_recourse'
        ? [`Resolve the condition that aborted the ${failure.stage} stage by hand.`]
        : [`The ${failure.stage} stage reached its entry ceiling with loops still open.`]
    if (remediationCount > 0) {
      steps.push(`Hand the ${String(remediationCount)} remediation instruction(s) to their executors.`)
    }
    steps.push(`Start a new run from the ${failure.stage} stage once the work passes validation.`)
    return steps
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _emptyResult(stage: StageName): StageResult {
    return { stage, status: 'pending', workOrders: [], validation: {}, loopIds: [], retryCount: 0, entries: 0 }
  }

  private _result(state: RunState, stage: StageName): StageResult {
    let result = state.results.get(stage)
    if (result === undefined) {
      result = this._emptyResult(stage)
      state.results.set(stage, result)
    }
    return result
  }

  private _emit<K extends RelayEventName>(event: K, payload: RelayEvents[K]): void {
    this._eventBus?.emit(event, payload)
  }
}

/**
 * Factory function to create a StageOrchestrator.
 */
export function createStageOrchestrator(options: StageOrchestratorOptions): StageOrchestrator {
  return new StageOrchestratorImpl(options)
}
