/**
 * PipelineSchedulerImpl: instruction production under the three dispatch modes.
 *
 * Parallel mode runs production units on a promise pool bounded by
 * workerPoolSize; each unit races a timeout. Results land in a slot indexed
 * by submission position, so the batch keeps input order no matter which unit
 * finishes first.
 */

import { ConfigurationError, InstructionProductionError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { RunId } from '../../core/types.js'
import { deepFreeze, generateId, toError } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { markCompleted, markDispatched, markFailed } from '../work-order/index.js'
import type { WorkOrder } from '../work-order/index.js'
import { topologicalOrder } from './dependency-resolver.js'
import { renderInstructionBatch } from './instruction-batch.js'
import { appendCarryOver, defaultInstructionProducer } from './instruction-producer.js'
import type { PipelineScheduler } from './pipeline-scheduler.js'
import {
  DEFAULT_PRODUCTION_TIMEOUT_MS,
  DEFAULT_WORKER_POOL_SIZE,
} from './types.js'
import type {
  DispatchMode,
  DispatchOptions,
  InstructionProducer,
  PipelineRun,
  PipelineSchedulerOptions,
  ProductionContext,
} from './types.js'

const logger = createLogger('pipeline-scheduler')

interface ProductionOutcome {
  order: WorkOrder
  /** Present only when production succeeded */
  instruction?: string
}

// ---------------------------------------------------------------------------
// PipelineSchedulerImpl
// ---------------------------------------------------------------------------

export class PipelineSchedulerImpl implements PipelineScheduler {
  private readonly _poolSize: number
  private readonly _timeoutMs: number
  private readonly _producer: InstructionProducer
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _now: () => Date

  constructor(options: PipelineSchedulerOptions = {}) {
    const poolSize = options.workerPoolSize ?? DEFAULT_WORKER_POOL_SIZE
    const timeoutMs = options.productionTimeoutMs ?? DEFAULT_PRODUCTION_TIMEOUT_MS
    if (!Number.isInteger(poolSize) || poolSize < 1) {
      throw new ConfigurationError(`workerPoolSize must be a positive integer, got ${String(poolSize)}`)
    }
    if (!(timeoutMs > 0)) {
      throw new ConfigurationError(`productionTimeoutMs must be positive, got ${String(timeoutMs)}`)
    }
    this._poolSize = poolSize
    this._timeoutMs = timeoutMs
    this._producer = options.producer ?? defaultInstructionProducer
    this._eventBus = options.eventBus
    this._now = options.now ?? (() => new Date())
  }

  dispatch(mode: DispatchMode, orders: readonly WorkOrder[], options: DispatchOptions = {}): Promise<PipelineRun> {
    switch (mode) {
      case 'parallel':
        return this.dispatchParallel(orders, options)
      case 'sequential':
        return this.dispatchSequential(orders, options)
      case 'dependency_graph':
        return this.dispatchDependencyGraph(orders, options)
    }
  }

  async dispatchParallel(orders: readonly WorkOrder[], options: DispatchOptions = {}): Promise<PipelineRun> {
    assertDispatchable(orders)
    const runId = options.runId ?? generateId('run')
    const startedMs = this._now().getTime()
    const slots: ProductionOutcome[] = orders.map((order) => ({ order }))

    const queue = orders.map((_, index) => index)
    const running: Promise<void>[] = []

    const enqueue = (): void => {
      const index = queue.shift()
      if (index === undefined) return
      const context: ProductionContext = { runId, mode: 'parallel', position: index, label: options.label }
      const p: Promise<void> = this._produceOne(slots[index].order, context, undefined)
        .then((outcome) => {
          slots[index] = outcome
        })
        .finally(() => {
          const idx = running.indexOf(p)
          if (idx !== -1) running.splice(idx, 1)
        })
      running.push(p)
    }

    const initial = Math.min(this._poolSize, queue.length)
    for (let i = 0; i < initial; i++) {
      enqueue()
    }
    while (queue.length > 0) {
      await Promise.race(running)
      enqueue()
    }
    await Promise.all(running)

    return this._finish('parallel', runId, options.label, slots, startedMs)
  }

  async dispatchSequential(orders: readonly WorkOrder[], options: DispatchOptions = {}): Promise<PipelineRun> {
    assertDispatchable(orders)
    return this._runSequential('sequential', orders, options)
  }

  async dispatchDependencyGraph(orders: readonly WorkOrder[], options: DispatchOptions = {}): Promise<PipelineRun> {
    assertDispatchable(orders)
    const sorted = topologicalOrder(
      orders.map((order) => ({ id: order.taskId, dependencies: order.dependencies, order })),
    ).map((node) => node.order)
    return this._runSequential('dependency_graph', sorted, options)
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async _runSequential(
    mode: DispatchMode,
    orders: readonly WorkOrder[],
    options: DispatchOptions,
  ): Promise<PipelineRun> {
    const runId = options.runId ?? generateId('run')
    const startedMs = this._now().getTime()
    const slots: ProductionOutcome[] = orders.map((order) => ({ order }))

    let previous: WorkOrder | undefined
    for (const [position, order] of orders.entries()) {
      const outcome = await this._produceOne(order, { runId, mode, position, label: options.label }, previous)
      slots[position] = outcome
      if (outcome.instruction === undefined) {
        logger.info(
          { runId, taskId: order.taskId, skipped: orders.length - position - 1 },
          'Sequential dispatch stopped at first failure',
        )
        break
      }
      previous = outcome.order
    }

    return this._finish(mode, runId, options.label, slots, startedMs)
  }

  /** Produce one instruction; never rejects */
  private async _produceOne(
    order: WorkOrder,
    context: ProductionContext,
    previous: WorkOrder | undefined,
  ): Promise<ProductionOutcome> {
    const dispatched = markDispatched(order, this._timestamp())
    try {
      let instruction = await this._produceWithTimeout(dispatched, context)
      if (instruction.trim() === '') {
        throw new InstructionProductionError(`Producer returned an empty instruction for ${order.taskId}`, {
          taskId: order.taskId,
        })
      }
      if (previous !== undefined) {
        instruction = appendCarryOver(instruction, previous)
      }
      const completed = markCompleted(dispatched, { ...(order.result ?? {}), instruction }, this._timestamp())
      return { order: completed, instruction }
    } catch (err) {
      const error = toError(err)
      logger.warn({ runId: context.runId, taskId: order.taskId, err: error }, 'Instruction production failed')
      this._eventBus?.emit('workorder:failed', {
        runId: context.runId,
        taskId: order.taskId,
        executorId: order.executorId,
        error: error.message,
      })
      return { order: markFailed(dispatched, error.message, this._timestamp()) }
    }
  }

  private _produceWithTimeout(order: WorkOrder, context: ProductionContext): Promise<string> {
    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new InstructionProductionError(
            `Instruction production timed out after ${String(this._timeoutMs)}ms`,
            { taskId: order.taskId, timeoutMs: this._timeoutMs },
          ),
        )
      }, this._timeoutMs)
    })
    const production = Promise.resolve().then(() => this._producer(order, context))
    // The losing side of the race may still settle; keep it observed
    void production.catch((err: unknown) => {
      logger.debug({ taskId: order.taskId, err }, 'Production settled after the race')
    })
    return Promise.race([production, timeout]).finally(() => {
      if (timer !== undefined) clearTimeout(timer)
    })
  }

  private _finish(
    mode: DispatchMode,
    runId: RunId,
    label: string | undefined,
    slots: readonly ProductionOutcome[],
    startedMs: number,
  ): PipelineRun {
    const workOrders = slots.map((slot) => detachOrder(slot.order))
    const entries = slots.flatMap((slot) =>
      slot.instruction === undefined
        ? []
        : [{ taskId: slot.order.taskId, executorId: slot.order.executorId, instruction: slot.instruction }],
    )
    const successCount = workOrders.filter((o) => o.status === 'completed').length
    const failureCount = workOrders.filter((o) => o.status === 'failed').length
    const generatedAt = this._timestamp()

    const instructionBatch = renderInstructionBatch(
      { runId, mode, label, total: workOrders.length, produced: successCount, failed: failureCount, generatedAt },
      entries,
    )

    const run: PipelineRun = {
      runId,
      mode,
      ...(label !== undefined ? { label } : {}),
      status: failureCount === 0 ? 'completed' : 'failed',
      workOrders,
      elapsedMs: this._now().getTime() - startedMs,
      successCount,
      failureCount,
      instructionBatch,
      generatedAt,
    }
    deepFreeze(run)

    logger.info({ runId, mode, label, successCount, failureCount }, 'Pipeline dispatch finished')
    this._eventBus?.emit('pipeline:dispatched', {
      runId,
      mode,
      ...(label !== undefined ? { label } : {}),
      successCount,
      failureCount,
      elapsedMs: run.elapsedMs,
    })
    return run
  }

  private _timestamp(): string {
    return this._now().toISOString()
  }
}

// ---------------------------------------------------------------------------
// Input checks
// ---------------------------------------------------------------------------

/** Copy an order so freezing the run leaves the caller's objects alone */
function detachOrder(order: WorkOrder): WorkOrder {
  return {
    ...order,
    dependencies: new Set(order.dependencies),
    ...(order.result !== undefined ? { result: structuredClone(order.result) } : {}),
  }
}

function assertDispatchable(orders: readonly WorkOrder[]): void {
  const seen = new Set<string>()
  for (const order of orders) {
    if (seen.has(order.taskId)) {
      throw new ConfigurationError(`Duplicate work order id "${order.taskId}"`, { taskId: order.taskId })
    }
    seen.add(order.taskId)
    if (order.status !== 'pending') {
      throw new ConfigurationError(`Work order "${order.taskId}" is ${order.status}, expected pending`, {
        taskId: order.taskId,
        status: order.status,
      })
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createPipelineScheduler(options: PipelineSchedulerOptions = {}): PipelineScheduler {
  return new PipelineSchedulerImpl(options)
}
