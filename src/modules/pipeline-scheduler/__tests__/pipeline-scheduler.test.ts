/**
 * Tests for PipelineSchedulerImpl: parallel, sequential and dependency-graph dispatch.
 */

import { describe, it, expect, vi } from 'vitest'
import { createPipelineScheduler } from '../index.js'
import type { InstructionProducer } from '../index.js'
import { createWorkOrder } from '../../work-order/index.js'
import type { WorkOrder } from '../../work-order/index.js'
import { createEventBus } from '../../../core/event-bus.js'
import { ConfigurationError, DependencyCycleError } from '../../../core/errors.js'

const FIXED_NOW = new Date('2026-03-01T10:00:00.000Z')

function makeOrders(ids: string[], deps: Record<string, string[]> = {}): WorkOrder[] {
  return ids.map((taskId) =>
    createWorkOrder({
      taskId,
      executorId: 'backend-developer',
      description: `Build ${taskId}`,
      dependencies: deps[taskId] ?? [],
    }),
  )
}

const echoProducer: InstructionProducer = (order) => `do ${order.taskId}`

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

// ---------------------------------------------------------------------------
// Parallel
// ---------------------------------------------------------------------------

describe('dispatchParallel', () => {
  it('records one production failure without dropping siblings', async () => {
    const scheduler = createPipelineScheduler({
      now: () => FIXED_NOW,
      producer: (order) => {
        if (order.taskId === 'b') throw new Error('template missing')
        return `do ${order.taskId}`
      },
    })

    const run = await scheduler.dispatchParallel(makeOrders(['a', 'b', 'c']), { runId: 'run-a' })

    expect(run.successCount).toBe(2)
    expect(run.failureCount).toBe(1)
    expect(run.status).toBe('failed')
    expect(run.workOrders.map((o) => o.status)).toEqual(['completed', 'failed', 'completed'])
    expect(run.workOrders[1]?.error).toBe('template missing')
    expect(run.instructionBatch).toBe(
      [
        '# Instruction batch run-a',
        '# Mode: parallel',
        '# Work orders: 3, produced: 2, failed: 1',
        '# Generated: 2026-03-01T10:00:00.000Z',
        '',
        '<function_calls>',
        '  <invoke name="Task">',
        '    <parameter name="subagent_type">backend-developer</parameter>',
        '    <parameter name="prompt">do a</parameter>',
        '  </invoke>',
        '  <invoke name="Task">',
        '    <parameter name="subagent_type">backend-developer</parameter>',
        '    <parameter name="prompt">do c</parameter>',
        '  </invoke>',
        '</function_calls>',
        '',
      ].join('\n'),
    )
  })

  it.each([0, 1, 7, 25])('returns every work order for %i inputs', async (count) => {
    const ids = Array.from({ length: count }, (_, i) => `wo-${String(i)}`)
    const scheduler = createPipelineScheduler({ producer: echoProducer })
    const run = await scheduler.dispatchParallel(makeOrders(ids))
    expect(run.workOrders).toHaveLength(count)
    expect(run.successCount + run.failureCount).toBe(count)
  })

  it('keeps input order when later work orders finish first', async () => {
    const delays: Record<string, number> = { a: 30, b: 10, c: 1 }
    const scheduler = createPipelineScheduler({
      producer: async (order) => {
        await delay(delays[order.taskId] ?? 0)
        return `do ${order.taskId}`
      },
    })

    const run = await scheduler.dispatchParallel(makeOrders(['a', 'b', 'c']))

    expect(run.workOrders.map((o) => o.taskId)).toEqual(['a', 'b', 'c'])
    const batch = run.instructionBatch
    expect(batch.indexOf('do a')).toBeLessThan(batch.indexOf('do b'))
    expect(batch.indexOf('do b')).toBeLessThan(batch.indexOf('do c'))
  })

  it('never runs more production units than the pool size', async () => {
    let active = 0
    let peak = 0
    const scheduler = createPipelineScheduler({
      workerPoolSize: 2,
      producer: async (order) => {
        active++
        peak = Math.max(peak, active)
        await delay(5)
        active--
        return `do ${order.taskId}`
      },
    })

    const run = await scheduler.dispatchParallel(makeOrders(['a', 'b', 'c', 'd', 'e', 'f']))

    expect(run.successCount).toBe(6)
    expect(peak).toBe(2)
  })

  it('fails a unit that exceeds the production timeout', async () => {
    const scheduler = createPipelineScheduler({
      productionTimeoutMs: 20,
      producer: (order) => (order.taskId === 'slow' ? new Promise<string>(() => undefined) : `do ${order.taskId}`),
    })

    const run = await scheduler.dispatchParallel(makeOrders(['fast', 'slow']))

    expect(run.workOrders[0]?.status).toBe('completed')
    expect(run.workOrders[1]?.status).toBe('failed')
    expect(run.workOrders[1]?.error).toBe('Instruction production timed out after 20ms')
  })

  it('treats an empty instruction as a production failure', async () => {
    const scheduler = createPipelineScheduler({ producer: () => '   ' })
    const run = await scheduler.dispatchParallel(makeOrders(['a']))
    expect(run.workOrders[0]?.error).toBe('Producer returned an empty instruction for a')
  })

  it('returns a vacuously successful run for no work orders', async () => {
    const scheduler = createPipelineScheduler({ now: () => FIXED_NOW })
    const run = await scheduler.dispatchParallel([], { runId: 'run-empty' })
    expect(run.status).toBe('completed')
    expect(run.successCount).toBe(0)
    expect(run.failureCount).toBe(0)
    expect(run.instructionBatch).toBe(
      [
        '# Instruction batch run-empty',
        '# Mode: parallel',
        '# Work orders: 0, produced: 0, failed: 0',
        '# Generated: 2026-03-01T10:00:00.000Z',
        '',
      ].join('\n'),
    )
  })

  it('freezes the returned run', async () => {
    const scheduler = createPipelineScheduler({ producer: echoProducer })
    const run = await scheduler.dispatchParallel(makeOrders(['a']))
    expect(Object.isFrozen(run)).toBe(true)
    expect(Object.isFrozen(run.workOrders)).toBe(true)
    expect(Object.isFrozen(run.workOrders[0])).toBe(true)
  })

  it('escapes markup in executor prompts', async () => {
    const scheduler = createPipelineScheduler({ producer: () => 'compare <a> & <b>' })
    const run = await scheduler.dispatchParallel(makeOrders(['a']))
    expect(run.instructionBatch).toContain(
      '<parameter name="prompt">compare &lt;a&gt; &amp; &lt;b&gt;</parameter>',
    )
  })

  it('emits workorder:failed and pipeline:dispatched', async () => {
    const bus = createEventBus()
    const failed = vi.fn()
    const dispatched = vi.fn()
    bus.on('workorder:failed', failed)
    bus.on('pipeline:dispatched', dispatched)
    const scheduler = createPipelineScheduler({
      eventBus: bus,
      now: () => FIXED_NOW,
      producer: (order) => {
        if (order.taskId === 'b') throw new Error('boom')
        return 'ok'
      },
    })

    await scheduler.dispatchParallel(makeOrders(['a', 'b']), { runId: 'run-ev', label: 'implementation' })

    expect(failed).toHaveBeenCalledWith({
      runId: 'run-ev',
      taskId: 'b',
      executorId: 'backend-developer',
      error: 'boom',
    })
    expect(dispatched).toHaveBeenCalledWith({
      runId: 'run-ev',
      mode: 'parallel',
      label: 'implementation',
      successCount: 1,
      failureCount: 1,
      elapsedMs: 0,
    })
  })

  it('rejects duplicate work order ids', async () => {
    const scheduler = createPipelineScheduler()
    await expect(scheduler.dispatchParallel(makeOrders(['a', 'a']))).rejects.toThrow(ConfigurationError)
  })
})

// ---------------------------------------------------------------------------
// Sequential
// ---------------------------------------------------------------------------

describe('dispatchSequential', () => {
  it('carries the previous reported result into each instruction', async () => {
    const scheduler = createPipelineScheduler({ producer: echoProducer })
    const run = await scheduler.dispatchSequential(makeOrders(['a', 'b']))

    const second = run.workOrders[1]
    expect(second?.result?.instruction).toBe(
      'do b\n\n## Previous step result\n' +
        JSON.stringify({ taskId: 'a', executorId: 'backend-developer', status: 'completed' }, null, 2),
    )
    expect(run.workOrders[0]?.result?.instruction).toBe('do a')
  })

  it('stops at the first failure and leaves the rest pending', async () => {
    const producer = vi.fn<InstructionProducer>((order) => {
      if (order.taskId === 'b') throw new Error('bad input')
      return `do ${order.taskId}`
    })
    const scheduler = createPipelineScheduler({ producer })

    const run = await scheduler.dispatchSequential(makeOrders(['a', 'b', 'c']))

    expect(run.workOrders.map((o) => o.status)).toEqual(['completed', 'failed', 'pending'])
    expect(run.successCount).toBe(1)
    expect(run.failureCount).toBe(1)
    expect(run.status).toBe('failed')
    expect(producer).toHaveBeenCalledTimes(2)
  })

  it('leaves the work orders it was given unfrozen', async () => {
    const orders = [
      createWorkOrder({ taskId: 'a', executorId: 'backend-developer', description: 'Build a', result: { notes: { draft: true } } }),
      createWorkOrder({ taskId: 'b', executorId: 'backend-developer', description: 'Build b' }),
      createWorkOrder({ taskId: 'c', executorId: 'backend-developer', description: 'Build c', result: { notes: { draft: true } } }),
    ]
    const scheduler = createPipelineScheduler({
      producer: (order) => {
        if (order.taskId === 'b') throw new Error('bad input')
        return `do ${order.taskId}`
      },
    })

    const run = await scheduler.dispatchSequential(orders)

    const untouched = run.workOrders[2]
    expect(untouched?.status).toBe('pending')
    expect(untouched).not.toBe(orders[2])
    expect(Object.isFrozen(untouched)).toBe(true)
    expect(Object.isFrozen(orders[2])).toBe(false)
    expect(Object.isFrozen(orders[2]?.result)).toBe(false)
    expect(Object.isFrozen(orders[0]?.result?.notes)).toBe(false)
    expect(run.workOrders[0]?.result).toEqual({ notes: { draft: true }, instruction: 'do a' })
  })

  it('numbers each step in the batch', async () => {
    const scheduler = createPipelineScheduler({ producer: echoProducer })
    const run = await scheduler.dispatchSequential(makeOrders(['a', 'b']))
    expect(run.instructionBatch).toContain('# Step 1/2: a\n<function_calls>')
    expect(run.instructionBatch).toContain('# Step 2/2: b\n<function_calls>')
  })
})

// ---------------------------------------------------------------------------
// Dependency graph
// ---------------------------------------------------------------------------

describe('dispatchDependencyGraph', () => {
  it('orders by dependencies, then fewer dependencies, then declaration order', async () => {
    const scheduler = createPipelineScheduler({ producer: echoProducer })
    const orders = makeOrders(['c', 'a', 'b', 'd'], { c: ['a', 'b'], b: ['a'] })

    const run = await scheduler.dispatchDependencyGraph(orders)

    expect(run.mode).toBe('dependency_graph')
    expect(run.workOrders.map((o) => o.taskId)).toEqual(['a', 'd', 'b', 'c'])
    expect(run.successCount).toBe(4)
  })

  it('raises a configuration error for a cycle before producing anything', async () => {
    const producer = vi.fn<InstructionProducer>(echoProducer)
    const scheduler = createPipelineScheduler({ producer })
    const orders = makeOrders(['a', 'b'], { a: ['b'], b: ['a'] })

    const attempt = scheduler.dispatchDependencyGraph(orders)

    await expect(attempt).rejects.toThrow(DependencyCycleError)
    await expect(attempt).rejects.toThrow(ConfigurationError)
    await expect(attempt).rejects.toThrow('Circular dependency detected: a -> b -> a')
    expect(producer).not.toHaveBeenCalled()
    expect(orders.map((o) => o.status)).toEqual(['pending', 'pending'])
  })

  it('raises a configuration error for an unknown dependency', async () => {
    const scheduler = createPipelineScheduler({ producer: echoProducer })
    await expect(
      scheduler.dispatchDependencyGraph(makeOrders(['a'], { a: ['zzz'] })),
    ).rejects.toThrow('Invalid dependency graph: "a" references unknown dependency "zzz"')
  })

  it('is reachable through dispatch(mode)', async () => {
    const scheduler = createPipelineScheduler({ producer: echoProducer })
    const run = await scheduler.dispatch('dependency_graph', makeOrders(['x', 'y'], { x: ['y'] }))
    expect(run.workOrders.map((o) => o.taskId)).toEqual(['y', 'x'])
  })
})
