/**
 * Tests for StateStoreImpl: active set, history, reload and cleanup.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createStateStore } from '../index.js'
import type { FeedbackContext, StateStore } from '../index.js'
import { ConfigurationError } from '../../../core/errors.js'

const HOUR = 60 * 60 * 1000

function makeContext(overrides: Partial<FeedbackContext> = {}): FeedbackContext {
  return {
    loopId: 'loop-1',
    rootLoopId: 'loop-1',
    runId: 'run-1',
    stage: 'implementation',
    executorId: 'backend-developer',
    workOrderId: 'wo-1',
    originalInstruction: 'Implement the orders endpoint',
    validationResult: {
      success: false,
      failures: [{ type: 'syntax_error', message: 'unexpected token', details: { line: 4 } }],
    },
    failureReason: 'syntax_error: unexpected token',
    failureHistory: [
      { attempt: 1, executorId: 'backend-developer', reason: 'syntax_error', at: '2026-05-01T08:00:00.000Z' },
    ],
    retryCount: 1,
    maxRetries: 3,
    hasEscalated: false,
    escalatedFrom: null,
    metadata: { source: 'unit-test' },
    createdAt: '2026-05-01T08:00:00.000Z',
    updatedAt: '2026-05-01T08:00:00.000Z',
    ...overrides,
  }
}

describe('StateStore (in-memory database)', () => {
  let store: StateStore
  let now: Date

  beforeEach(async () => {
    now = new Date('2026-05-01T09:00:00.000Z')
    store = createStateStore({ now: () => now })
    await store.initialize()
  })

  afterEach(async () => {
    await store.shutdown()
  })

  it('stores and finds an active loop by id and by key', () => {
    store.putActive(makeContext())
    expect(store.getActive('loop-1')?.retryCount).toBe(1)
    expect(
      store.findActiveByKey({ runId: 'run-1', stage: 'implementation', workOrderId: 'wo-1' })?.loopId,
    ).toBe('loop-1')
    expect(store.findActiveByKey({ runId: 'run-1', stage: 'testing', workOrderId: 'wo-1' })).toBeUndefined()
  })

  it('returns frozen records', () => {
    const stored = store.putActive(makeContext())
    expect(Object.isFrozen(stored)).toBe(true)
  })

  it('filters active loops by run and stage', () => {
    store.putActive(makeContext())
    store.putActive(makeContext({ loopId: 'loop-2', rootLoopId: 'loop-2', stage: 'testing' }))
    store.putActive(makeContext({ loopId: 'loop-3', rootLoopId: 'loop-3', runId: 'run-2' }))
    expect(store.listActive({ runId: 'run-1' }).map((c) => c.loopId)).toEqual(['loop-1', 'loop-2'])
    expect(store.listActive({ stage: 'testing' }).map((c) => c.loopId)).toEqual(['loop-2'])
  })

  it('allows one active loop per (run, stage, work order)', () => {
    store.putActive(makeContext())
    expect(() => store.putActive(makeContext({ loopId: 'loop-9', rootLoopId: 'loop-9' }))).toThrow(
      ConfigurationError,
    )
  })

  it('replaces an active loop in place on update', () => {
    store.putActive(makeContext())
    store.putActive(makeContext({ retryCount: 2, updatedAt: '2026-05-01T08:30:00.000Z' }))
    expect(store.listActive()).toHaveLength(1)
    expect(store.getActive('loop-1')?.retryCount).toBe(2)
  })

  it('moves a closed loop from the active set to history', () => {
    store.putActive(makeContext())
    const entry = store.closeLoop('loop-1', 'resolved')

    expect(entry?.outcome).toBe('resolved')
    expect(entry?.closedAt).toBe('2026-05-01T09:00:00.000Z')
    expect(store.getActive('loop-1')).toBeUndefined()
    expect(store.listHistory().map((e) => e.loopId)).toEqual(['loop-1'])
  })

  it('treats closing an inactive loop as a no-op', () => {
    store.putActive(makeContext())
    store.closeLoop('loop-1', 'resolved')
    expect(store.closeLoop('loop-1', 'resolved')).toBeUndefined()
    expect(store.listHistory()).toHaveLength(1)
  })

  it('refuses to reopen a closed loop id', () => {
    store.putActive(makeContext())
    store.closeLoop('loop-1', 'aborted')
    expect(() => store.putActive(makeContext())).toThrow('Feedback loop loop-1 is already closed')
  })

  it('frees the key once a loop closes', () => {
    store.putActive(makeContext())
    store.closeLoop('loop-1', 'escalated')
    store.putActive(makeContext({ loopId: 'loop-2', rootLoopId: 'loop-1', escalatedFrom: 'loop-1' }))
    expect(store.findActiveByKey({ runId: 'run-1', stage: 'implementation', workOrderId: 'wo-1' })?.loopId).toBe(
      'loop-2',
    )
  })

  describe('cleanup', () => {
    it('expires active loops older than the maximum age', () => {
      store.putActive(makeContext({ createdAt: '2026-04-29T08:00:00.000Z' }))
      store.putActive(
        makeContext({ loopId: 'loop-2', rootLoopId: 'loop-2', workOrderId: 'wo-2', createdAt: '2026-05-01T07:00:00.000Z' }),
      )

      const report = store.cleanup()

      expect(report).toEqual({ expiredLoops: 1, prunedHistory: 0 })
      expect(store.listActive().map((c) => c.loopId)).toEqual(['loop-2'])
      expect(store.listHistory()[0]?.outcome).toBe('expired')
    })

    it('prunes history past the retention window', () => {
      store.putActive(makeContext())
      store.closeLoop('loop-1', 'resolved')
      now = new Date(now.getTime() + 3 * HOUR)

      const report = store.cleanup({ historyRetentionMs: 2 * HOUR })

      expect(report).toEqual({ expiredLoops: 0, prunedHistory: 1 })
      expect(store.listHistory()).toEqual([])
    })

    it('honours a custom active age', () => {
      store.putActive(makeContext({ createdAt: '2026-05-01T08:00:00.000Z' }))
      expect(store.cleanup({ maxActiveAgeMs: 30 * 60 * 1000 }).expiredLoops).toBe(1)
    })
  })

  it('keeps in-memory state authoritative when a write fails', async () => {
    await store.shutdown()

    store.putActive(makeContext())

    expect(store.getActive('loop-1')?.loopId).toBe('loop-1')
    expect(store.persistenceFailures).toBe(1)
  })
})

describe('StateStore (file database)', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'taskrelay-state-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('reproduces identical records after a restart', async () => {
    const path = join(dir, 'state.db')
    const first = createStateStore({ databasePath: path, now: () => new Date('2026-05-01T09:00:00.000Z') })
    await first.initialize()
    first.putActive(makeContext())
    first.putActive(makeContext({ loopId: 'loop-2', rootLoopId: 'loop-2', workOrderId: 'wo-2', retryCount: 0 }))
    first.closeLoop('loop-2', 'resolved')
    const activeBefore = first.listActive()
    const historyBefore = first.listHistory()
    await first.shutdown()

    const second = createStateStore({ databasePath: path })
    await second.initialize()

    expect(second.listActive()).toEqual(activeBefore)
    expect(second.listHistory()).toEqual(historyBefore)
    expect(second.persistenceFailures).toBe(0)
    await second.shutdown()
  })
})
