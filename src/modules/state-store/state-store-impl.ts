/**
 * StateStoreImpl: in-memory maps mirrored to SQLite.
 */

import { ConfigurationError, PersistenceError } from '../../core/errors.js'
import type { LoopId } from '../../core/types.js'
import { DatabaseWrapper } from '../../persistence/database.js'
import { runMigrations } from '../../persistence/migrations/index.js'
import {
  deleteFeedbackLoop,
  deleteHistoryBefore,
  insertHistoryEntry,
  listFeedbackLoops,
  listHistoryEntries,
  upsertFeedbackLoop,
} from '../../persistence/queries/feedback-loops.js'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { deepFreeze, toError } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { StateStore } from './state-store.js'
import { DEFAULT_HISTORY_RETENTION_MS, DEFAULT_LOOP_MAX_AGE_MS } from './types.js'
import type {
  CleanupOptions,
  CleanupReport,
  FeedbackContext,
  FeedbackHistoryEntry,
  LoopFilter,
  LoopKey,
  LoopOutcome,
  StateStoreOptions,
} from './types.js'

const logger = createLogger('state-store')

function keyOf(key: LoopKey): string {
  return JSON.stringify([key.runId, key.stage, key.workOrderId])
}

function matches(record: FeedbackContext, filter: LoopFilter): boolean {
  return (
    (filter.runId === undefined || record.runId === filter.runId) &&
    (filter.stage === undefined || record.stage === filter.stage) &&
    (filter.loopId === undefined || record.loopId === filter.loopId)
  )
}

export class StateStoreImpl implements StateStore {
  private readonly _wrapper: DatabaseWrapper
  private readonly _now: () => Date
  private readonly _active = new Map<LoopId, FeedbackContext>()
  private readonly _byKey = new Map<string, LoopId>()
  private _history: FeedbackHistoryEntry[] = []
  private _persistenceFailures = 0

  constructor(options: StateStoreOptions = {}) {
    this._wrapper = new DatabaseWrapper(options.databasePath ?? ':memory:')
    this._now = options.now ?? (() => new Date())
  }

  get persistenceFailures(): number {
    return this._persistenceFailures
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async initialize(): Promise<void> {
    try {
      this._wrapper.open()
      runMigrations(this._wrapper.db)
      this.reload()
    } catch (err) {
      this._recordFailure('initialize', err)
    }
    logger.info(
      { path: this._wrapper.path, active: this._active.size, history: this._history.length },
      'State store initialized',
    )
  }

  async shutdown(): Promise<void> {
    this._wrapper.close()
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  getActive(loopId: LoopId): FeedbackContext | undefined {
    return this._active.get(loopId)
  }

  findActiveByKey(key: LoopKey): FeedbackContext | undefined {
    const loopId = this._byKey.get(keyOf(key))
    return loopId === undefined ? undefined : this._active.get(loopId)
  }

  listActive(filter: LoopFilter = {}): FeedbackContext[] {
    return [...this._active.values()].filter((ctx) => matches(ctx, filter))
  }

  listHistory(filter: LoopFilter = {}): FeedbackHistoryEntry[] {
    return this._history.filter((entry) => matches(entry, filter))
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  putActive(context: FeedbackContext): FeedbackContext {
    const key = keyOf(context)
    const holder = this._byKey.get(key)
    if (holder !== undefined && holder !== context.loopId) {
      throw new ConfigurationError(
        `An active feedback loop already exists for ${context.runId}/${context.stage}/${context.workOrderId}`,
        { loopId: holder, runId: context.runId, stage: context.stage, workOrderId: context.workOrderId },
      )
    }
    if (this._history.some((entry) => entry.loopId === context.loopId)) {
      throw new ConfigurationError(`Feedback loop ${context.loopId} is already closed`, { loopId: context.loopId })
    }

    const frozen = deepFreeze({ ...context })
    this._active.set(frozen.loopId, frozen)
    this._byKey.set(key, frozen.loopId)
    this._write('putActive', (db) => {
      upsertFeedbackLoop(db, frozen)
    })
    return frozen
  }

  closeLoop(loopId: LoopId, outcome: LoopOutcome): FeedbackHistoryEntry | undefined {
    const ctx = this._active.get(loopId)
    if (ctx === undefined) {
      return undefined
    }
    const entry: FeedbackHistoryEntry = deepFreeze({ ...ctx, outcome, closedAt: this._now().toISOString() })

    this._active.delete(loopId)
    this._byKey.delete(keyOf(ctx))
    this._history.push(entry)

    this._write('closeLoop', (db) => {
      deleteFeedbackLoop(db, loopId)
      insertHistoryEntry(db, entry)
    })
    logger.debug({ loopId, outcome }, 'Feedback loop closed')
    return entry
  }

  cleanup(options: CleanupOptions = {}): CleanupReport {
    const nowMs = this._now().getTime()
    const maxAge = options.maxActiveAgeMs ?? DEFAULT_LOOP_MAX_AGE_MS
    const retention = options.historyRetentionMs ?? DEFAULT_HISTORY_RETENTION_MS

    const expired = [...this._active.values()].filter((ctx) => nowMs - Date.parse(ctx.createdAt) > maxAge)
    for (const ctx of expired) {
      this.closeLoop(ctx.loopId, 'expired')
    }

    const cutoffMs = nowMs - retention
    const kept = this._history.filter((entry) => Date.parse(entry.closedAt) >= cutoffMs)
    const prunedHistory = this._history.length - kept.length
    this._history = kept
    if (prunedHistory > 0) {
      const cutoff = new Date(cutoffMs).toISOString()
      this._write('cleanup', (db) => {
        deleteHistoryBefore(db, cutoff)
      })
    }

    const report: CleanupReport = { expiredLoops: expired.length, prunedHistory }
    logger.info(report, 'State store cleanup finished')
    return report
  }

  reload(): void {
    const db = this._wrapper.db
    const active = listFeedbackLoops(db)
    const history = listHistoryEntries(db)

    this._active.clear()
    this._byKey.clear()
    for (const ctx of active) {
      const frozen = deepFreeze(ctx)
      this._active.set(frozen.loopId, frozen)
      this._byKey.set(keyOf(frozen), frozen.loopId)
    }
    this._history = history.map((entry) => deepFreeze(entry))
    logger.debug({ active: active.length, history: history.length }, 'State reloaded')
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private _write(operation: string, fn: (db: BetterSqlite3Database) => void): void {
    try {
      const db = this._wrapper.db
      db.transaction(() => {
        fn(db)
      })()
    } catch (err) {
      this._recordFailure(operation, err)
    }
  }

  private _recordFailure(operation: string, err: unknown): void {
    this._persistenceFailures++
    const cause = toError(err)
    const error = new PersistenceError(`State store ${operation} failed: ${cause.message}`, {
      operation,
      path: this._wrapper.path,
    })
    logger.error({ err: error, cause }, 'State persistence failed; continuing with in-memory state')
  }
}

export function createStateStore(options: StateStoreOptions = {}): StateStore {
  return new StateStoreImpl(options)
}
