/**
 * Query functions for the feedback_loops and feedback_history tables.
 *
 * Callers own transaction boundaries; every function here issues plain
 * statements against the handle it is given.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import {
  FeedbackContextSchema,
  FeedbackHistoryEntrySchema,
} from '../../modules/state-store/types.js'
import type { FeedbackContext, FeedbackHistoryEntry } from '../../modules/state-store/types.js'
import { FeedbackHistoryRowSchema, FeedbackLoopRowSchema } from '../schemas/feedback.js'
import type { FeedbackLoopRow } from '../schemas/feedback.js'

// ---------------------------------------------------------------------------
// Row conversion
// ---------------------------------------------------------------------------

function parseJson(text: string): unknown {
  return JSON.parse(text)
}

function rowFields(row: FeedbackLoopRow): Record<string, unknown> {
  return {
    loopId: row.loop_id,
    rootLoopId: row.root_loop_id,
    runId: row.run_id,
    stage: row.stage,
    executorId: row.executor_id,
    workOrderId: row.work_order_id,
    originalInstruction: row.original_instruction,
    validationResult: row.validation_result === null ? null : parseJson(row.validation_result),
    failureReason: row.failure_reason,
    failureHistory: parseJson(row.failure_history),
    retryCount: row.retry_count,
    maxRetries: row.max_retries,
    hasEscalated: row.has_escalated === 1,
    escalatedFrom: row.escalated_from,
    metadata: parseJson(row.metadata),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function contextParams(ctx: FeedbackContext): unknown[] {
  return [
    ctx.loopId,
    ctx.rootLoopId,
    ctx.runId,
    ctx.stage,
    ctx.executorId,
    ctx.workOrderId,
    ctx.originalInstruction,
    ctx.validationResult === null ? null : JSON.stringify(ctx.validationResult),
    ctx.failureReason,
    JSON.stringify(ctx.failureHistory),
    ctx.retryCount,
    ctx.maxRetries,
    ctx.hasEscalated ? 1 : 0,
    ctx.escalatedFrom,
    JSON.stringify(ctx.metadata),
    ctx.createdAt,
    ctx.updatedAt,
  ]
}

const COLUMNS = `loop_id, root_loop_id, run_id, stage, executor_id, work_order_id, original_instruction,
  validation_result, failure_reason, failure_history, retry_count, max_retries, has_escalated,
  escalated_from, metadata, created_at, updated_at`

// ---------------------------------------------------------------------------
// Active loops
// ---------------------------------------------------------------------------

/**
 * Insert a loop, or replace every mutable column of an existing one.
 */
export function upsertFeedbackLoop(db: BetterSqlite3Database, ctx: FeedbackContext): void {
  db.prepare(
    `INSERT INTO feedback_loops (${COLUMNS})
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(loop_id) DO UPDATE SET
       executor_id = excluded.executor_id,
       validation_result = excluded.validation_result,
       failure_reason = excluded.failure_reason,
       failure_history = excluded.failure_history,
       retry_count = excluded.retry_count,
       has_escalated = excluded.has_escalated,
       metadata = excluded.metadata,
       updated_at = excluded.updated_at`,
  ).run(...contextParams(ctx))
}

export function deleteFeedbackLoop(db: BetterSqlite3Database, loopId: string): number {
  return db.prepare('DELETE FROM feedback_loops WHERE loop_id = ?').run(loopId).changes
}

/** All active loops, oldest first */
export function listFeedbackLoops(db: BetterSqlite3Database): FeedbackContext[] {
  const rows = z
    .array(FeedbackLoopRowSchema)
    .parse(db.prepare('SELECT * FROM feedback_loops ORDER BY created_at ASC, rowid ASC').all())
  return rows.map((row) => FeedbackContextSchema.parse(rowFields(row)))
}

// ---------------------------------------------------------------------------
// History
// ---------------------------------------------------------------------------

export function insertHistoryEntry(db: BetterSqlite3Database, entry: FeedbackHistoryEntry): void {
  db.prepare(
    `INSERT INTO feedback_history (${COLUMNS}, outcome, closed_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(...contextParams(entry), entry.outcome, entry.closedAt)
}

/** All history entries in the order they were closed */
export function listHistoryEntries(db: BetterSqlite3Database): FeedbackHistoryEntry[] {
  const rows = z
    .array(FeedbackHistoryRowSchema)
    .parse(db.prepare('SELECT * FROM feedback_history ORDER BY id ASC').all())
  return rows.map((row) =>
    FeedbackHistoryEntrySchema.parse({ ...rowFields(row), outcome: row.outcome, closedAt: row.closed_at }),
  )
}

/**
 * Remove history entries closed before the cutoff (ISO-8601).
 * @returns the number of rows removed
 */
export function deleteHistoryBefore(db: BetterSqlite3Database, cutoff: string): number {
  return db.prepare('DELETE FROM feedback_history WHERE closed_at < ?').run(cutoff).changes
}
