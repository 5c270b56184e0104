/**
 * Records held by the State Store.
 */

import { z } from 'zod'
import type { LoopId, RunId, StageName, TaskId } from '../../core/types.js'
import { ValidationResultSchema } from '../feedback-engine/types.js'

// ---------------------------------------------------------------------------
// FeedbackContext
// ---------------------------------------------------------------------------

export const FailureSnapshotSchema = z.object({
  attempt: z.number().int().nonnegative(),
  executorId: z.string(),
  reason: z.string(),
  at: z.string(),
})
export type FailureSnapshot = z.infer<typeof FailureSnapshotSchema>

export const FeedbackContextSchema = z.object({
  loopId: z.string().min(1),
  /** First loop in an escalation chain; equals loopId for an original loop */
  rootLoopId: z.string().min(1),
  runId: z.string().min(1),
  stage: z.string().min(1),
  executorId: z.string().min(1),
  workOrderId: z.string().min(1),
  originalInstruction: z.string(),
  validationResult: ValidationResultSchema.nullable(),
  failureReason: z.string(),
  failureHistory: z.array(FailureSnapshotSchema),
  retryCount: z.number().int().nonnegative(),
  maxRetries: z.number().int().positive(),
  hasEscalated: z.boolean(),
  escalatedFrom: z.string().nullable(),
  metadata: z.record(z.unknown()),
  createdAt: z.string(),
  updatedAt: z.string(),
})

/** One feedback loop; stored values are frozen and replaced on update */
export type FeedbackContext = Readonly<z.infer<typeof FeedbackContextSchema>>

export const LoopOutcomeEnum = z.enum(['resolved', 'aborted', 'escalated', 'expired'])
export type LoopOutcome = z.infer<typeof LoopOutcomeEnum>

export const FeedbackHistoryEntrySchema = FeedbackContextSchema.extend({
  outcome: LoopOutcomeEnum,
  closedAt: z.string(),
})
export type FeedbackHistoryEntry = Readonly<z.infer<typeof FeedbackHistoryEntrySchema>>

// ---------------------------------------------------------------------------
// Queries and maintenance
// ---------------------------------------------------------------------------

/** At most one active loop exists per key */
export interface LoopKey {
  runId: RunId
  stage: StageName
  workOrderId: TaskId
}

export interface LoopFilter {
  runId?: RunId
  stage?: StageName
  loopId?: LoopId
}

export interface CleanupOptions {
  /** Active loops created longer ago than this are closed as expired (default 24h) */
  maxActiveAgeMs?: number
  /** History entries closed longer ago than this are pruned (default 7 days) */
  historyRetentionMs?: number
}

export interface CleanupReport {
  expiredLoops: number
  prunedHistory: number
}

export interface StateStoreOptions {
  /** SQLite file path; ':memory:' keeps state for the process lifetime only */
  databasePath?: string
  now?: () => Date
}

export const DEFAULT_LOOP_MAX_AGE_MS = 24 * 60 * 60 * 1000
export const DEFAULT_HISTORY_RETENTION_MS = 7 * 24 * 60 * 60 * 1000
