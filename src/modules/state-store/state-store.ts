/**
 * StateStore: durable table of active feedback loops plus an append-only history.
 *
 * The in-memory view is authoritative for the life of the process. Every
 * mutation is also written to SQLite in one transaction; a failed write is
 * logged and counted but never surfaces to the caller.
 */

import type { BaseService } from '../../core/di.js'
import type { LoopId } from '../../core/types.js'
import type {
  CleanupOptions,
  CleanupReport,
  FeedbackContext,
  FeedbackHistoryEntry,
  LoopFilter,
  LoopKey,
  LoopOutcome,
} from './types.js'

export interface StateStore extends BaseService {
  getActive(loopId: LoopId): FeedbackContext | undefined

  findActiveByKey(key: LoopKey): FeedbackContext | undefined

  /** Active loops, oldest first */
  listActive(filter?: LoopFilter): FeedbackContext[]

  /**
   * Insert or replace an active loop.
   * @throws {ConfigurationError} if another active loop already holds the same key
   */
  putActive(context: FeedbackContext): FeedbackContext

  /**
   * Remove a loop from the active set and append it to history.
   * @returns the history entry, or undefined if the loop was not active
   */
  closeLoop(loopId: LoopId, outcome: LoopOutcome): FeedbackHistoryEntry | undefined

  /** History entries in closing order */
  listHistory(filter?: LoopFilter): FeedbackHistoryEntry[]

  /** Expire old active loops and prune old history */
  cleanup(options?: CleanupOptions): CleanupReport

  /** Replace the in-memory view with the persisted state */
  reload(): void

  /** Number of writes that failed since the store was created */
  readonly persistenceFailures: number
}
