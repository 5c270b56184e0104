/**
 * Migration 001: feedback loop state.
 *
 * feedback_loops holds the active set, one row per loop, unique per
 * (run_id, stage, work_order_id). feedback_history is append-only apart
 * from retention pruning.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

const LOOP_COLUMNS = `
        root_loop_id         TEXT NOT NULL,
        run_id               TEXT NOT NULL,
        stage                TEXT NOT NULL,
        executor_id          TEXT NOT NULL,
        work_order_id        TEXT NOT NULL,
        original_instruction TEXT NOT NULL,
        validation_result    TEXT,
        failure_reason       TEXT NOT NULL DEFAULT '',
        failure_history      TEXT NOT NULL DEFAULT '[]',
        retry_count          INTEGER NOT NULL DEFAULT 0,
        max_retries          INTEGER NOT NULL,
        has_escalated        INTEGER NOT NULL DEFAULT 0,
        escalated_from       TEXT,
        metadata             TEXT NOT NULL DEFAULT '{}',
        created_at           TEXT NOT NULL,
        updated_at           TEXT NOT NULL`

export const feedbackStateMigration: Migration = {
  version: 1,
  name: '001-feedback-state',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS feedback_loops (
        loop_id              TEXT PRIMARY KEY,${LOOP_COLUMNS},
        UNIQUE (run_id, stage, work_order_id)
      );

      CREATE INDEX IF NOT EXISTS idx_feedback_loops_run ON feedback_loops(run_id);

      CREATE TABLE IF NOT EXISTS feedback_history (
        id                   INTEGER PRIMARY KEY AUTOINCREMENT,
        loop_id              TEXT NOT NULL UNIQUE,${LOOP_COLUMNS},
        outcome              TEXT NOT NULL CHECK(outcome IN ('resolved','aborted','escalated','expired')),
        closed_at            TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_feedback_history_run ON feedback_history(run_id);
      CREATE INDEX IF NOT EXISTS idx_feedback_history_closed ON feedback_history(closed_at);
    `)
  },
}
