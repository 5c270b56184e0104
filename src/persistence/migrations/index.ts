/**
 * Migration runner for the SQLite persistence layer.
 *
 * Keeps a `schema_migrations` table and applies pending migrations in version
 * order, each inside its own transaction. Safe to call repeatedly.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { feedbackStateMigration } from './001-feedback-state.js'

const logger = createLogger('persistence:migrations')

export interface Migration {
  /** Unique version number */
  version: number
  name: string
  /** Must be idempotent */
  up(db: BetterSqlite3Database): void
}

// Add new migrations here in version order
const MIGRATIONS: Migration[] = [feedbackStateMigration]

const AppliedRowSchema = z.object({ version: z.number().int() })

export function runMigrations(db: BetterSqlite3Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT    NOT NULL,
      applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const applied = new Set(
    z
      .array(AppliedRowSchema)
      .parse(db.prepare('SELECT version FROM schema_migrations').all())
      .map((row) => row.version),
  )

  const pending = MIGRATIONS.filter((m) => !applied.has(m.version)).sort((a, b) => a.version - b.version)
  if (pending.length === 0) {
    logger.debug('No pending migrations')
    return
  }

  const insertMigration = db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')

  for (const migration of pending) {
    logger.debug({ version: migration.version, name: migration.name }, 'Applying migration')
    const apply = db.transaction(() => {
      migration.up(db)
      insertMigration.run(migration.version, migration.name)
    })
    apply()
  }

  logger.info({ count: pending.length }, 'Migrations applied')
}
