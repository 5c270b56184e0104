/**
 * DatabaseWrapper: thin wrapper around better-sqlite3.
 *
 * Opens a SQLite database with the required PRAGMAs and exposes the raw
 * instance for the query modules.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { PersistenceError } from '../core/errors.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
  }

  /**
   * Open the database and apply PRAGMAs. Idempotent.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    logger.debug({ path: this._path }, 'Opening SQLite database')
    if (this._path !== ':memory:') {
      mkdirSync(dirname(this._path), { recursive: true })
    }
    const db = new BetterSqlite3(this._path)

    // In-memory databases report "memory" here
    const journalMode: unknown = db.pragma('journal_mode = WAL', { simple: true })
    if (journalMode !== 'wal') {
      logger.debug({ journalMode }, 'WAL journal mode not available')
    }
    db.pragma('busy_timeout = 5000')
    db.pragma('synchronous = NORMAL')
    db.pragma('foreign_keys = ON')

    this._db = db
    logger.debug({ path: this._path, journalMode }, 'SQLite database opened')
  }

  /** Close the database. Idempotent. */
  close(): void {
    if (this._db === null) {
      return
    }
    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'SQLite database closed')
  }

  /**
   * @throws {PersistenceError} if the database is not open
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new PersistenceError('Database is not open', { path: this._path })
    }
    return this._db
  }

  get isOpen(): boolean {
    return this._db !== null
  }

  get path(): string {
    return this._path
  }
}
