/**
 * Database Connection Module
 *
 * Provides a singleton SQLite connection using better-sqlite3.
 * The database is stored at ~/.zctx/knowledge.db (or $ZCTX_HOME/knowledge.db).
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';

import { getDataDir, getDbPath } from '../config/paths.js';

// Module-level singleton instance
let db: Database.Database | null = null;
let cleanupRegistered = false;

/**
 * Open a database with the pragmas the knowledge store relies on.
 *
 * Pass ':memory:' for an in-process database (tests).
 */
export function openDatabase(path: string): Database.Database {
  const database = new Database(path);

  database.pragma('foreign_keys = ON');
  if (path !== ':memory:') {
    // WAL for concurrent reads while an ingest is running
    database.pragma('journal_mode = WAL');
  }
  return database;
}

/**
 * Get the singleton database instance.
 *
 * Creates the database and data directory on first call.
 * Subsequent calls return the same instance.
 *
 * @example
 * ```ts
 * const db = getDb();
 * const count = db.prepare('SELECT COUNT(*) AS count FROM knowledge_chunks').get();
 * ```
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  const dir = getDataDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  db = openDatabase(getDbPath());

  if (!cleanupRegistered) {
    cleanupRegistered = true;
    registerCleanup();
  }

  return db;
}

/**
 * Close the connection when the process exits or is interrupted.
 */
function registerCleanup(): void {
  process.on('exit', () => closeDb());
  process.on('SIGINT', () => {
    closeDb();
    process.exit(0);
  });
  process.on('SIGTERM', () => {
    closeDb();
    process.exit(0);
  });
}

/**
 * Close the database connection.
 *
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

export { getDbPath };
