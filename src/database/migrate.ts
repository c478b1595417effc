/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied.
 * Migrations are idempotent - safe to run multiple times.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';

import { getDb } from './connection.js';
import { validateRows } from './validation.js';

/**
 * Result of running migrations.
 *
 * Provides explicit success/failure information instead of throwing.
 */
export interface MigrationResult {
  /** Names of migrations that were successfully applied */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

/** Databases whose migrations were checked this process */
const initialized = new WeakSet<Database.Database>();

// Embedded migrations (no SQL files to locate at run time)
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-knowledge-chunks.sql',
    sql: `
-- Rule passages split from the knowledge resources.
-- seq is the stable rowid the full-text index points at.
CREATE TABLE IF NOT EXISTS knowledge_chunks (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT UNIQUE NOT NULL,
  source TEXT NOT NULL,
  chunk_key TEXT NOT NULL,
  content TEXT NOT NULL,
  embedding BLOB,                  -- NULL when embedding failed or was skipped
  embedding_model TEXT,
  dimensions INTEGER,
  metadata TEXT,                   -- JSON object (article, zone_unit, land_use)
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_knowledge_chunks_source ON knowledge_chunks(source);
    `.trim(),
  },
  {
    name: '002-knowledge-fts.sql',
    sql: `
-- Full-text index over keys and passages, kept in sync by triggers
CREATE VIRTUAL TABLE IF NOT EXISTS knowledge_fts USING fts5(
  chunk_key,
  content,
  content='knowledge_chunks',
  content_rowid='seq',
  tokenize='unicode61 remove_diacritics 2'
);

CREATE TRIGGER IF NOT EXISTS knowledge_chunks_ai AFTER INSERT ON knowledge_chunks BEGIN
  INSERT INTO knowledge_fts(rowid, chunk_key, content) VALUES (new.seq, new.chunk_key, new.content);
END;

CREATE TRIGGER IF NOT EXISTS knowledge_chunks_ad AFTER DELETE ON knowledge_chunks BEGIN
  INSERT INTO knowledge_fts(knowledge_fts, rowid, chunk_key, content)
  VALUES ('delete', old.seq, old.chunk_key, old.content);
END;

CREATE TRIGGER IF NOT EXISTS knowledge_chunks_au AFTER UPDATE ON knowledge_chunks BEGIN
  INSERT INTO knowledge_fts(knowledge_fts, rowid, chunk_key, content)
  VALUES ('delete', old.seq, old.chunk_key, old.content);
  INSERT INTO knowledge_fts(rowid, chunk_key, content) VALUES (new.seq, new.chunk_key, new.content);
END;
    `.trim(),
  },
];

const MigrationNameSchema = z.object({ name: z.string() });
const AppliedMigrationSchema = z.object({ name: z.string(), applied_at: z.string() });

function migrationsTableExists(db: Database.Database): boolean {
  return (
    db.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'").get() !==
    undefined
  );
}

/**
 * Run all pending migrations.
 *
 * Failed migrations do not stop subsequent migrations from being attempted.
 *
 * @example
 * ```ts
 * const result = runMigrations();
 * for (const { name, error } of result.failed) {
 *   console.error(`  - ${name}: ${error}`);
 * }
 * ```
 */
export function runMigrations(db: Database.Database = getDb()): MigrationResult {
  // Fast path: already checked this process
  if (initialized.has(db)) {
    return { applied: [], failed: [] };
  }

  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const appliedMigrations = new Set<string>(
    validateRows(MigrationNameSchema, db.prepare('SELECT name FROM _migrations').all(), '_migrations').map(
      (row) => row.name
    )
  );

  for (const migration of MIGRATIONS) {
    if (appliedMigrations.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();

      applied.push(migration.name);
      appliedMigrations.add(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // Only cache state if no failures, so the next run retries
  if (failed.length === 0) {
    initialized.add(db);
  }

  return { applied, failed };
}

/**
 * Check if migrations are needed.
 */
export function hasPendingMigrations(db: Database.Database = getDb()): boolean {
  if (!migrationsTableExists(db)) {
    return true;
  }
  return getAppliedMigrations(db).length < MIGRATIONS.length;
}

/**
 * Get list of applied migrations, oldest first.
 */
export function getAppliedMigrations(
  db: Database.Database = getDb()
): Array<{ name: string; applied_at: string }> {
  if (!migrationsTableExists(db)) {
    return [];
  }
  return validateRows(
    AppliedMigrationSchema,
    db.prepare('SELECT name, applied_at FROM _migrations ORDER BY id').all(),
    '_migrations'
  );
}

/**
 * Get count of available migrations.
 */
export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
