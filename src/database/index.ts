/**
 * Database Module
 *
 * SQLite storage for the rule-passage knowledge base.
 *
 * @example
 * ```ts
 * import { getDb, runMigrations, KnowledgeStore } from './database/index.js';
 *
 * runMigrations();
 * const store = new KnowledgeStore(getDb());
 * const rows = store.searchByKeyword('odmik od parcelne meje', 20);
 * ```
 */

// Connection management (low-level)
export { getDb, closeDb, getDbPath, openDatabase } from './connection.js';

// Migration utilities
export {
  runMigrations,
  hasPendingMigrations,
  getAppliedMigrations,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

// Schema types
export type { KnowledgeChunkRecord, KnowledgeChunkInput, ChunkMetadata } from './schema.js';

// Utility functions
export { embeddingToBlob, blobToEmbedding } from './schema.js';

// Validation schemas and utilities
export {
  KnowledgeChunkRowSchema,
  KeywordHitRowSchema,
  EmbeddingRowSchema,
  ChunkMetadataSchema,
  type KnowledgeChunkRow,
  type KeywordHitRow,
  type EmbeddingRow,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';

// Retrieval backend
export {
  KnowledgeStore,
  toMatchExpression,
  MAX_MATCH_TOKENS,
  type KnowledgeStoreOptions,
  type SourceSummary,
} from './knowledge-store.js';
