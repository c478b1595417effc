/**
 * Knowledge Store
 *
 * SQLite-backed retrieval backend for rule passages:
 * - vector search: brute-force cosine over stored embeddings, which are
 *   loaded into memory once and dropped whenever the table is written
 * - keyword search: FTS5 MATCH scored by bm25
 * - embedding lookup for MMR
 *
 * Rows are returned as plain records; the retrieval engine's normalizer maps
 * their field names.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';

import { safeJsonParse, silentLogger, type Logger } from '../utils/index.js';
import type { KnowledgeBackend } from '../search/backends.js';
import { cosineSimilarity } from '../search/reranker.js';
import type { RawRow } from '../search/types.js';
import { getDb } from './connection.js';
import { blobToEmbedding, embeddingToBlob, type ChunkMetadata, type KnowledgeChunkInput } from './schema.js';
import {
  ChunkMetadataSchema,
  CountRowSchema,
  EmbeddingRowSchema,
  KeywordHitRowSchema,
  validateRow,
  validateRows,
} from './validation.js';

/** Tokens kept from a query for the MATCH expression */
export const MAX_MATCH_TOKENS = 64;

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Build an FTS5 MATCH expression: distinct lower-cased tokens, each quoted,
 * OR-joined. Returns null when the query has no tokens.
 *
 * @example
 * ```ts
 * toMatchExpression('Odmik od meje: 4 m'); // '"odmik" OR "od" OR "meje" OR "4" OR "m"'
 * ```
 */
export function toMatchExpression(query: string): string | null {
  const tokens = [...new Set(query.toLowerCase().match(TOKEN_PATTERN) ?? [])].slice(
    0,
    MAX_MATCH_TOKENS
  );
  return tokens.length > 0 ? tokens.map((token) => `"${token}"`).join(' OR ') : null;
}

/**
 * Per-source counts for status output.
 */
export interface SourceSummary {
  source: string;
  chunks: number;
  embedded: number;
}

const SourceSummarySchema = z.object({
  source: z.string(),
  chunks: z.number().int().nonnegative(),
  embedded: z.number().int().nonnegative(),
});

const PassageRowSchema = KeywordHitRowSchema.omit({ score: true });
type PassageRow = z.infer<typeof PassageRowSchema>;

interface IndexedEmbedding {
  id: string;
  embedding: number[];
}

export interface KnowledgeStoreOptions {
  logger?: Logger;
}

export class KnowledgeStore implements KnowledgeBackend {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  /** Stored embeddings, loaded on first vector search; null = not loaded */
  private embeddingIndex: IndexedEmbedding[] | null = null;

  constructor(db: Database.Database = getDb(), options: KnowledgeStoreOptions = {}) {
    this.db = db;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Nearest chunks to a query embedding by cosine similarity. Chunks whose
   * embedding has different dimensions are skipped.
   */
  searchByVector(embedding: number[], limit: number): RawRow[] {
    if (limit <= 0 || embedding.length === 0) {
      return [];
    }

    const index = this.loadEmbeddingIndex();
    const scored = index
      .filter((entry) => entry.embedding.length === embedding.length)
      .map((entry) => ({ ...entry, similarity: cosineSimilarity(entry.embedding, embedding) }));

    if (scored.length === 0 && index.length > 0) {
      this.logger.warn(
        `No stored embeddings have ${embedding.length} dimensions; re-ingest with the configured embedding model`
      );
      return [];
    }

    const top = scored.sort((a, b) => b.similarity - a.similarity).slice(0, limit);
    const passages = this.getPassages(top.map((entry) => entry.id));

    const rows: RawRow[] = [];
    for (const entry of top) {
      const passage = passages.get(entry.id);
      if (passage !== undefined) {
        rows.push({ ...toRecord(passage), similarity: entry.similarity, embedding: entry.embedding });
      }
    }
    return rows;
  }

  /**
   * Full-text matches, best first. Rows carry `score` = -bm25 (higher is
   * better).
   */
  searchByKeyword(query: string, limit: number): RawRow[] {
    const match = toMatchExpression(query);
    if (match === null || limit <= 0) {
      return [];
    }

    const rows = this.db
      .prepare(
        `SELECT c.id, c.source, c.chunk_key, c.content, c.metadata, -bm25(knowledge_fts) AS score
         FROM knowledge_fts
         JOIN knowledge_chunks c ON c.seq = knowledge_fts.rowid
         WHERE knowledge_fts MATCH ?
         ORDER BY score DESC
         LIMIT ?`
      )
      .all(match, limit);

    return validateRows(KeywordHitRowSchema, rows, 'knowledge_fts').map((row) => ({
      ...toRecord(row),
      score: row.score,
    }));
  }

  /**
   * Stored embeddings for the given ids. Ids without an embedding are absent.
   */
  getEmbeddingsForIds(ids: string[]): Map<string, number[]> {
    const wanted = new Set(ids);
    const found = new Map<string, number[]>();
    for (const entry of this.loadEmbeddingIndex()) {
      if (wanted.has(entry.id)) {
        found.set(entry.id, entry.embedding);
      }
    }
    return found;
  }

  /**
   * Insert or update chunks in one transaction. A chunk stored without an
   * embedding keeps the embedding it already had.
   *
   * @returns Number of chunks written
   */
  upsertChunks(chunks: readonly KnowledgeChunkInput[]): number {
    const stmt = this.db.prepare(`
      INSERT INTO knowledge_chunks (id, source, chunk_key, content, embedding, embedding_model, dimensions, metadata)
      VALUES (@id, @source, @key, @content, @embedding, @embeddingModel, @dimensions, @metadata)
      ON CONFLICT(id) DO UPDATE SET
        source = excluded.source,
        chunk_key = excluded.chunk_key,
        content = excluded.content,
        metadata = excluded.metadata,
        embedding = COALESCE(excluded.embedding, knowledge_chunks.embedding),
        embedding_model = CASE WHEN excluded.embedding IS NULL
          THEN knowledge_chunks.embedding_model ELSE excluded.embedding_model END,
        dimensions = CASE WHEN excluded.embedding IS NULL
          THEN knowledge_chunks.dimensions ELSE excluded.dimensions END
    `);

    const upsertMany = this.db.transaction((items: readonly KnowledgeChunkInput[]) => {
      for (const chunk of items) {
        const embedding =
          chunk.embedding !== undefined && chunk.embedding.length > 0 ? chunk.embedding : null;
        stmt.run({
          id: chunk.id,
          source: chunk.source,
          key: chunk.key,
          content: chunk.content,
          embedding: embedding === null ? null : embeddingToBlob(embedding),
          embeddingModel: embedding === null ? null : (chunk.embeddingModel ?? null),
          dimensions: embedding === null ? null : embedding.length,
          metadata: chunk.metadata ? JSON.stringify(chunk.metadata) : null,
        });
      }
    });

    upsertMany(chunks);
    this.invalidate();
    return chunks.length;
  }

  /**
   * Delete every chunk.
   *
   * @returns Number of chunks deleted
   */
  clear(): number {
    const result = this.db.prepare('DELETE FROM knowledge_chunks').run();
    this.invalidate();
    return result.changes;
  }

  /**
   * Delete the chunks of a source whose ids are not in `keepIds`: the
   * passages a re-ingested resource no longer contains.
   *
   * @returns Number of chunks deleted
   */
  removeStale(source: string, keepIds: readonly string[]): number {
    const keep = new Set(keepIds);
    const rows = this.db.prepare('SELECT id FROM knowledge_chunks WHERE source = ?').all(source);
    const stale = validateRows(z.object({ id: z.string() }), rows, 'knowledge_chunks.id')
      .map((row) => row.id)
      .filter((id) => !keep.has(id));
    if (stale.length === 0) {
      return 0;
    }

    const stmt = this.db.prepare('DELETE FROM knowledge_chunks WHERE id = ?');
    const removeMany = this.db.transaction((ids: readonly string[]) => {
      for (const id of ids) {
        stmt.run(id);
      }
    });
    removeMany(stale);
    this.invalidate();
    return stale.length;
  }

  countChunks(): number {
    return this.count('SELECT COUNT(*) AS count FROM knowledge_chunks');
  }

  countEmbedded(): number {
    return this.count('SELECT COUNT(*) AS count FROM knowledge_chunks WHERE embedding IS NOT NULL');
  }

  /**
   * Chunk and embedding counts per knowledge resource.
   */
  listSources(): SourceSummary[] {
    const rows = this.db
      .prepare(
        `SELECT source,
                COUNT(*) AS chunks,
                SUM(CASE WHEN embedding IS NULL THEN 0 ELSE 1 END) AS embedded
         FROM knowledge_chunks
         GROUP BY source
         ORDER BY source`
      )
      .all();
    return validateRows(SourceSummarySchema, rows, 'knowledge_chunks.source');
  }

  /**
   * Distinct embedding models of the stored chunks.
   */
  listEmbeddingModels(): string[] {
    const rows = this.db
      .prepare(
        `SELECT DISTINCT embedding_model AS model FROM knowledge_chunks
         WHERE embedding_model IS NOT NULL ORDER BY embedding_model`
      )
      .all();
    return validateRows(z.object({ model: z.string() }), rows, 'knowledge_chunks.embedding_model').map(
      (row) => row.model
    );
  }

  private count(sql: string): number {
    return validateRow(CountRowSchema, this.db.prepare(sql).get(), 'knowledge_chunks').count;
  }

  private invalidate(): void {
    this.embeddingIndex = null;
  }

  private loadEmbeddingIndex(): IndexedEmbedding[] {
    if (this.embeddingIndex !== null) {
      return this.embeddingIndex;
    }

    const rows = this.db
      .prepare('SELECT id, embedding FROM knowledge_chunks WHERE embedding IS NOT NULL ORDER BY seq')
      .all();
    this.embeddingIndex = validateRows(EmbeddingRowSchema, rows, 'knowledge_chunks.embedding').map(
      (row) => ({ id: row.id, embedding: Array.from(blobToEmbedding(row.embedding)) })
    );
    this.logger.debug?.(`Loaded ${this.embeddingIndex.length} stored embeddings`);
    return this.embeddingIndex;
  }

  private getPassages(ids: string[]): Map<string, PassageRow> {
    if (ids.length === 0) {
      return new Map();
    }
    const placeholders = ids.map(() => '?').join(', ');
    const rows = this.db
      .prepare(
        `SELECT id, source, chunk_key, content, metadata FROM knowledge_chunks WHERE id IN (${placeholders})`
      )
      .all(...ids);
    return new Map(
      validateRows(PassageRowSchema, rows, 'knowledge_chunks').map((row) => [row.id, row])
    );
  }
}

/**
 * Backend record for a stored passage. Citation metadata is flattened;
 * the chunk key stands in for the article when none is stored.
 */
function toRecord(row: PassageRow): RawRow {
  const metadata: ChunkMetadata = safeJsonParse(row.metadata, ChunkMetadataSchema, {});
  const record: RawRow = {
    id: row.id,
    source: row.source,
    key: row.chunk_key,
    content: row.content,
  };
  for (const [field, value] of Object.entries(metadata)) {
    if (value !== undefined) {
      record[field] = value;
    }
  }
  return record;
}
