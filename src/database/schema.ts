/**
 * Database Schema Types
 *
 * TypeScript interfaces matching the SQLite table schemas.
 */

/**
 * A stored rule passage.
 */
export interface KnowledgeChunkRecord {
  /** Deterministic id (SHA-256 of source, key and content) */
  id: string;
  /** Knowledge resource name (e.g. "opn", "priloga2") */
  source: string;
  /** Key within the resource (e.g. "clen_84", an EUP code, a term) */
  chunk_key: string;
  /** Passage text */
  content: string;
  /** Float32 embedding BLOB, or NULL when the chunk has none */
  embedding: Buffer | null;
  /** Model that produced the embedding */
  embedding_model: string | null;
  /** Embedding dimensions */
  dimensions: number | null;
  /** JSON object with citation metadata */
  metadata: string | null;
  /** Creation timestamp */
  created_at: string;
}

/**
 * Citation metadata stored with a chunk.
 */
export interface ChunkMetadata {
  article?: string;
  zone_unit?: string;
  land_use?: string;
  page?: string;
  year?: string;
}

/**
 * Input for storing a chunk.
 */
export interface KnowledgeChunkInput {
  id: string;
  source: string;
  key: string;
  content: string;
  metadata?: ChunkMetadata;
  /** Omitted when the chunk could not be embedded */
  embedding?: number[];
  embeddingModel?: string;
}

/**
 * Convert an embedding to a Buffer for BLOB storage (float32).
 *
 * @example
 * ```ts
 * const blob = embeddingToBlob([0.1, 0.2, 0.3]);
 * db.prepare('UPDATE knowledge_chunks SET embedding = ? WHERE id = ?').run(blob, id);
 * ```
 */
export function embeddingToBlob(embedding: Float32Array | readonly number[]): Buffer {
  const floats = embedding instanceof Float32Array ? embedding : Float32Array.from(embedding);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Convert a BLOB back to Float32Array.
 *
 * Copies the bytes, so the result does not depend on the Buffer's alignment.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const floats = new Float32Array(Math.floor(blob.length / 4));
  new Uint8Array(floats.buffer).set(blob.subarray(0, floats.length * 4));
  return floats;
}
