/**
 * Embedder Types
 *
 * Provider-neutral embedding types. A provider returns whatever its API
 * returns; EmbeddingClient normalizes the shape into a number[].
 */

import type { EmbeddingProviderName } from '../../config/schema.js';
import type { EmbeddingCache } from './cache.js';

/**
 * How the text will be used. Providers that distinguish query and document
 * embeddings (Gemini) pass this through; others ignore it.
 */
export type EmbeddingTaskType = 'RETRIEVAL_QUERY' | 'RETRIEVAL_DOCUMENT';

/**
 * Embed one text. The response may be a vector, a list holding a vector, or
 * an object with `values` / `embedding`.
 */
export type EmbedFunction = (text: string, taskType: EmbeddingTaskType) => Promise<unknown>;

/**
 * Embed several texts in one request; one response entry per text, in order.
 */
export type BatchEmbedFunction = (texts: string[], taskType: EmbeddingTaskType) => Promise<unknown[]>;

/**
 * A configured embedding provider.
 */
export interface EmbeddingProvider {
  name: EmbeddingProviderName;
  model: string;
  embed: EmbedFunction;
  embedBatch?: BatchEmbedFunction;
}

/**
 * Embedding provider configuration.
 * Matches the [embedding] section in config.toml.
 */
export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  model: string;
  batch_size?: number;
  timeout_ms?: number;
  cache_size?: number;
}

/**
 * Options for EmbeddingClient.
 */
export interface EmbeddingClientOptions {
  /** Single-text embed function; null/absent means embedding is unavailable */
  embed?: EmbedFunction | null;
  /** Optional batch function used by embedDocuments */
  embedBatch?: BatchEmbedFunction | null;
  /** Query cache (default: a fresh EmbeddingCache of 1024 entries) */
  cache?: EmbeddingCache;
  /** Per-call timeout in ms (0 or absent = none) */
  timeoutMs?: number;
}

/**
 * A chunk with its computed embedding.
 */
export type EmbeddedChunk<T> = T & { embedding: number[] };

/**
 * Options for embedChunks.
 */
export interface EmbedderOptions {
  /**
   * Number of chunks per batch request.
   * @default 20
   */
  batchSize?: number;

  /** Stop between batches when aborted; chunks embedded so far are returned */
  signal?: AbortSignal;

  /** Fired after each batch (or each chunk while isolating a failed batch) */
  onProgress?: (processed: number, total: number) => void;

  /** Fired for each chunk that could not be embedded */
  onError?: (error: Error, chunkId: string) => void;
}
