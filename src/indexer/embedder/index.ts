/**
 * Embedder Module
 *
 * Query and passage embedding.
 *
 * Usage:
 * ```typescript
 * import { createEmbeddingProvider, createEmbeddingClient, embedChunks } from './embedder';
 *
 * // 1. Create provider and client from config
 * const provider = createEmbeddingProvider(config.embedding);
 * const client = createEmbeddingClient(provider, config.embedding);
 *
 * // 2. Embed a query (cached)
 * const vector = await client.embed(query);
 *
 * // 3. Embed passages for storage (batched)
 * const embedded = await embedChunks(chunks, client, { batchSize: 20 });
 * ```
 */

// Provider factory
export { createEmbeddingProvider, DEFAULT_MODELS } from './provider.js';

// Client and cache
export { EmbeddingClient, createEmbeddingClient, normalizeEmbeddingResponse } from './client.js';
export { EmbeddingCache, DEFAULT_CACHE_SIZE } from './cache.js';

// Batch embedding
export { embedChunks, DEFAULT_BATCH_SIZE } from './embedder.js';

// Errors
export {
  EmbeddingUnavailableError,
  EmptyQueryError,
  EmbeddingResponseError,
  EmbeddingRequestError,
  EmbeddingTimeoutError,
} from './errors.js';

// Types
export type {
  EmbeddingTaskType,
  EmbedFunction,
  BatchEmbedFunction,
  EmbeddingProvider,
  EmbeddingConfig,
  EmbeddingClientOptions,
  EmbeddedChunk,
  EmbedderOptions,
} from './types.js';
