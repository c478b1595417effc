/**
 * Knowledge Ingestion Module
 *
 * Loads knowledge-resource JSON, splits it into passages, embeds them and
 * stores them in the knowledge store.
 *
 * @example
 * ```ts
 * import { loadKnowledgeFiles, ingestKnowledge } from './indexer';
 *
 * const resources = await loadKnowledgeFiles(['data/opn.json', 'data/izrazi.json']);
 * const result = await ingestKnowledge(resources, new KnowledgeStore(), client, {
 *   embeddingModel: provider.model,
 * });
 *
 * console.log(`Stored ${result.chunksStored} passages`);
 * ```
 */

// Types
export type {
  KnowledgeResource,
  KnowledgeChunk,
  ChunkResourcesResult,
  IngestStage,
  StageStats,
  IngestResult,
} from './types.js';

// Resource files
export {
  loadKnowledgeFile,
  loadKnowledgeFiles,
  toResources,
  resourceNameFromPath,
  isKnownResource,
} from './resources.js';

// Chunker module
export {
  chunkKnowledgeResources,
  chunkId,
  metadataFrom,
  renderBody,
  RESOURCE_SPLITTERS,
  MAX_CHUNK_CHARS,
  estimateTokens,
  splitText,
} from './chunker/index.js';

// Embedder module
export {
  createEmbeddingProvider,
  createEmbeddingClient,
  EmbeddingClient,
  EmbeddingCache,
  normalizeEmbeddingResponse,
  embedChunks,
  DEFAULT_BATCH_SIZE,
  DEFAULT_CACHE_SIZE,
  EmbeddingUnavailableError,
  EmptyQueryError,
  EmbeddingResponseError,
  EmbeddingRequestError,
  EmbeddingTimeoutError,
  type EmbeddingTaskType,
  type EmbedFunction,
  type BatchEmbedFunction,
  type EmbeddingProvider,
  type EmbeddingConfig,
  type EmbeddingClientOptions,
  type EmbeddedChunk,
  type EmbedderOptions,
} from './embedder/index.js';

// Pipeline orchestration
export {
  ingestKnowledge,
  IndexingCancelledError,
  type IngestOptions,
  type IngestTarget,
} from './pipeline.js';
