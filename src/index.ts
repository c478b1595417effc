/**
 * Zoning Context - Library Entry Point
 *
 * The retrieval engine and knowledge store behind the CLI (`zctx`), for
 * embedding into a compliance-checking application.
 *
 * ## Primary Interface
 *
 * ```bash
 * zctx ingest data/opn.json data/izrazi.json
 * zctx search "odmik od parcelne meje"
 * zctx context --facts project.json --eup LJ-12 --raba SSe
 * ```
 *
 * @example Retrieval over the local knowledge base
 * ```typescript
 * import {
 *   KnowledgeStore,
 *   RetrievalEngine,
 *   createEmbeddingClient,
 *   createEmbeddingProvider,
 *   loadConfig,
 *   runMigrations,
 * } from 'zoning-context';
 *
 * runMigrations();
 * const config = loadConfig();
 * const provider = createEmbeddingProvider(config.embedding);
 * const engine = new RetrievalEngine({
 *   backend: new KnowledgeStore(),
 *   embeddingClient: createEmbeddingClient(provider, config.embedding),
 * });
 *
 * const { contextText } = await engine.getContext(keyFacts, { zoneUnits: ['LJ-12'] });
 * ```
 *
 * @packageDocumentation
 */

// Retrieval
export * from './search/index.js';

// Knowledge store
export {
  getDb,
  closeDb,
  getDbPath,
  openDatabase,
  runMigrations,
  hasPendingMigrations,
  KnowledgeStore,
  embeddingToBlob,
  blobToEmbedding,
  type KnowledgeStoreOptions,
  type SourceSummary,
  type KnowledgeChunkInput,
  type KnowledgeChunkRecord,
  type ChunkMetadata,
} from './database/index.js';

// Ingestion
export {
  ingestKnowledge,
  loadKnowledgeFiles,
  chunkKnowledgeResources,
  createEmbeddingProvider,
  createEmbeddingClient,
  EmbeddingClient,
  EmbeddingUnavailableError,
  EmptyQueryError,
  type KnowledgeResource,
  type KnowledgeChunk,
  type IngestOptions,
  type IngestResult,
  type EmbeddingProvider,
} from './indexer/index.js';

// Configuration
export { loadConfig, getDataDir, getConfigPath, DEFAULT_CONFIG, type Config } from './config/index.js';

// Errors
export { CLIError, ValidationError, DatabaseError, APIKeyError } from './errors/index.js';
