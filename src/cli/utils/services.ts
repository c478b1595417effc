/**
 * Command Services
 *
 * Builds the knowledge store, embedding client and retrieval engine from
 * config for the commands that need them.
 */

import type { Config } from '../../config/schema.js';
import { getDb, runMigrations, KnowledgeStore } from '../../database/index.js';
import { DatabaseError } from '../../errors/index.js';
import {
  createEmbeddingClient,
  createEmbeddingProvider,
  type EmbeddingClient,
  type EmbeddingProvider,
} from '../../indexer/embedder/index.js';
import { RetrievalEngine, type RetrievalEngineOptions } from '../../search/engine.js';
import type { Logger } from '../../utils/index.js';

/**
 * Open the knowledge store at the configured data directory, applying any
 * pending migrations.
 *
 * @throws DatabaseError if the database can't be opened or migrated
 */
export function openKnowledgeStore(logger: Logger): KnowledgeStore {
  try {
    runMigrations();
    return new KnowledgeStore(getDb(), { logger });
  } catch (error) {
    throw new DatabaseError(
      'Failed to open the knowledge base',
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Provider and client for the configured embedding model.
 *
 * @throws APIKeyError if the provider's key is missing
 */
export function createEmbeddingServices(config: Config): {
  provider: EmbeddingProvider;
  client: EmbeddingClient;
} {
  const provider = createEmbeddingProvider(config.embedding);
  return { provider, client: createEmbeddingClient(provider, config.embedding) };
}

/**
 * Engine options from the [retrieval] and [context] config sections.
 */
export function engineOptionsFromConfig(config: Config): RetrievalEngineOptions {
  return {
    topK: config.retrieval.top_k,
    fusionWeight: config.retrieval.fusion_weight,
    mmrLambda: config.retrieval.mmr_lambda,
    fetchMultiplier: config.retrieval.fetch_multiplier,
    backendTimeoutMs: config.retrieval.backend_timeout_ms,
    keywordSearch: config.retrieval.keyword_search,
    header: config.context.header,
    snippetChars: config.context.snippet_chars,
  };
}

/**
 * Build the retrieval engine over a store.
 *
 * A knowledge base without stored embeddings is searched by keyword only,
 * so no embedding provider is created for it.
 */
export function createRetrievalEngine(
  config: Config,
  store: KnowledgeStore,
  logger: Logger
): RetrievalEngine {
  const options = { ...engineOptionsFromConfig(config), logger };

  if (store.countEmbedded() === 0) {
    logger.debug?.('No stored embeddings; using keyword search only');
    return new RetrievalEngine({
      ...options,
      backend: { searchByKeyword: (query, limit) => store.searchByKeyword(query, limit) },
      keywordSearch: true,
    });
  }

  const models = store.listEmbeddingModels();
  const configured = createEmbeddingServices(config);
  if (models.length > 0 && !models.includes(configured.provider.model)) {
    logger.warn(
      `Knowledge base was embedded with ${models.join(', ')} but queries use ${configured.provider.model}; re-ingest to match`
    );
  }

  return new RetrievalEngine({ ...options, backend: store, embeddingClient: configured.client });
}
