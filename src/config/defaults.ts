/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONTEXT_HEADER = 'Relevant rules/citations:';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = {
  // Gemini document/query embeddings; the knowledge base must be ingested
  // with the same model that embeds queries
  embedding: {
    provider: 'gemini',
    model: 'text-embedding-004', // 768 dimensions
    batch_size: 20,
    timeout_ms: 30000,
    cache_size: 1024,
  },

  retrieval: {
    top_k: 5,
    fusion_weight: 0.6,
    mmr_lambda: 0.75,
    fetch_multiplier: 4,
    backend_timeout_ms: 10000,
    keyword_search: true,
  },

  context: {
    snippet_chars: 700,
    header: DEFAULT_CONTEXT_HEADER,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.zctx/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# Zoning Context Configuration
# Location: ~/.zctx/config.toml (or $ZCTX_HOME/config.toml)

# Embedding Settings
# provider: gemini (GEMINI_API_KEY), openai (OPENAI_API_KEY) or ollama (OLLAMA_HOST)
# Re-ingest the knowledge base after changing the model.
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}
cache_size = ${DEFAULT_CONFIG.embedding.cache_size}

# Retrieval Settings
# fusion_weight: share of the vector score when keyword search also matched
# mmr_lambda: 1.0 ranks by relevance only, lower values favour diversity
[retrieval]
top_k = ${DEFAULT_CONFIG.retrieval.top_k}
fusion_weight = ${DEFAULT_CONFIG.retrieval.fusion_weight}
mmr_lambda = ${DEFAULT_CONFIG.retrieval.mmr_lambda}
fetch_multiplier = ${DEFAULT_CONFIG.retrieval.fetch_multiplier}
backend_timeout_ms = ${DEFAULT_CONFIG.retrieval.backend_timeout_ms}
keyword_search = ${DEFAULT_CONFIG.retrieval.keyword_search}

# Context Block
[context]
snippet_chars = ${DEFAULT_CONFIG.context.snippet_chars}
header = "${DEFAULT_CONFIG.context.header}"
`;
