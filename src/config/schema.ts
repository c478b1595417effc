/**
 * Configuration Schema
 *
 * Defines the shape of ~/.zctx/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Embedding providers that can vectorize queries and rule passages.
 */
export const EmbeddingProviderSchema = z.enum(['gemini', 'openai', 'ollama']);
export type EmbeddingProviderName = z.infer<typeof EmbeddingProviderSchema>;

/**
 * Embedding provider configuration
 */
export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderSchema.describe('Embedding provider (gemini, openai or ollama)'),
  model: z.string().min(1).describe('Embedding model name'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(100)
    .default(20)
    .describe('Number of passages to embed per batch during ingestion (1-100, default 20)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(30000)
    .describe('Timeout in milliseconds for a single embedding call'),
  cache_size: z
    .number()
    .int()
    .min(0)
    .max(100000)
    .default(1024)
    .describe('Query embeddings kept in memory (0 disables the cache)'),
});

/**
 * Retrieval configuration
 * Controls fusion, diversity and candidate pool size
 */
export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Number of passages placed in the context'),
  fusion_weight: z
    .number()
    .min(0)
    .max(1)
    .describe('Weight of the vector score when both searches return rows (alpha)'),
  mmr_lambda: z
    .number()
    .min(0)
    .max(1)
    .describe('Relevance/diversity trade-off for MMR (1 = relevance only)'),
  fetch_multiplier: z
    .number()
    .int()
    .min(1)
    .max(20)
    .describe('Candidates fetched per backend = top_k * fetch_multiplier'),
  backend_timeout_ms: z
    .number()
    .int()
    .min(0)
    .max(600000)
    .describe('Timeout for a single backend call (0 = none)'),
  keyword_search: z.boolean().describe('Run full-text search alongside vector search'),
});

/**
 * Context block rendering
 */
export const ContextConfigSchema = z.object({
  snippet_chars: z.number().int().min(40).max(10000).describe('Maximum characters of passage text per line'),
  header: z.string().describe('First line of the rendered context block'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  embedding: EmbeddingConfigSchema,
  retrieval: RetrievalConfigSchema,
  context: ContextConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
