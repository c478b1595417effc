/**
 * Search Module
 *
 * Hybrid retrieval of rule passages: vector and keyword search, min-max
 * score fusion, MMR diversity re-ranking and citation-ready rendering.
 *
 * @example
 * ```typescript
 * import { RetrievalEngine, describeContext } from './search/index.js';
 *
 * const engine = new RetrievalEngine({ backend: store, embeddingClient: client });
 * const result = await engine.getContext(keyFacts, { zoneUnits: ['LJ-12'] });
 * console.log(describeContext(result));
 * ```
 *
 * @packageDocumentation
 */

// Engine
export {
  RetrievalEngine,
  describeContext,
  NO_MATCHING_PASSAGES,
  DEFAULT_TOP_K,
  type RetrievalEngineOptions,
} from './engine.js';

// Backends
export {
  resolveBackends,
  callBackend,
  fetchSize,
  toEmbeddingMap,
  BackendTimeoutError,
  DEFAULT_FETCH_MULTIPLIER,
  type KnowledgeBackend,
  type ResolvedBackends,
  type BackendOutcome,
  type CallBackendOptions,
} from './backends.js';

// Row normalization
export {
  normalizeRow,
  normalizeRows,
  rowToRaw,
  rowToRecord,
  synthesizeId,
  FIELD_KEYS,
  CITATION_FIELDS,
} from './normalizer.js';

// Query composition
export {
  composeQuery,
  composeDocumentQuery,
  isMeaningful,
  DEFAULT_QUERY,
  NO_DATA_SENTINELS,
  MAX_DOCUMENT_QUERY_CHARS,
} from './query-composer.js';

// Fusion and re-ranking
export { fuseScores, minMaxNormalize, mergeRows, DEFAULT_FUSION_WEIGHT } from './fusion.js';
export {
  mmrRerank,
  rowSimilarity,
  cosineSimilarity,
  jaccardSimilarity,
  tokenize,
  DEFAULT_MMR_LAMBDA,
} from './reranker.js';

// Rendering
export {
  renderContext,
  summarizeText,
  formatCitation,
  formatRowsForDisplay,
  formatScore,
  DEFAULT_HEADER,
  DEFAULT_SNIPPET_CHARS,
} from './formatter.js';

// Errors
export { RetrievalParameterError } from './errors.js';

// Types
export type {
  RawRow,
  Row,
  RowRecord,
  Citation,
  CitationField,
  KeyFacts,
  ZoningCodes,
  ContextRequest,
  ContextResult,
  RenderOptions,
} from './types.js';
