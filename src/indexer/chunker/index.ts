/**
 * Chunker Module
 *
 * Splits knowledge resources into passages ready for embedding.
 *
 * Usage:
 * ```typescript
 * import { chunkKnowledgeResources } from './chunker';
 *
 * const { chunks, warnings } = chunkKnowledgeResources(resources);
 * ```
 */

export {
  chunkKnowledgeResources,
  chunkId,
  metadataFrom,
  renderBody,
  RESOURCE_SPLITTERS,
} from './knowledge-chunker.js';

export { MAX_CHUNK_CHARS, estimateTokens, splitText } from './config.js';
