/**
 * Ingest Pipeline
 *
 * Orchestrates knowledge ingestion:
 * Chunk → Embed → Store
 *
 * It doesn't know HOW to display progress - that's the ProgressReporter's job.
 * It just fires callbacks at the right moments.
 *
 * - Each stage has start/progress/complete callbacks
 * - Non-fatal errors are collected, not thrown
 * - Chunks that fail embedding are stored without an embedding, so keyword
 *   search still finds them
 * - A re-ingested resource replaces its earlier passages: chunk ids hash the
 *   content, so an edited passage gets a new id and the old one is removed
 */

import type { KnowledgeChunkInput } from '../database/schema.js';
import type { KnowledgeStore } from '../database/knowledge-store.js';
import { chunkKnowledgeResources } from './chunker/index.js';
import { DEFAULT_BATCH_SIZE, embedChunks, type EmbeddingClient } from './embedder/index.js';
import type { IngestResult, IngestStage, KnowledgeResource, StageStats } from './types.js';

/** The store operations ingestion needs */
export type IngestTarget = Pick<KnowledgeStore, 'upsertChunks' | 'clear' | 'removeStale'>;

/**
 * Options for ingestKnowledge.
 */
export interface IngestOptions {
  /** Passages per embedding request (default: 20) */
  batchSize?: number;

  /** Delete every stored passage before storing the new ones */
  replace?: boolean;

  /** Model name recorded with each embedding */
  embeddingModel?: string;

  /**
   * AbortSignal for cancellation. The pipeline stops at the next checkpoint
   * (between stages or between batches) and nothing is stored.
   */
  signal?: AbortSignal;

  // Progress callbacks
  onStageStart?: (stage: IngestStage, total: number) => void;
  onProgress?: (stage: IngestStage, processed: number, total: number) => void;
  onStageComplete?: (stage: IngestStage, stats: StageStats) => void;
  onWarning?: (message: string) => void;
  onError?: (error: Error, context?: string) => void;
}

/**
 * Error thrown when ingestion is cancelled via AbortSignal.
 */
export class IndexingCancelledError extends Error {
  constructor() {
    super('Ingestion cancelled');
    this.name = 'IndexingCancelledError';
  }
}

function checkCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new IndexingCancelledError();
  }
}

/** Store in slices so progress moves on large corpora */
const STORE_BATCH_SIZE = 200;

/**
 * Chunk, embed and store knowledge resources.
 *
 * Pass `null` as the client to store passages without embeddings
 * (keyword search only).
 *
 * @example
 * ```typescript
 * const reporter = createProgressReporter({ json: false, verbose: true });
 *
 * const result = await ingestKnowledge(resources, new KnowledgeStore(), client, {
 *   batchSize: config.embedding.batch_size,
 *   embeddingModel: provider.model,
 *   onStageStart: (stage, total) => reporter.startStage(stage, total),
 *   onProgress: (stage, processed) => reporter.updateProgress(processed),
 *   onStageComplete: (stage, stats) => reporter.completeStage(stats),
 * });
 * ```
 */
export async function ingestKnowledge(
  resources: readonly KnowledgeResource[],
  store: IngestTarget,
  client: EmbeddingClient | null,
  options: IngestOptions = {}
): Promise<IngestResult> {
  const { signal, onStageStart, onProgress, onStageComplete, onWarning, onError } = options;

  const startTime = performance.now();
  const stageDurations: Partial<Record<IngestStage, number>> = {};
  const warnings: string[] = [];
  const errors: string[] = [];

  // =========================================================================
  // STAGE 1: CHUNKING
  // =========================================================================
  checkCancelled(signal);
  let stageStart = performance.now();
  onStageStart?.('chunking', resources.length);

  const { chunks, warnings: chunkWarnings, bySource } = chunkKnowledgeResources(resources);
  for (const warning of chunkWarnings) {
    warnings.push(warning);
    onWarning?.(warning);
  }

  stageDurations.chunking = Math.round(performance.now() - stageStart);
  onStageComplete?.('chunking', {
    stage: 'chunking',
    processed: chunks.length,
    total: chunks.length,
    durationMs: stageDurations.chunking,
    details: { bySource },
  });

  // =========================================================================
  // STAGE 2: EMBEDDING
  // =========================================================================
  const embeddings = new Map<string, number[]>();
  const embeddingModel = client?.available ? (options.embeddingModel ?? null) : null;

  if (client?.available) {
    checkCancelled(signal);
    stageStart = performance.now();
    onStageStart?.('embedding', chunks.length);

    const embedded = await embedChunks(chunks, client, {
      batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
      signal,
      onProgress: (processed, total) => onProgress?.('embedding', processed, total),
      onError: (error, chunkId) => {
        errors.push(`Chunk ${chunkId}: ${error.message}`);
        onError?.(error, chunkId);
      },
    });
    for (const chunk of embedded) {
      embeddings.set(chunk.id, chunk.embedding);
    }

    stageDurations.embedding = Math.round(performance.now() - stageStart);
    onStageComplete?.('embedding', {
      stage: 'embedding',
      processed: embedded.length,
      total: chunks.length,
      durationMs: stageDurations.embedding,
      details: {
        successRate:
          chunks.length > 0 ? ((embedded.length / chunks.length) * 100).toFixed(1) + '%' : '100%',
      },
    });
  } else if (client !== null) {
    const message = 'No embedding provider configured; storing passages without embeddings';
    warnings.push(message);
    onWarning?.(message);
  }

  // =========================================================================
  // STAGE 3: STORING
  // =========================================================================
  checkCancelled(signal);
  stageStart = performance.now();
  onStageStart?.('storing', chunks.length);

  let chunksRemoved = options.replace ? store.clear() : 0;

  const inputs: KnowledgeChunkInput[] = chunks.map((chunk) => {
    const embedding = embeddings.get(chunk.id);
    return {
      id: chunk.id,
      source: chunk.source,
      key: chunk.key,
      content: chunk.content,
      metadata: chunk.metadata,
      ...(embedding ? { embedding, embeddingModel: embeddingModel ?? undefined } : {}),
    };
  });

  let chunksStored = 0;
  for (let i = 0; i < inputs.length; i += STORE_BATCH_SIZE) {
    chunksStored += store.upsertChunks(inputs.slice(i, i + STORE_BATCH_SIZE));
    onProgress?.('storing', Math.min(i + STORE_BATCH_SIZE, inputs.length), inputs.length);
  }

  if (!options.replace) {
    for (const name of new Set(resources.map((resource) => resource.name))) {
      const keepIds = chunks.filter((chunk) => chunk.source === name).map((chunk) => chunk.id);
      chunksRemoved += store.removeStale(name, keepIds);
    }
  }

  stageDurations.storing = Math.round(performance.now() - stageStart);
  onStageComplete?.('storing', {
    stage: 'storing',
    processed: chunksStored,
    total: chunks.length,
    durationMs: stageDurations.storing,
    details: { removed: chunksRemoved },
  });

  return {
    chunksCreated: chunks.length,
    chunksEmbedded: embeddings.size,
    chunksStored,
    chunksRemoved,
    bySource,
    embeddingModel: embeddings.size > 0 ? embeddingModel : null,
    totalDurationMs: Math.round(performance.now() - startTime),
    stageDurations,
    warnings,
    errors,
  };
}
