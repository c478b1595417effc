/**
 * Embedder Orchestration
 *
 * Embeds knowledge chunks for storage:
 * 1. Batch chunks (default: 20 per request)
 * 2. Isolate failures: when a batch fails, retry its chunks one by one
 * 3. Report progress and per-chunk errors through callbacks
 *
 * Chunks that cannot be embedded are reported and left out of the result;
 * the caller stores them without an embedding.
 */

import type { EmbeddingClient } from './client.js';
import type { EmbeddedChunk, EmbedderOptions } from './types.js';

/** Default batch size */
export const DEFAULT_BATCH_SIZE = 20;

interface EmbeddableChunk {
  id: string;
  content: string;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Compute embeddings for chunks in batches.
 *
 * @example
 * ```typescript
 * const embedded = await embedChunks(chunks, client, {
 *   batchSize: config.embedding.batch_size,
 *   onProgress: (done, total) => spinner.text = `Embedding ${done}/${total}`,
 * });
 * ```
 */
export async function embedChunks<T extends EmbeddableChunk>(
  chunks: readonly T[],
  client: EmbeddingClient,
  options: EmbedderOptions = {}
): Promise<Array<EmbeddedChunk<T>>> {
  const { batchSize = DEFAULT_BATCH_SIZE, signal, onProgress, onError } = options;
  const size = Math.max(1, Math.floor(batchSize));

  if (chunks.length === 0) {
    return [];
  }

  const embeddedChunks: Array<EmbeddedChunk<T>> = [];
  let processed = 0;

  for (let i = 0; i < chunks.length; i += size) {
    if (signal?.aborted) {
      break;
    }

    const batch = chunks.slice(i, i + size);

    try {
      const embeddings = await client.embedDocuments(batch.map((chunk) => chunk.content));
      batch.forEach((chunk, j) => {
        const embedding = embeddings[j];
        if (embedding === undefined || embedding.length === 0) {
          onError?.(new Error('Empty embedding returned for chunk'), chunk.id);
          return;
        }
        embeddedChunks.push({ ...chunk, embedding });
      });

      processed += batch.length;
      onProgress?.(processed, chunks.length);
    } catch {
      // Batch failed: retry chunk by chunk so one bad passage doesn't sink the rest
      for (const chunk of batch) {
        if (signal?.aborted) {
          break;
        }

        try {
          const [embedding] = await client.embedDocuments([chunk.content]);
          if (embedding !== undefined && embedding.length > 0) {
            embeddedChunks.push({ ...chunk, embedding });
          } else {
            onError?.(new Error('Empty embedding returned'), chunk.id);
          }
        } catch (chunkError) {
          onError?.(toError(chunkError), chunk.id);
        }

        processed++;
        onProgress?.(processed, chunks.length);
      }
    }
  }

  return embeddedChunks;
}
