/**
 * Embedding Client
 *
 * Turns text into vectors through an injected provider function, with a
 * per-instance query cache and a per-call timeout.
 *
 * @example
 * ```typescript
 * const provider = createEmbeddingProvider(config.embedding);
 * const client = createEmbeddingClient(provider, config.embedding);
 *
 * const vector = await client.embed('odmiki od parcelnih mej');
 * ```
 */

import { withTimeout } from '../../utils/index.js';
import { DEFAULT_CACHE_SIZE, EmbeddingCache } from './cache.js';
import {
  EmbeddingResponseError,
  EmbeddingTimeoutError,
  EmbeddingUnavailableError,
  EmptyQueryError,
} from './errors.js';
import type {
  BatchEmbedFunction,
  EmbedFunction,
  EmbeddingClientOptions,
  EmbeddingConfig,
  EmbeddingProvider,
  EmbeddingTaskType,
} from './types.js';

/** Nesting levels searched for a vector inside a response */
const MAX_RESPONSE_DEPTH = 4;

function describeShape(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return value.length === 0 ? 'an empty list' : `a list of ${typeof value[0]}`;
  return typeof value;
}

/**
 * A list of finite numbers as a vector.
 *
 * @throws EmbeddingResponseError for an empty list or a non-numeric entry
 */
function toVector(values: readonly unknown[] | Float32Array): number[] {
  if (values.length === 0) {
    throw new EmbeddingResponseError('got an empty list');
  }
  const vector: number[] = [];
  for (const item of values) {
    if (typeof item !== 'number' || !Number.isFinite(item)) {
      throw new EmbeddingResponseError('vector contains a non-numeric value');
    }
    vector.push(item);
  }
  return vector;
}

/**
 * Extract the vector from a provider response. Accepts a flat list of
 * numbers, a list of lists (the first inner list, which must itself be
 * flat), or an object with `values` or `embedding` (searched recursively).
 *
 * @throws EmbeddingResponseError for any other shape
 */
export function normalizeEmbeddingResponse(response: unknown, depth = 0): number[] {
  if (depth <= MAX_RESPONSE_DEPTH) {
    if (response instanceof Float32Array) {
      return toVector(response);
    }

    if (Array.isArray(response) && response.length > 0) {
      const first: unknown = response[0];
      if (typeof first === 'number') {
        return toVector(response);
      }
      if (Array.isArray(first) || first instanceof Float32Array) {
        return toVector(first);
      }
    }

    if (response !== null && typeof response === 'object' && !Array.isArray(response)) {
      const values = 'values' in response ? response.values : undefined;
      const embedding = 'embedding' in response ? response.embedding : undefined;
      const inner = values ?? embedding;
      if (inner !== undefined && inner !== null) {
        return normalizeEmbeddingResponse(inner, depth + 1);
      }
    }
  }

  throw new EmbeddingResponseError(`got ${describeShape(response)}`);
}

export class EmbeddingClient {
  private readonly embedFn: EmbedFunction | null;
  private readonly batchFn: BatchEmbedFunction | null;
  private readonly cache: EmbeddingCache;
  private readonly timeoutMs: number | undefined;

  constructor(options: EmbeddingClientOptions = {}) {
    this.embedFn = options.embed ?? null;
    this.batchFn = options.embedBatch ?? null;
    this.cache = options.cache ?? new EmbeddingCache();
    this.timeoutMs = options.timeoutMs;
  }

  /** Whether an embed function is configured */
  get available(): boolean {
    return this.embedFn !== null;
  }

  /**
   * Embed a query. Identical trimmed texts reach the provider at most once
   * while cached.
   *
   * @throws EmptyQueryError if the text is empty after trimming
   * @throws EmbeddingUnavailableError if no embed function is configured
   * @throws EmbeddingResponseError / EmbeddingTimeoutError from the call
   */
  async embed(text: string): Promise<number[]> {
    const cleaned = text.trim();
    if (cleaned === '') {
      throw new EmptyQueryError();
    }
    const embedFn = this.embedFn;
    if (embedFn === null) {
      throw new EmbeddingUnavailableError();
    }

    return this.cache.getOrCompute(cleaned, async () =>
      normalizeEmbeddingResponse(await this.withTimeout(embedFn(cleaned, 'RETRIEVAL_QUERY')))
    );
  }

  /**
   * Embed passages for storage (document task type, not cached). Uses the
   * batch function when the provider has one.
   */
  async embedDocuments(texts: string[]): Promise<number[][]> {
    const embedFn = this.embedFn;
    if (embedFn === null) {
      throw new EmbeddingUnavailableError();
    }
    const cleaned = texts.map((text) => text.trim());
    if (cleaned.some((text) => text === '')) {
      throw new EmptyQueryError();
    }
    if (cleaned.length === 0) {
      return [];
    }

    const task: EmbeddingTaskType = 'RETRIEVAL_DOCUMENT';

    if (this.batchFn !== null) {
      const responses = await this.withTimeout(this.batchFn(cleaned, task));
      if (responses.length !== cleaned.length) {
        throw new EmbeddingResponseError(
          `expected ${cleaned.length} embeddings, got ${responses.length}`
        );
      }
      return responses.map((response) => normalizeEmbeddingResponse(response));
    }

    const vectors: number[][] = [];
    for (const text of cleaned) {
      vectors.push(normalizeEmbeddingResponse(await this.withTimeout(embedFn(text, task))));
    }
    return vectors;
  }

  /** Number of cached query embeddings */
  get cacheSize(): number {
    return this.cache.size;
  }

  private withTimeout<T>(promise: Promise<T>): Promise<T> {
    const timeoutMs = this.timeoutMs;
    return withTimeout(promise, timeoutMs, () => new EmbeddingTimeoutError(timeoutMs ?? 0));
  }
}

/**
 * Build a client for a provider (or an unavailable client for null) with
 * the cache size and timeout from config.
 */
export function createEmbeddingClient(
  provider: EmbeddingProvider | null,
  config: Pick<EmbeddingConfig, 'timeout_ms' | 'cache_size'> = {}
): EmbeddingClient {
  return new EmbeddingClient({
    embed: provider?.embed ?? null,
    embedBatch: provider?.embedBatch ?? null,
    cache: new EmbeddingCache(config.cache_size ?? DEFAULT_CACHE_SIZE),
    timeoutMs: config.timeout_ms,
  });
}
