/**
 * Embedding Cache
 *
 * Bounded LRU of query embeddings, keyed by the SHA-256 of the trimmed text.
 * Owned by one EmbeddingClient (one provider and model), so keys need no
 * model component.
 *
 * Concurrent lookups of the same text share one in-flight computation, the
 * same way the vector store manager shares in-progress index builds. Failed
 * computations are not cached.
 *
 * Stored vectors are never handed out: every read returns a copy, so a caller
 * mutating its result cannot change later hits.
 */

import { sha256 } from '../../utils/index.js';

/** Default number of distinct texts kept */
export const DEFAULT_CACHE_SIZE = 1024;

export class EmbeddingCache {
  private readonly maxEntries: number;

  /** Completed embeddings, least recently used first */
  private readonly entries = new Map<string, number[]>();

  /** Computations in progress, by key */
  private readonly pending = new Map<string, Promise<number[]>>();

  /**
   * @param maxEntries - Maximum stored embeddings; 0 disables storage
   * (in-flight sharing still applies)
   */
  constructor(maxEntries: number = DEFAULT_CACHE_SIZE) {
    this.maxEntries = Math.max(0, Math.floor(maxEntries));
  }

  /**
   * Cache key for a text.
   */
  static keyFor(text: string): string {
    return sha256(text.trim());
  }

  get size(): number {
    return this.entries.size;
  }

  get(text: string): number[] | undefined {
    const key = EmbeddingCache.keyFor(text);
    const hit = this.entries.get(key);
    if (hit !== undefined) {
      // refresh recency
      this.entries.delete(key);
      this.entries.set(key, hit);
    }
    return hit === undefined ? undefined : [...hit];
  }

  set(text: string, embedding: number[]): void {
    if (this.maxEntries === 0) {
      return;
    }
    const key = EmbeddingCache.keyFor(text);
    this.entries.delete(key);
    this.entries.set(key, [...embedding]);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  /**
   * Return the cached embedding for a text, or run `compute` once for all
   * concurrent callers and cache its result.
   */
  async getOrCompute(text: string, compute: () => Promise<number[]>): Promise<number[]> {
    const cached = this.get(text);
    if (cached !== undefined) {
      return cached;
    }

    const key = EmbeddingCache.keyFor(text);
    const inFlight = this.pending.get(key);
    if (inFlight !== undefined) {
      return [...(await inFlight)];
    }

    const promise = compute();
    this.pending.set(key, promise);
    try {
      const embedding = await promise;
      this.set(text, embedding);
      return [...embedding];
    } finally {
      this.pending.delete(key);
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
