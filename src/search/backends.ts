/**
 * Retrieval Backends
 *
 * A knowledge backend may offer vector search, keyword search and embedding
 * lookup, or any subset of them. The engine resolves which ones exist once,
 * at construction, into nullable slots, and calls each through callBackend
 * so a failing or slow backend yields a typed failure instead of an
 * exception.
 */

import { describeError, withTimeout, type Logger } from '../utils/index.js';
import { CLIError } from '../errors/index.js';
import { toEmbedding } from './normalizer.js';

type Awaitable<T> = T | Promise<T>;

/**
 * Storage collaborator. Every method is optional; rows are untyped records
 * whose field names the normalizer discovers.
 */
export interface KnowledgeBackend {
  /** Nearest rows to a query embedding, most similar first */
  searchByVector?(embedding: number[], limit: number): Awaitable<readonly unknown[]>;
  /** Full-text matches for a query, best first */
  searchByKeyword?(query: string, limit: number): Awaitable<readonly unknown[]>;
  /** Stored document embeddings by row id (missing ids are simply absent) */
  getEmbeddingsForIds?(
    ids: string[]
  ): Awaitable<ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>>;
}

export type VectorSearchFn = (embedding: number[], limit: number) => Promise<readonly unknown[]>;
export type KeywordSearchFn = (query: string, limit: number) => Promise<readonly unknown[]>;
export type EmbeddingLookupFn = (ids: string[]) => Promise<Map<string, number[]>>;

/**
 * Capabilities of a backend, resolved once. null = not offered.
 */
export interface ResolvedBackends {
  searchByVector: VectorSearchFn | null;
  searchByKeyword: KeywordSearchFn | null;
  getEmbeddingsForIds: EmbeddingLookupFn | null;
}

/**
 * Outcome of one backend call.
 */
export type BackendOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Thrown (and reported as a failed outcome) when a backend call exceeds its
 * timeout.
 */
export class BackendTimeoutError extends CLIError {
  constructor(operation: string, timeoutMs: number) {
    super(
      `${operation} timed out after ${timeoutMs}ms`,
      'Increase retrieval.backend_timeout_ms in config.toml'
    );
    this.name = 'BackendTimeoutError';
  }
}

/** Candidates fetched per backend for each selected row */
export const DEFAULT_FETCH_MULTIPLIER = 4;

/**
 * Number of rows to ask each backend for, so MMR has alternatives to pick
 * from.
 */
export function fetchSize(topK: number, multiplier: number = DEFAULT_FETCH_MULTIPLIER): number {
  return Math.max(topK, topK * Math.max(1, Math.floor(multiplier)));
}

/**
 * Convert an embedding lookup result into a map of valid vectors.
 * Entries that are not numeric vectors are dropped.
 */
export function toEmbeddingMap(
  value: ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>
): Map<string, number[]> {
  const entries: Iterable<[string, unknown]> =
    value instanceof Map ? value.entries() : Object.entries(value);

  const map = new Map<string, number[]>();
  for (const [id, raw] of entries) {
    const embedding = toEmbedding(raw);
    if (embedding !== undefined) {
      map.set(id, embedding);
    }
  }
  return map;
}

/**
 * Probe a backend's capabilities.
 */
export function resolveBackends(backend: KnowledgeBackend | null | undefined): ResolvedBackends {
  if (!backend) {
    return { searchByVector: null, searchByKeyword: null, getEmbeddingsForIds: null };
  }

  const vector = backend.searchByVector;
  const keyword = backend.searchByKeyword;
  const lookup = backend.getEmbeddingsForIds;

  return {
    searchByVector:
      typeof vector === 'function'
        ? async (embedding, limit) => vector.call(backend, embedding, limit)
        : null,
    searchByKeyword:
      typeof keyword === 'function'
        ? async (query, limit) => keyword.call(backend, query, limit)
        : null,
    getEmbeddingsForIds:
      typeof lookup === 'function'
        ? async (ids) => toEmbeddingMap(await lookup.call(backend, ids))
        : null,
  };
}

/**
 * Options for a single backend call.
 */
export interface CallBackendOptions {
  /** Per-call timeout in ms (0 or undefined = none) */
  timeoutMs?: number;
  logger: Logger;
}

/**
 * Run one backend call. Failures and timeouts are logged at warn level and
 * returned as `{ ok: false }`; nothing is thrown.
 */
export async function callBackend<T>(
  operation: string,
  call: () => Promise<T>,
  options: CallBackendOptions
): Promise<BackendOutcome<T>> {
  const { timeoutMs, logger } = options;
  try {
    const value = await withTimeout(
      call(),
      timeoutMs,
      () => new BackendTimeoutError(operation, timeoutMs ?? 0)
    );
    return { ok: true, value };
  } catch (error) {
    logger.warn(`${operation} failed: ${describeError(error)}`);
    return { ok: false, error };
  }
}
