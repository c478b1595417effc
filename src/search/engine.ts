/**
 * Retrieval Engine
 *
 * Hybrid retrieval of rule passages for a project:
 *
 *   compose query → embed → vector + keyword search (concurrently)
 *     → normalize rows → attach document embeddings → fuse → MMR → render
 *
 * Backend capabilities are resolved once, at construction. A failing
 * backend contributes no rows; the engine still answers from the others.
 *
 * @example
 * ```typescript
 * const engine = new RetrievalEngine({
 *   backend: new KnowledgeStore(getDb()),
 *   embeddingClient: createEmbeddingClient(provider, config.embedding),
 * });
 *
 * const { contextText, rows } = await engine.getContext(keyFacts, {
 *   zoneUnits: ['LJ-12'],
 *   landUses: ['SSe'],
 * });
 * ```
 */

import { describeError, silentLogger, type Logger } from '../utils/index.js';
import type { EmbeddingClient } from '../indexer/embedder/client.js';
import { EmbeddingUnavailableError } from '../indexer/embedder/errors.js';
import {
  DEFAULT_FETCH_MULTIPLIER,
  callBackend,
  fetchSize,
  resolveBackends,
  type KnowledgeBackend,
  type ResolvedBackends,
} from './backends.js';
import { assertTopK, assertUnitInterval } from './errors.js';
import { DEFAULT_HEADER, DEFAULT_SNIPPET_CHARS, renderContext } from './formatter.js';
import { DEFAULT_FUSION_WEIGHT, fuseScores } from './fusion.js';
import { normalizeRows, rowToRecord } from './normalizer.js';
import { composeQuery } from './query-composer.js';
import { DEFAULT_MMR_LAMBDA, mmrRerank } from './reranker.js';
import type { ContextRequest, ContextResult, KeyFacts, Row } from './types.js';

/** Default number of passages in a context */
export const DEFAULT_TOP_K = 5;

/**
 * Shown by the application layer when a context came back empty.
 */
export const NO_MATCHING_PASSAGES = 'No directly matching rule passages found.';

/**
 * Engine construction options.
 */
export interface RetrievalEngineOptions {
  /** Storage collaborator (null/absent = nothing to search) */
  backend?: KnowledgeBackend | null;
  /** Query embedder (null/absent = no vector search possible) */
  embeddingClient?: EmbeddingClient | null;
  topK?: number;
  /** Vector weight when both backends return rows (alpha) */
  fusionWeight?: number;
  mmrLambda?: number;
  /** Candidates fetched per backend = topK * fetchMultiplier */
  fetchMultiplier?: number;
  /** Per-call backend timeout in ms (0 = none) */
  backendTimeoutMs?: number;
  /** Run keyword search when the backend offers it */
  keywordSearch?: boolean;
  /** Context block header */
  header?: string;
  /** Maximum passage characters per context line */
  snippetChars?: number;
  logger?: Logger;
}

export class RetrievalEngine {
  private readonly backends: ResolvedBackends;
  private readonly embeddingClient: EmbeddingClient | null;
  private readonly topK: number;
  private readonly fusionWeight: number;
  private readonly mmrLambda: number;
  private readonly fetchMultiplier: number;
  private readonly backendTimeoutMs: number;
  private readonly header: string;
  private readonly snippetChars: number;
  private readonly logger: Logger;

  /**
   * @throws RetrievalParameterError for an invalid topK, fusion weight or lambda
   */
  constructor(options: RetrievalEngineOptions = {}) {
    const resolved = resolveBackends(options.backend);
    this.backends =
      options.keywordSearch === false ? { ...resolved, searchByKeyword: null } : resolved;
    this.embeddingClient = options.embeddingClient ?? null;
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.fusionWeight = options.fusionWeight ?? DEFAULT_FUSION_WEIGHT;
    this.mmrLambda = options.mmrLambda ?? DEFAULT_MMR_LAMBDA;
    this.fetchMultiplier = options.fetchMultiplier ?? DEFAULT_FETCH_MULTIPLIER;
    this.backendTimeoutMs = options.backendTimeoutMs ?? 0;
    this.header = options.header ?? DEFAULT_HEADER;
    this.snippetChars = options.snippetChars ?? DEFAULT_SNIPPET_CHARS;
    this.logger = options.logger ?? silentLogger;

    assertTopK(this.topK);
    assertUnitInterval('fusion weight', this.fusionWeight);
    assertUnitInterval('MMR lambda', this.mmrLambda);
  }

  /** Whether any search backend is available */
  get searchable(): boolean {
    return this.backends.searchByVector !== null || this.backends.searchByKeyword !== null;
  }

  /**
   * Retrieve and render the rule passages relevant to a project.
   *
   * Returns `{ contextText: '', rows: [] }` when no backend is available or
   * nothing matched.
   *
   * @throws EmbeddingUnavailableError if vector search is available but no
   * embedding client is configured
   * @throws RetrievalParameterError for an invalid topK
   */
  async getContext(keyFacts: KeyFacts, request: ContextRequest = {}): Promise<ContextResult> {
    const query = composeQuery(keyFacts, request);
    const rows = await this.retrieve(query, request.topK ?? this.topK);

    return {
      contextText: renderContext(rows, { header: this.header, maxChars: this.snippetChars }),
      rows: rows.map(rowToRecord),
    };
  }

  /**
   * Run the retrieval pipeline for an already-composed query and return the
   * selected rows in MMR order.
   */
  async retrieve(query: string, topK: number = this.topK): Promise<Row[]> {
    assertTopK(topK);

    const { searchByVector, searchByKeyword } = this.backends;
    if (searchByVector === null && searchByKeyword === null) {
      this.logger.debug?.('No retrieval backend available');
      return [];
    }
    if (searchByVector !== null && this.embeddingClient === null) {
      throw new EmbeddingUnavailableError(
        'Vector search is available but no embedding provider is configured'
      );
    }
    if (topK === 0) {
      return [];
    }

    const limit = fetchSize(topK, this.fetchMultiplier);
    const embedding = searchByVector !== null ? await this.embedQuery(query) : null;

    const callOptions = { timeoutMs: this.backendTimeoutMs, logger: this.logger };
    const [vectorOutcome, keywordOutcome] = await Promise.all([
      searchByVector !== null && embedding !== null
        ? callBackend('Vector search', () => searchByVector(embedding, limit), callOptions)
        : null,
      searchByKeyword !== null
        ? callBackend('Keyword search', () => searchByKeyword(query, limit), callOptions)
        : null,
    ]);

    const vectorRows = vectorOutcome?.ok ? normalizeRows(vectorOutcome.value) : [];
    const keywordRows = keywordOutcome?.ok ? normalizeRows(keywordOutcome.value) : [];
    this.logger.debug?.(`Retrieved ${vectorRows.length} vector and ${keywordRows.length} keyword rows`);

    if (vectorRows.length === 0 && keywordRows.length === 0) {
      return [];
    }

    const fused = fuseScores(vectorRows, keywordRows, this.fusionWeight);
    const withEmbeddings = await this.attachEmbeddings(fused);
    return mmrRerank(withEmbeddings, topK, this.mmrLambda);
  }

  /**
   * Embed the query. Configuration errors propagate; any other failure is
   * logged and disables vector search for this request.
   */
  private async embedQuery(query: string): Promise<number[] | null> {
    const client = this.embeddingClient;
    if (client === null) {
      return null;
    }
    try {
      return await client.embed(query);
    } catch (error) {
      if (error instanceof EmbeddingUnavailableError) {
        throw error;
      }
      this.logger.warn(`Query embedding failed, using keyword search only: ${describeError(error)}`);
      return null;
    }
  }

  /**
   * Fill in document embeddings the rows don't carry, when the backend can
   * look them up. Lookup failures leave the rows as they are (MMR then
   * compares their text).
   */
  private async attachEmbeddings(rows: Row[]): Promise<Row[]> {
    const lookup = this.backends.getEmbeddingsForIds;
    const missing = rows.filter((row) => row.embedding === undefined).map((row) => row.id);
    if (lookup === null || missing.length === 0) {
      return rows;
    }

    const outcome = await callBackend('Embedding lookup', () => lookup(missing), {
      timeoutMs: this.backendTimeoutMs,
      logger: this.logger,
    });
    if (!outcome.ok) {
      return rows;
    }

    const embeddings = outcome.value;
    return rows.map((row) => {
      const embedding = row.embedding === undefined ? embeddings.get(row.id) : undefined;
      return embedding === undefined ? row : { ...row, embedding };
    });
  }
}

/**
 * User-facing description of a context result: the block itself, or the
 * no-match message when it is empty.
 */
export function describeContext(result: ContextResult): string {
  return result.contextText === '' ? NO_MATCHING_PASSAGES : result.contextText;
}
