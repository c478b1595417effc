/**
 * Diversity Re-ranker (Maximal Marginal Relevance)
 *
 * Greedy MMR: repeatedly pick the candidate maximizing
 *
 *   lambda * relevance - (1 - lambda) * max(similarity to already selected)
 *
 * Similarity is the cosine of the rows' embeddings when both have one of the
 * same length, otherwise the Jaccard overlap of their word tokens, so rows
 * are diversified even when the store returns no document embeddings.
 */

import { assertTopK, assertUnitInterval } from './errors.js';
import type { Row } from './types.js';

/** Relevance-dominant default; a single dispositive clause must not be dropped for variety */
export const DEFAULT_MMR_LAMBDA = 0.75;

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Lower-cased alphanumeric tokens of a text (any script).
 */
export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().match(TOKEN_PATTERN) ?? []);
}

/**
 * Cosine similarity. Zero vectors and length mismatches give 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Jaccard similarity of two token sets. Two empty sets give 0.
 */
export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) {
    return 0;
  }
  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

/**
 * Similarity of two rows as used by MMR. `tokenCache` keeps each row's
 * token set across calls.
 */
export function rowSimilarity(a: Row, b: Row, tokenCache?: Map<Row, Set<string>>): number {
  if (a.embedding && b.embedding && a.embedding.length === b.embedding.length) {
    return cosineSimilarity(a.embedding, b.embedding);
  }
  return jaccardSimilarity(tokensOf(a, tokenCache), tokensOf(b, tokenCache));
}

/**
 * Select up to topK rows by MMR, in selection order. The first row is always
 * the most relevant one; among exactly equal MMR scores the earliest row in
 * input order wins.
 *
 * @throws RetrievalParameterError for a negative or fractional topK, or a
 * lambda outside [0, 1]
 */
export function mmrRerank(
  rows: readonly Row[],
  topK: number,
  lambda: number = DEFAULT_MMR_LAMBDA
): Row[] {
  assertTopK(topK);
  assertUnitInterval('MMR lambda', lambda);

  const tokenCache = new Map<Row, Set<string>>();
  // maxSimilarity stays null until something is selected (penalty 0)
  const pool = rows.map((row): { row: Row; maxSimilarity: number | null } => ({
    row,
    maxSimilarity: null,
  }));
  const selected: Row[] = [];

  while (pool.length > 0 && selected.length < topK) {
    let bestIndex = 0;
    let bestScore = -Infinity;
    for (let i = 0; i < pool.length; i++) {
      const candidate = pool[i];
      if (candidate === undefined) continue;
      const score =
        lambda * candidate.row.relevanceScore - (1 - lambda) * (candidate.maxSimilarity ?? 0);
      if (score > bestScore) {
        bestScore = score;
        bestIndex = i;
      }
    }

    const [best] = pool.splice(bestIndex, 1);
    if (best === undefined) break;
    selected.push(best.row);

    for (const candidate of pool) {
      const sim = rowSimilarity(candidate.row, best.row, tokenCache);
      candidate.maxSimilarity =
        candidate.maxSimilarity === null ? sim : Math.max(candidate.maxSimilarity, sim);
    }
  }

  return selected;
}

function tokensOf(row: Row, cache: Map<Row, Set<string>> | undefined): Set<string> {
  let set = cache?.get(row);
  if (set === undefined) {
    set = tokenize(row.text);
    cache?.set(row, set);
  }
  return set;
}
