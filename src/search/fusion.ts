/**
 * Score Fusion
 *
 * Combines vector-similarity and keyword scores. The two lists are min-max
 * normalized independently (a cosine range and a full-text score range are
 * not comparable), then:
 *
 * - only vector rows:  score = norm(vector)
 * - only keyword rows: score = norm(keyword)
 * - both:              vector rows get alpha * norm(vector); keyword rows get
 *                      max(existing, (1 - alpha) * norm(keyword))
 *
 * A row found by both backends keeps the larger of its two weighted scores
 * rather than their sum.
 */

import { assertUnitInterval } from './errors.js';
import { CITATION_FIELDS } from './normalizer.js';
import type { Row } from './types.js';

/** Weight of the vector score when both backends return rows */
export const DEFAULT_FUSION_WEIGHT = 0.6;

/**
 * Min-max normalize to [0, 1]. A constant list (including a single score)
 * normalizes to all zeros.
 */
export function minMaxNormalize(scores: readonly number[]): number[] {
  if (scores.length === 0) {
    return [];
  }

  let min = Infinity;
  let max = -Infinity;
  for (const score of scores) {
    if (score < min) min = score;
    if (score > max) max = score;
  }

  const range = max - min;
  if (!(range > 0) || !Number.isFinite(range)) {
    return scores.map(() => 0);
  }
  return scores.map((score) => (score - min) / range);
}

/**
 * Fill the citation fields, embedding and text that `primary` lacks from
 * `secondary`. Returns a new row; the score and raw record of `primary` win.
 */
export function mergeRows(primary: Row, secondary: Row): Row {
  const merged: Row = { ...primary };
  if (merged.text === '' && secondary.text !== '') {
    merged.text = secondary.text;
  }
  for (const field of CITATION_FIELDS) {
    if (merged[field] === undefined && secondary[field] !== undefined) {
      merged[field] = secondary[field];
    }
  }
  if (merged.embedding === undefined && secondary.embedding !== undefined) {
    merged.embedding = secondary.embedding;
  }
  return merged;
}

/**
 * Collapse repeated ids within one backend's list, keeping the first
 * occurrence with the highest raw score seen for that id.
 */
export function dedupeRows(rows: readonly Row[]): Row[] {
  const byId = new Map<string, Row>();
  for (const row of rows) {
    const existing = byId.get(row.id);
    if (existing === undefined) {
      byId.set(row.id, row);
    } else {
      byId.set(row.id, {
        ...mergeRows(existing, row),
        relevanceScore: Math.max(existing.relevanceScore, row.relevanceScore),
      });
    }
  }
  return [...byId.values()];
}

function withNormalizedScores(rows: readonly Row[], weight: number): Row[] {
  const normalized = minMaxNormalize(rows.map((row) => row.relevanceScore));
  return rows.map((row, i) => ({ ...row, relevanceScore: weight * (normalized[i] ?? 0) }));
}

function byScoreDescending(a: Row, b: Row): number {
  return b.relevanceScore - a.relevanceScore;
}

/**
 * Fuse the two backends' rows into one list sorted by fused score
 * (stable: equal scores keep vector-first input order).
 *
 * @throws RetrievalParameterError if alpha is outside [0, 1]
 */
export function fuseScores(
  vectorRows: readonly Row[],
  keywordRows: readonly Row[],
  alpha: number = DEFAULT_FUSION_WEIGHT
): Row[] {
  assertUnitInterval('fusion weight', alpha);

  const vector = dedupeRows(vectorRows);
  const keyword = dedupeRows(keywordRows);

  if (vector.length === 0) {
    return withNormalizedScores(keyword, 1).sort(byScoreDescending);
  }
  if (keyword.length === 0) {
    return withNormalizedScores(vector, 1).sort(byScoreDescending);
  }

  const fused = new Map<string, Row>();
  for (const row of withNormalizedScores(vector, alpha)) {
    fused.set(row.id, row);
  }
  for (const row of withNormalizedScores(keyword, 1 - alpha)) {
    const existing = fused.get(row.id);
    if (existing === undefined) {
      fused.set(row.id, row);
    } else {
      fused.set(row.id, {
        ...mergeRows(existing, row),
        relevanceScore: Math.max(existing.relevanceScore, row.relevanceScore),
      });
    }
  }

  return [...fused.values()].sort(byScoreDescending);
}
