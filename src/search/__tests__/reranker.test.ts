import { describe, it, expect } from 'vitest';

import {
  cosineSimilarity,
  jaccardSimilarity,
  mmrRerank,
  rowSimilarity,
  tokenize,
} from '../reranker.js';
import { RetrievalParameterError } from '../errors.js';
import type { Row } from '../types.js';

function row(id: string, relevanceScore: number, extra: Partial<Row> = {}): Row {
  return { id, text: '', relevanceScore, raw: {}, ...extra };
}

const ids = (rows: Row[]): string[] => rows.map((r) => r.id);

describe('mmrRerank', () => {
  it('picks equally relevant rows in input order', () => {
    const rows = [
      row('A', 0.9, { text: 'odmik od meje' }),
      row('B', 0.9, { text: 'naklon strehe' }),
      row('C', 0.1, { text: 'zelene površine' }),
    ];

    expect(ids(mmrRerank(rows, 2, 1))).toEqual(['A', 'B']);
  });

  it('returns min(topK, rows) rows', () => {
    const rows = [row('a', 0.3), row('b', 0.2), row('c', 0.1)];

    expect(mmrRerank(rows, 0)).toEqual([]);
    expect(mmrRerank(rows, 2)).toHaveLength(2);
    expect(mmrRerank(rows, 10)).toHaveLength(3);
    expect(mmrRerank([], 5)).toEqual([]);
  });

  it('always selects the most relevant row first', () => {
    const rows = [row('a', 0.2), row('b', 0.7), row('c', 0.5)];

    expect(mmrRerank(rows, 1, 0.5)[0]?.id).toBe('b');
  });

  it('prefers a different passage over a near duplicate', () => {
    const rows = [
      row('a', 1.0, { embedding: [1, 0] }),
      row('b', 0.95, { embedding: [1, 0] }),
      row('c', 0.7, { embedding: [0, 1] }),
    ];

    expect(ids(mmrRerank(rows, 3, 0.75))).toEqual(['a', 'c', 'b']);
    expect(ids(mmrRerank(rows, 3, 1))).toEqual(['a', 'b', 'c']);
  });

  it('compares text when rows carry no embeddings', () => {
    const rows = [
      row('a', 1.0, { text: 'Odmik od parcelne meje 4 m' }),
      row('b', 0.9, { text: 'odmik od parcelne meje 4 m' }),
      row('c', 0.7, { text: 'Naklon strehe 45 stopinj' }),
    ];

    expect(ids(mmrRerank(rows, 2, 0.75))).toEqual(['a', 'c']);
  });

  it('rewards rows pointing away from the selection', () => {
    const rows = [
      row('a', 1.0, { embedding: [1, 0] }),
      row('b', 0.5, { embedding: [0, 1] }),
      row('c', 0.5, { embedding: [-1, 0] }),
    ];

    expect(ids(mmrRerank(rows, 2, 0.5))).toEqual(['a', 'c']);
  });

  it('keeps the fused relevance scores', () => {
    const rows = [row('a', 0.8), row('b', 0.3)];

    expect(mmrRerank(rows, 2).map((r) => r.relevanceScore)).toEqual([0.8, 0.3]);
  });

  it('is deterministic', () => {
    const rows = [
      row('a', 0.5, { text: 'streha' }),
      row('b', 0.5, { text: 'streha' }),
      row('c', 0.4, { text: 'fasada' }),
    ];

    expect(ids(mmrRerank(rows, 3))).toEqual(ids(mmrRerank(rows, 3)));
  });

  it('rejects invalid parameters', () => {
    expect(() => mmrRerank([], -1)).toThrow(RetrievalParameterError);
    expect(() => mmrRerank([], 1.5)).toThrow(RetrievalParameterError);
    expect(() => mmrRerank([], 1, 1.2)).toThrow(RetrievalParameterError);
  });
});

describe('tokenize', () => {
  it('splits on non-alphanumerics and keeps letters of any script', () => {
    expect(tokenize('Višina: 12,5 m; ČLEN 84.')).toEqual(
      new Set(['višina', '12', '5', 'm', 'člen', '84'])
    );
  });
});

describe('cosineSimilarity', () => {
  it('computes the angle between vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1);
  });

  it('gives 0 for mismatched lengths and zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });
});

describe('jaccardSimilarity', () => {
  it('is intersection over union', () => {
    expect(jaccardSimilarity(new Set(['a', 'b']), new Set(['b', 'c']))).toBeCloseTo(1 / 3);
    expect(jaccardSimilarity(new Set(), new Set())).toBe(0);
  });
});

describe('rowSimilarity', () => {
  it('falls back to text when embedding lengths differ', () => {
    const a = row('a', 1, { text: 'ravna streha', embedding: [1, 0] });
    const b = row('b', 1, { text: 'Ravna streha', embedding: [0, 1, 0] });

    expect(rowSimilarity(a, b)).toBe(1);
  });
});
