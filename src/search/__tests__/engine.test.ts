import { describe, it, expect, vi } from 'vitest';

import { RetrievalEngine, NO_MATCHING_PASSAGES, describeContext } from '../engine.js';
import { RetrievalParameterError } from '../errors.js';
import { EmbeddingClient } from '../../indexer/embedder/client.js';
import { EmbeddingUnavailableError } from '../../indexer/embedder/errors.js';

function spyLogger() {
  return { warn: vi.fn(), debug: vi.fn() };
}

function queryClient(vector: number[] = [1, 0]): EmbeddingClient {
  return new EmbeddingClient({ embed: async () => vector });
}

const keyFacts = { vrsta_gradnje: 'novogradnja', glavni_objekt: 'enostanovanjska hiša' };

describe('RetrievalEngine', () => {
  describe('without backends', () => {
    it('returns an empty context', async () => {
      const engine = new RetrievalEngine();

      expect(engine.searchable).toBe(false);
      await expect(engine.getContext(keyFacts)).resolves.toEqual({ contextText: '', rows: [] });
    });

    it('treats a backend without search methods as absent', async () => {
      const engine = new RetrievalEngine({ backend: {} });

      await expect(engine.getContext(keyFacts)).resolves.toEqual({ contextText: '', rows: [] });
    });
  });

  describe('vector search', () => {
    it('normalizes a lone result to a score of 0', async () => {
      const engine = new RetrievalEngine({
        backend: {
          searchByVector: async () => [{ id: 'x', similarity: 0.8, text: 'Odmik 4 m.', vir: 'OPN' }],
        },
        embeddingClient: queryClient(),
      });

      const result = await engine.getContext(keyFacts);

      expect(result.rows).toEqual([{ id: 'x', text: 'Odmik 4 m.', relevance_score: 0, source: 'OPN' }]);
      expect(result.contextText).toBe('Relevant rules/citations:\n1. source: OPN — Odmik 4 m.');
    });

    it('asks for topK times the fetch multiplier', async () => {
      const searchByVector = vi.fn(async (_embedding: number[], _limit: number) => []);
      const engine = new RetrievalEngine({
        backend: { searchByVector },
        embeddingClient: queryClient([0.3, 0.4]),
        topK: 2,
      });

      await engine.getContext(keyFacts);

      expect(searchByVector).toHaveBeenCalledWith([0.3, 0.4], 8);
    });

    it('requires an embedding client', async () => {
      const engine = new RetrievalEngine({ backend: { searchByVector: async () => [] } });

      await expect(engine.getContext(keyFacts)).rejects.toThrow(EmbeddingUnavailableError);
    });

    it('propagates an unconfigured embedding client', async () => {
      const engine = new RetrievalEngine({
        backend: { searchByVector: async () => [] },
        embeddingClient: new EmbeddingClient(),
      });

      await expect(engine.getContext(keyFacts)).rejects.toThrow(EmbeddingUnavailableError);
    });
  });

  describe('hybrid search', () => {
    const backend = {
      searchByVector: vi.fn(async () => [
        { id: 'a', similarity: 0.9, text: 'Odmik od meje 4 m' },
        { id: 'b', similarity: 0.4, text: 'Naklon strehe 40' },
      ]),
      searchByKeyword: vi.fn(async () => [
        { id: 'b', score: 5, text: 'Naklon strehe 40', clen: '12. člen' },
        { id: 'c', score: 1, text: 'Zelene površine 20 %' },
      ]),
    };

    it('fuses and re-ranks rows from both backends', async () => {
      const engine = new RetrievalEngine({ backend, embeddingClient: queryClient(), topK: 3 });

      const { rows } = await engine.getContext(keyFacts);

      expect(rows.map((row) => row.id)).toEqual(['a', 'b', 'c']);
      expect(rows[0]?.relevance_score).toBeCloseTo(0.6);
      expect(rows[1]?.relevance_score).toBeCloseTo(0.4);
      expect(rows[1]?.article).toBe('12. člen');
      expect(rows[2]?.relevance_score).toBe(0);
    });

    it('honours a per-request topK', async () => {
      const engine = new RetrievalEngine({ backend, embeddingClient: queryClient() });

      const { rows } = await engine.getContext(keyFacts, { topK: 1 });

      expect(rows.map((row) => row.id)).toEqual(['a']);
    });

    it('skips keyword search when disabled', async () => {
      const searchByKeyword = vi.fn(async () => []);
      const engine = new RetrievalEngine({
        backend: { searchByVector: backend.searchByVector, searchByKeyword },
        embeddingClient: queryClient(),
        keywordSearch: false,
      });

      await engine.getContext(keyFacts);

      expect(searchByKeyword).not.toHaveBeenCalled();
    });

    it('queries both backends concurrently', async () => {
      let resolveVector: (rows: unknown[]) => void = () => {};
      const searchByVector = vi.fn(
        () => new Promise<unknown[]>((resolve) => (resolveVector = resolve))
      );
      const searchByKeyword = vi.fn(async () => []);
      const engine = new RetrievalEngine({
        backend: { searchByVector, searchByKeyword },
        embeddingClient: queryClient(),
      });

      const pending = engine.retrieve('streha', 1);
      await vi.waitFor(() => expect(searchByVector).toHaveBeenCalled());

      expect(searchByKeyword).toHaveBeenCalledWith('streha', 4);
      resolveVector([]);
      await expect(pending).resolves.toEqual([]);
    });
  });

  describe('degradation', () => {
    it('answers from keyword search when vector search fails', async () => {
      const logger = spyLogger();
      const engine = new RetrievalEngine({
        backend: {
          searchByVector: async () => {
            throw new Error('index offline');
          },
          searchByKeyword: async () => [{ id: 'k', score: 2, text: 'Streha.' }],
        },
        embeddingClient: queryClient(),
        logger,
      });

      const { rows } = await engine.getContext(keyFacts);

      expect(rows.map((row) => row.id)).toEqual(['k']);
      expect(logger.warn).toHaveBeenCalledWith('Vector search failed: Error: index offline');
    });

    it('skips vector search when the query cannot be embedded', async () => {
      const logger = spyLogger();
      const searchByVector = vi.fn(async () => []);
      const engine = new RetrievalEngine({
        backend: { searchByVector, searchByKeyword: async () => [{ id: 'k', text: 'Streha.' }] },
        embeddingClient: new EmbeddingClient({
          embed: async () => {
            throw new Error('quota');
          },
        }),
        logger,
      });

      const { rows } = await engine.getContext(keyFacts);

      expect(searchByVector).not.toHaveBeenCalled();
      expect(rows.map((row) => row.id)).toEqual(['k']);
      expect(logger.warn).toHaveBeenCalledWith(
        'Query embedding failed, using keyword search only: Error: quota'
      );
    });

    it('returns an empty context when every backend fails', async () => {
      const engine = new RetrievalEngine({
        backend: {
          searchByKeyword: async () => {
            throw new Error('locked');
          },
        },
      });

      await expect(engine.getContext(keyFacts)).resolves.toEqual({ contextText: '', rows: [] });
    });

    it('keeps rows when the embedding lookup fails', async () => {
      const logger = spyLogger();
      const engine = new RetrievalEngine({
        backend: {
          searchByKeyword: async () => [{ id: 'k', text: 'Streha.' }],
          getEmbeddingsForIds: () => {
            throw new Error('gone');
          },
        },
        logger,
      });

      const { rows } = await engine.getContext(keyFacts);

      expect(rows.map((row) => row.id)).toEqual(['k']);
      expect(logger.warn).toHaveBeenCalledWith('Embedding lookup failed: Error: gone');
    });
  });

  describe('embedding lookup', () => {
    it('uses stored embeddings to diversify', async () => {
      const getEmbeddingsForIds = vi.fn((ids: string[]) => {
        const stored: Record<string, number[]> = { a: [1, 0], b: [1, 0], c: [0, 1], d: [0, 1] };
        return Object.fromEntries(ids.map((id) => [id, stored[id]]));
      });
      const engine = new RetrievalEngine({
        backend: {
          searchByVector: async () => [
            { id: 'a', similarity: 1.0, text: 'prvi' },
            { id: 'b', similarity: 0.96, text: 'drugi' },
            { id: 'c', similarity: 0.95, text: 'tretji' },
            { id: 'd', similarity: 0.0, text: 'četrti' },
          ],
          getEmbeddingsForIds,
        },
        embeddingClient: queryClient(),
        topK: 2,
        mmrLambda: 0.75,
      });

      const { rows } = await engine.getContext(keyFacts);

      expect(getEmbeddingsForIds).toHaveBeenCalledWith(['a', 'b', 'c', 'd']);
      expect(rows.map((row) => row.id)).toEqual(['a', 'c']);
    });

    it('does not look up rows that carry an embedding', async () => {
      const getEmbeddingsForIds = vi.fn(() => ({}));
      const engine = new RetrievalEngine({
        backend: {
          searchByKeyword: async () => [{ id: 'k', text: 'Streha.', embedding: [1, 0] }],
          getEmbeddingsForIds,
        },
      });

      await engine.getContext(keyFacts);

      expect(getEmbeddingsForIds).not.toHaveBeenCalled();
    });
  });

  describe('parameters', () => {
    it('rejects invalid construction options', () => {
      expect(() => new RetrievalEngine({ fusionWeight: 2 })).toThrow(RetrievalParameterError);
      expect(() => new RetrievalEngine({ mmrLambda: -0.5 })).toThrow(RetrievalParameterError);
      expect(() => new RetrievalEngine({ topK: 2.5 })).toThrow(RetrievalParameterError);
    });

    it('rejects an invalid per-request topK', async () => {
      const engine = new RetrievalEngine({ backend: { searchByKeyword: async () => [] } });

      await expect(engine.getContext(keyFacts, { topK: -1 })).rejects.toThrow(RetrievalParameterError);
    });

    it('returns nothing for topK 0 without calling backends', async () => {
      const searchByKeyword = vi.fn(async () => []);
      const engine = new RetrievalEngine({ backend: { searchByKeyword } });

      await expect(engine.retrieve('streha', 0)).resolves.toEqual([]);
      expect(searchByKeyword).not.toHaveBeenCalled();
    });
  });
});

describe('describeContext', () => {
  it('substitutes the no-match message for an empty context', () => {
    expect(describeContext({ contextText: '', rows: [] })).toBe(NO_MATCHING_PASSAGES);
    expect(describeContext({ contextText: 'Relevant rules/citations:\n1. x', rows: [] })).toBe(
      'Relevant rules/citations:\n1. x'
    );
  });
});
