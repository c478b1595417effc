/**
 * Tests for search command
 *
 * Runs against a real knowledge base in a temp data directory; the embedding
 * provider is replaced by a fixed-vector fake.
 */

import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import chalk from 'chalk';

import { createSearchCommand } from '../search.js';
import { getDb, runMigrations, KnowledgeStore } from '../../../database/index.js';
import type { KnowledgeChunkInput } from '../../../database/index.js';
import { ValidationError } from '../../../errors/index.js';
import { createEmbeddingProvider } from '../../../indexer/embedder/index.js';
import { createTestContext, runCommand, useTempHome, type TempHome } from '../../../test-utils/index.js';

vi.mock('../../../indexer/embedder/index.js', async (importOriginal) => {
  const original = await importOriginal<typeof import('../../../indexer/embedder/index.js')>();
  return { ...original, createEmbeddingProvider: vi.fn() };
});

const ODMIK: KnowledgeChunkInput = {
  id: 'a',
  source: 'opn',
  key: 'clen_84',
  content: 'Odmik od parcelne meje je najmanj 4 m.',
  metadata: { article: '84. člen' },
};

const NAKLON: KnowledgeChunkInput = {
  id: 'b',
  source: 'opn',
  key: 'clen_85',
  content: 'Naklon strehe je med 35 in 45 stopinj.',
  metadata: { article: '85. člen' },
};

function seed(chunks: KnowledgeChunkInput[]): void {
  runMigrations();
  new KnowledgeStore(getDb()).upsertChunks(chunks);
}

describe('createSearchCommand', () => {
  let home: TempHome;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    home = useTempHome();
  });

  afterEach(() => {
    home.cleanup();
    vi.restoreAllMocks();
    vi.mocked(createEmbeddingProvider).mockReset();
  });

  it('searches by keyword when nothing is embedded', async () => {
    seed([ODMIK, NAKLON]);
    const { ctx, output } = createTestContext();

    await runCommand(createSearchCommand(() => ctx), ['search', 'odmik']);

    expect(output.log).toEqual([
      'Found 1 result for "odmik"',
      '',
      '[0.000] source: opn, article: 84. člen\n  Odmik od parcelne meje je najmanj 4 m.',
    ]);
    expect(output.debug).toContain('No stored embeddings; using keyword search only');
    expect(createEmbeddingProvider).not.toHaveBeenCalled();
  });

  it('fuses vector and keyword results when passages are embedded', async () => {
    seed([
      { ...ODMIK, embedding: [1, 0], embeddingModel: 'text-embedding-004' },
      { ...NAKLON, embedding: [0, 1], embeddingModel: 'text-embedding-004' },
    ]);
    const embed = vi.fn(async () => [1, 0]);
    vi.mocked(createEmbeddingProvider).mockReturnValue({
      name: 'gemini',
      model: 'text-embedding-004',
      embed,
    });
    const { ctx, output } = createTestContext();

    await runCommand(createSearchCommand(() => ctx), ['search', 'strehe']);

    expect(embed).toHaveBeenCalledWith('strehe', 'RETRIEVAL_QUERY');
    expect(output.log).toEqual([
      'Found 2 results for "strehe"',
      '',
      '[0.600] source: opn, article: 84. člen\n  Odmik od parcelne meje je najmanj 4 m.\n\n' +
        '[0.000] source: opn, article: 85. člen\n  Naklon strehe je med 35 in 45 stopinj.',
    ]);
    expect(output.warn).toEqual([]);
  });

  it('warns when the stored model differs from the configured one', async () => {
    seed([{ ...ODMIK, embedding: [1, 0], embeddingModel: 'other-model' }]);
    vi.mocked(createEmbeddingProvider).mockReturnValue({
      name: 'gemini',
      model: 'text-embedding-004',
      embed: async () => [1, 0],
    });
    const { ctx, output } = createTestContext();

    await runCommand(createSearchCommand(() => ctx), ['search', 'odmik']);

    expect(output.warn).toEqual([
      'Knowledge base was embedded with other-model but queries use text-embedding-004; re-ingest to match',
    ]);
  });

  it('shows tips when nothing matches', async () => {
    seed([ODMIK]);
    const { ctx, output } = createTestContext();

    await runCommand(createSearchCommand(() => ctx), ['search', 'zzz']);

    expect(output.log[0]).toBe('No results found for "zzz"');
  });

  it('limits results with --top-k', async () => {
    seed([ODMIK, NAKLON]);
    const { ctx, output } = createTestContext();

    await runCommand(createSearchCommand(() => ctx), ['search', 'je', '-k', '1']);

    expect(output.log[0]).toBe('Found 1 result for "je"');
  });

  it('outputs JSON records', async () => {
    seed([ODMIK]);
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { ctx } = createTestContext({ json: true });

    await runCommand(createSearchCommand(() => ctx), ['search', 'odmik']);

    const json = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(json).toEqual({
      query: 'odmik',
      count: 1,
      results: [
        {
          id: 'a',
          text: 'Odmik od parcelne meje je najmanj 4 m.',
          relevance_score: 0,
          source: 'opn',
          article: '84. člen',
        },
      ],
    });
  });

  it('rejects an invalid --top-k', async () => {
    const { ctx } = createTestContext();

    await expect(
      runCommand(createSearchCommand(() => ctx), ['search', 'odmik', '-k', '0'])
    ).rejects.toThrow('Invalid --top-k value');
  });

  it('rejects an empty query', async () => {
    const { ctx } = createTestContext();

    await expect(
      runCommand(createSearchCommand(() => ctx), ['search', '   '])
    ).rejects.toBeInstanceOf(ValidationError);
  });
});
