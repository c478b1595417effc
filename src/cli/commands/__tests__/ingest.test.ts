/**
 * Tests for ingest command
 *
 * Output is read from the NDJSON event stream (--json), which doesn't depend
 * on whether stdout is a TTY.
 */

import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createIngestCommand } from '../ingest.js';
import { getDb, KnowledgeStore } from '../../../database/index.js';
import { FileNotFoundError } from '../../../errors/index.js';
import { createEmbeddingProvider } from '../../../indexer/embedder/index.js';
import { createTestContext, runCommand, useTempHome, type TempHome } from '../../../test-utils/index.js';

vi.mock('../../../indexer/embedder/index.js', async (importOriginal) => {
  const original = await importOriginal<typeof import('../../../indexer/embedder/index.js')>();
  return { ...original, createEmbeddingProvider: vi.fn() };
});

const IZRAZI = {
  terms: [
    { term: 'Faktor zazidanosti', definition: 'Razmerje med zazidano površino in površino parcele.' },
    { term: 'Etažnost', definition: 'Število etaž nad terenom.' },
  ],
};

interface ProgressEventLine {
  type: string;
  data: Record<string, unknown>;
}

function events(spy: { mock: { calls: unknown[][] } }): ProgressEventLine[] {
  return spy.mock.calls.map((call) => JSON.parse(String(call[0])));
}

describe('ingest command', () => {
  let home: TempHome;
  let izraziPath: string;

  beforeEach(() => {
    home = useTempHome();
    izraziPath = join(home.dir, 'izrazi.json');
    writeFileSync(izraziPath, JSON.stringify(IZRAZI), 'utf-8');
  });

  afterEach(() => {
    home.cleanup();
    vi.restoreAllMocks();
    vi.mocked(createEmbeddingProvider).mockReset();
  });

  it('stores passages without embeddings with --no-embed', async () => {
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { ctx } = createTestContext({ json: true });

    await runCommand(createIngestCommand(() => ctx), ['ingest', izraziPath, '--no-embed']);

    const complete = events(consoleLogSpy).at(-1);
    expect(complete?.type).toBe('complete');
    expect(complete?.data.result).toMatchObject({
      chunksCreated: 2,
      chunksEmbedded: 0,
      chunksStored: 2,
      chunksRemoved: 0,
      bySource: { izrazi: 2 },
      embeddingModel: null,
    });
    expect(createEmbeddingProvider).not.toHaveBeenCalled();

    const store = new KnowledgeStore(getDb());
    expect(store.countChunks()).toBe(2);
    expect(store.countEmbedded()).toBe(0);
  });

  it('embeds passages with the configured provider', async () => {
    const embed = vi.fn(async () => [0.5, 0.5]);
    vi.mocked(createEmbeddingProvider).mockReturnValue({
      name: 'gemini',
      model: 'text-embedding-004',
      embed,
    });
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { ctx } = createTestContext({ json: true });

    await runCommand(createIngestCommand(() => ctx), ['ingest', izraziPath]);

    expect(embed).toHaveBeenCalledTimes(2);
    expect(embed).toHaveBeenCalledWith(expect.any(String), 'RETRIEVAL_DOCUMENT');
    expect(events(consoleLogSpy).at(-1)?.data.result).toMatchObject({
      chunksEmbedded: 2,
      embeddingModel: 'text-embedding-004',
    });

    const store = new KnowledgeStore(getDb());
    expect(store.countEmbedded()).toBe(2);
    expect(store.listEmbeddingModels()).toEqual(['text-embedding-004']);
  });

  it('removes earlier passages with --replace', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const { ctx } = createTestContext({ json: true });
    const opnPath = join(home.dir, 'opn.json');
    writeFileSync(opnPath, JSON.stringify({ odmiki: 'Odmik od meje je najmanj 4 m.' }), 'utf-8');

    await runCommand(createIngestCommand(() => ctx), ['ingest', opnPath, '--no-embed']);
    await runCommand(createIngestCommand(() => ctx), ['ingest', izraziPath, '--no-embed', '--replace']);

    expect(new KnowledgeStore(getDb()).listSources()).toEqual([
      { source: 'izrazi', chunks: 2, embedded: 0 },
    ]);
  });

  it('throws FileNotFoundError for a missing file', async () => {
    const { ctx } = createTestContext({ json: true });

    await expect(
      runCommand(createIngestCommand(() => ctx), ['ingest', join(home.dir, 'missing.json'), '--no-embed'])
    ).rejects.toBeInstanceOf(FileNotFoundError);
  });
});
