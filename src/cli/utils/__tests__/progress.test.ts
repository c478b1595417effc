/**
 * ProgressReporter Tests
 *
 * Tests the progress display for different output modes:
 * - JSON (NDJSON events)
 * - Non-interactive (simple text)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ProgressReporter,
  createProgressReporter,
  formatDuration,
  type ProgressReporterOptions,
} from '../progress.js';
import type { IngestResult } from '../../../indexer/types.js';

const RESULT: IngestResult = {
  chunksCreated: 2,
  chunksEmbedded: 1,
  chunksStored: 2,
  chunksRemoved: 0,
  bySource: { opn: 2 },
  embeddingModel: 'test-model',
  totalDurationMs: 1500,
  stageDurations: { chunking: 3, embedding: 1200, storing: 40 },
  warnings: ['opn: no passages found'],
  errors: [],
};

describe('ProgressReporter', () => {
  let consoleOutput: string[] = [];

  beforeEach(() => {
    consoleOutput = [];
    const capture = (...args: unknown[]) => {
      consoleOutput.push(args.map(String).join(' '));
    };
    vi.spyOn(console, 'log').mockImplementation(capture);
    vi.spyOn(console, 'warn').mockImplementation(capture);
    vi.spyOn(console, 'error').mockImplementation(capture);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('JSON mode', () => {
    const jsonOptions: ProgressReporterOptions = {
      json: true,
      verbose: false,
      noColor: true,
      isInteractive: false,
    };

    it('emits stage_start events', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('embedding', 100);

      expect(consoleOutput).toHaveLength(1);
      const event = JSON.parse(consoleOutput[0] ?? '');
      expect(event.type).toBe('stage_start');
      expect(event.stage).toBe('embedding');
      expect(event.data).toEqual({ total: 100 });
    });

    it('emits stage_progress events', async () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('embedding', 50);

      await new Promise((resolve) => setTimeout(resolve, 150));
      reporter.updateProgress(25);

      expect(consoleOutput).toHaveLength(2);
      const event = JSON.parse(consoleOutput[1] ?? '');
      expect(event.type).toBe('stage_progress');
      expect(event.data).toEqual({ processed: 25, total: 50 });
    });

    it('ignores progress outside a stage', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.updateProgress(5);

      expect(consoleOutput).toEqual([]);
    });

    it('emits stage_complete events with details', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('chunking', 1);
      reporter.completeStage({
        stage: 'chunking',
        processed: 4,
        total: 4,
        durationMs: 12,
        details: { bySource: { opn: 4 } },
      });

      const event = JSON.parse(consoleOutput[1] ?? '');
      expect(event.type).toBe('stage_complete');
      expect(event.data).toEqual({
        processed: 4,
        total: 4,
        durationMs: 12,
        details: { bySource: { opn: 4 } },
      });
    });

    it('emits warnings with the current stage', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('storing', 1);
      reporter.warn('slow disk', 'opn');

      const event = JSON.parse(consoleOutput[1] ?? '');
      expect(event.type).toBe('warning');
      expect(event.stage).toBe('storing');
      expect(event.data).toEqual({ message: 'slow disk', context: 'opn' });
    });

    it('emits the result on completion', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.showSummary(RESULT);

      const event = JSON.parse(consoleOutput[0] ?? '');
      expect(event.type).toBe('complete');
      expect(event.data.result).toEqual(RESULT);
    });
  });

  describe('text mode', () => {
    const textOptions: ProgressReporterOptions = {
      json: false,
      verbose: false,
      noColor: true,
      isInteractive: false,
    };

    it('prints stage start and completion lines', () => {
      const reporter = new ProgressReporter(textOptions);
      reporter.startStage('chunking', 2);
      reporter.completeStage({ stage: 'chunking', processed: 2, total: 2, durationMs: 5 });

      expect(consoleOutput).toEqual(['Chunking...', 'Chunking complete: 2 passages']);
    });

    it('prints warnings and errors with their context', () => {
      const reporter = new ProgressReporter(textOptions);
      reporter.warn('unexpected structure', 'priloga2');
      reporter.error('quota', 'chunk-1');

      expect(consoleOutput).toEqual([
        'Warning: unexpected structure (priloga2)',
        'Error: quota (chunk-1)',
      ]);
    });

    it('prints a summary with counts per source', () => {
      const reporter = new ProgressReporter(textOptions);
      reporter.showSummary(RESULT);

      expect(consoleOutput).toContain('  Passages created:  2');
      expect(consoleOutput).toContain('  Passages embedded: 1');
      expect(consoleOutput).toContain('  Embedding model:   test-model');
      expect(consoleOutput).toContain('  Time elapsed:      1.5s');
      expect(consoleOutput).toContain('    opn           2');
      expect(consoleOutput).toContain('  1 warning(s), 0 error(s) during ingestion');
      expect(consoleOutput).not.toContain('  Breakdown:');
    });

    it('adds the stage breakdown and problems when verbose', () => {
      const reporter = new ProgressReporter({ ...textOptions, verbose: true });
      reporter.showSummary(RESULT);

      expect(consoleOutput).toContain('  Breakdown:');
      expect(consoleOutput).toContain('    Embedding:  1.2s');
      expect(consoleOutput).toContain('    - opn: no passages found');
    });
  });
});

describe('formatDuration', () => {
  it('formats milliseconds, seconds and minutes', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});

describe('createProgressReporter', () => {
  it('applies defaults', () => {
    expect(createProgressReporter({ json: true })).toBeInstanceOf(ProgressReporter);
  });
});
