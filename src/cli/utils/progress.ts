/**
 * Progress Reporter
 *
 * Manages progress display for knowledge ingestion.
 * Supports multiple output modes:
 * - Interactive: ora spinners with real-time updates
 * - JSON: NDJSON event stream for scripts
 * - Text: Simple text output for non-TTY environments
 *
 * Spinner updates are throttled (100ms minimum) and NO_COLOR is respected.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import type { IngestResult, IngestStage, StageStats } from '../../indexer/types.js';

/**
 * Stages in the order they run.
 */
const STAGES: readonly IngestStage[] = ['chunking', 'embedding', 'storing'];

/**
 * Human-readable labels for each stage.
 */
const STAGE_LABELS: Record<IngestStage, string> = {
  chunking: 'Chunking',
  embedding: 'Embedding',
  storing: 'Storing',
};

/**
 * Unit shown after a stage's processed count.
 */
const STAGE_UNITS: Record<IngestStage, string> = {
  chunking: 'passages',
  embedding: 'passages embedded',
  storing: 'passages stored',
};

/**
 * Configuration options for the ProgressReporter.
 */
export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show warnings and the stage breakdown */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

/**
 * JSON event types for NDJSON output.
 */
export type ProgressEventType =
  | 'stage_start'
  | 'stage_progress'
  | 'stage_complete'
  | 'warning'
  | 'error'
  | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: IngestStage;
  data: Record<string, unknown>;
}

/**
 * Format milliseconds as human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * ProgressReporter manages all progress display during ingestion.
 *
 * Usage:
 * ```typescript
 * const reporter = createProgressReporter({ json: false, verbose: false });
 *
 * reporter.startStage('embedding', 120);
 * reporter.updateProgress(40);
 * reporter.completeStage({ stage: 'embedding', processed: 120, total: 120, durationMs: 900 });
 *
 * reporter.showSummary(result);
 * ```
 */
export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: IngestStage | null = null;
  private currentTotal: number = 0;
  private lastUpdateTime: number = 0;

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * Start a new stage of the pipeline.
   */
  startStage(stage: IngestStage, total: number = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_start',
        timestamp: new Date().toISOString(),
        stage,
        data: { total },
      });
      return;
    }

    const label = STAGE_LABELS[stage];
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({
        text: `${label}...`,
        prefixText: chalk.cyan(label.padEnd(12)),
      }).start();
    } else {
      console.log(`${label}...`);
    }
  }

  /**
   * Update progress within the current stage.
   */
  updateProgress(processed: number): void {
    if (!this.currentStage) return;

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        timestamp: new Date().toISOString(),
        stage: this.currentStage,
        data: { processed, total: this.currentTotal },
      });
      return;
    }

    if (this.options.isInteractive && this.spinner && this.currentTotal > 0) {
      const percentage = Math.round((processed / this.currentTotal) * 100);
      this.spinner.text = `${processed}/${this.currentTotal} (${percentage}%)`;
    }
  }

  /**
   * Mark the current stage as complete.
   */
  completeStage(stats: StageStats): void {
    const summary = `${stats.processed.toLocaleString()} ${STAGE_UNITS[stats.stage]}`;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        timestamp: new Date().toISOString(),
        stage: stats.stage,
        data: {
          processed: stats.processed,
          total: stats.total,
          durationMs: stats.durationMs,
          details: stats.details,
        },
      });
    } else if (this.options.isInteractive && this.spinner) {
      this.spinner.succeed(summary);
    } else {
      console.log(`${STAGE_LABELS[stats.stage]} complete: ${summary}`);
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Display a warning message.
   */
  warn(message: string, context?: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'warning',
        timestamp: new Date().toISOString(),
        stage: this.currentStage ?? undefined,
        data: { message, context },
      });
      return;
    }

    // Interactive mode only shows warnings when verbose, to keep the spinners readable
    if (this.options.verbose || !this.options.isInteractive) {
      const contextStr = context ? ` (${context})` : '';
      console.warn(chalk.yellow(`Warning: ${message}${contextStr}`));
    }
  }

  /**
   * Display a non-fatal error message.
   */
  error(message: string, context?: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'error',
        timestamp: new Date().toISOString(),
        stage: this.currentStage ?? undefined,
        data: { message, context },
      });
      return;
    }

    const contextStr = context ? ` (${context})` : '';
    console.error(chalk.red(`Error: ${message}${contextStr}`));
  }

  /**
   * Display the final summary after ingestion completes.
   */
  showSummary(result: IngestResult): void {
    if (this.options.json) {
      this.emitJson({
        type: 'complete',
        timestamp: new Date().toISOString(),
        data: { result },
      });
      return;
    }

    console.log('');
    console.log(chalk.green.bold('Ingest Complete ✓'));
    console.log('');
    console.log(`  ${chalk.dim('Passages created:')}  ${result.chunksCreated.toLocaleString()}`);
    console.log(`  ${chalk.dim('Passages embedded:')} ${result.chunksEmbedded.toLocaleString()}`);
    console.log(`  ${chalk.dim('Passages stored:')}   ${result.chunksStored.toLocaleString()}`);
    if (result.chunksRemoved > 0) {
      console.log(`  ${chalk.dim('Passages removed:')}  ${result.chunksRemoved.toLocaleString()}`);
    }
    console.log(`  ${chalk.dim('Embedding model:')}   ${result.embeddingModel ?? 'none (keyword search only)'}`);
    console.log(`  ${chalk.dim('Time elapsed:')}      ${formatDuration(result.totalDurationMs)}`);

    const sources = Object.entries(result.bySource);
    if (sources.length > 0) {
      console.log('');
      console.log(chalk.dim('  By source:'));
      for (const [source, count] of sources) {
        console.log(`    ${source.padEnd(14)}${count.toLocaleString()}`);
      }
    }

    if (this.options.verbose) {
      console.log('');
      console.log(chalk.dim('  Breakdown:'));
      for (const stage of STAGES) {
        const durationMs = result.stageDurations[stage];
        if (durationMs !== undefined) {
          console.log(`    ${chalk.dim(`${STAGE_LABELS[stage]}:`.padEnd(12))}${formatDuration(durationMs)}`);
        }
      }
    }

    const problems = [...result.warnings, ...result.errors];
    if (problems.length > 0) {
      console.log('');
      console.log(
        chalk.yellow(
          `  ${result.warnings.length} warning(s), ${result.errors.length} error(s) during ingestion`
        )
      );
      if (this.options.verbose) {
        for (const problem of problems.slice(0, 5)) {
          console.log(chalk.dim(`    - ${problem}`));
        }
        if (problems.length > 5) {
          console.log(chalk.dim(`    ... and ${problems.length - 5} more`));
        }
      }
    }

    console.log('');
  }

  private emitJson(event: ProgressEvent): void {
    console.log(JSON.stringify(event));
  }
}

/**
 * Create a ProgressReporter with sensible defaults.
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}
