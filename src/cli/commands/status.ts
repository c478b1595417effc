/**
 * Status Command
 *
 * Displays knowledge base statistics and configuration:
 *   zctx status         - Passage counts, embedding coverage, config
 *   zctx status --json  - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { statSync, existsSync } from 'node:fs';

import type { CommandContext } from '../types.js';
import { getDbPath } from '../../database/index.js';
import { loadConfig, getConfigPath } from '../../config/loader.js';
import type { SourceSummary } from '../../database/index.js';
import { openKnowledgeStore } from '../utils/services.js';

/**
 * Knowledge base statistics
 */
export interface KnowledgeStats {
  totalChunks: number;
  embeddedChunks: number;
  sources: SourceSummary[];
  embeddingModels: string[];
}

/**
 * Format bytes to human-readable size (e.g., "127.4 MB")
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i] ?? 'Bytes'}`;
}

/**
 * Format a path with ~ for home directory
 */
export function formatPath(filePath: string): string {
  const homeDir = process.env['HOME'] ?? process.env['USERPROFILE'] ?? '';
  if (homeDir && filePath.startsWith(homeDir)) {
    return '~' + filePath.slice(homeDir.length);
  }
  return filePath;
}

/**
 * Embedded share of the stored passages, e.g. "75.0%"
 */
export function formatCoverage(embedded: number, total: number): string {
  return total === 0 ? '0.0%' : `${((embedded / total) * 100).toFixed(1)}%`;
}

function getDbFileSize(dbPath: string): number {
  return existsSync(dbPath) ? statSync(dbPath).size : 0;
}

/**
 * Create the status command
 */
export function createStatusCommand(getContext: () => CommandContext): Command {
  return new Command('status')
    .description('Show knowledge base statistics and configuration')
    .action(() => {
      const ctx = getContext();
      ctx.debug('Fetching knowledge base status...');

      const store = openKnowledgeStore(ctx);
      const stats: KnowledgeStats = {
        totalChunks: store.countChunks(),
        embeddedChunks: store.countEmbedded(),
        sources: store.listSources(),
        embeddingModels: store.listEmbeddingModels(),
      };
      const dbPath = getDbPath();
      const dbSize = getDbFileSize(dbPath);
      const configPath = getConfigPath();
      const config = loadConfig();

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              ...stats,
              coverage: formatCoverage(stats.embeddedChunks, stats.totalChunks),
              database: { path: dbPath, size: dbSize, sizeFormatted: formatBytes(dbSize) },
              embedding: { provider: config.embedding.provider, model: config.embedding.model },
              config: { path: configPath },
            },
            null,
            2
          )
        );
        return;
      }

      const lines: string[] = [];
      lines.push(chalk.bold('Knowledge Base Status'));
      lines.push(chalk.dim('─'.repeat(35)));

      lines.push(`${chalk.cyan('Passages:')}     ${stats.totalChunks.toLocaleString()}`);
      lines.push(
        `${chalk.cyan('Embedded:')}     ${stats.embeddedChunks.toLocaleString()} (${formatCoverage(stats.embeddedChunks, stats.totalChunks)})`
      );
      lines.push(`${chalk.cyan('Database:')}     ${formatBytes(dbSize)} (${formatPath(dbPath)})`);

      if (stats.sources.length > 0) {
        lines.push('');
        for (const source of stats.sources) {
          lines.push(
            `  ${source.source.padEnd(14)}${String(source.chunks).padStart(6)} passages, ${source.embedded} embedded`
          );
        }
      }

      lines.push('');
      lines.push(
        `${chalk.cyan('Embeddings:')}   ${config.embedding.model} (${config.embedding.provider})`
      );
      if (stats.embeddingModels.length > 0) {
        lines.push(`${chalk.cyan('Stored with:')}  ${stats.embeddingModels.join(', ')}`);
      }
      lines.push(`${chalk.cyan('Config:')}       ${formatPath(configPath)}`);

      if (stats.totalChunks === 0) {
        lines.push('');
        lines.push(chalk.yellow('Knowledge base is empty.'));
        lines.push(`Run ${chalk.cyan('zctx ingest <file.json>')} to get started.`);
      } else if (
        stats.embeddingModels.length > 0 &&
        !stats.embeddingModels.includes(config.embedding.model)
      ) {
        lines.push('');
        lines.push(
          chalk.yellow(`Stored embeddings don't match ${config.embedding.model}; re-ingest with --replace.`)
        );
      }

      ctx.log(lines.join('\n'));
    });
}
