/**
 * Ingest Command
 *
 * Loads knowledge-resource JSON, splits it into passages, embeds them and
 * stores them in the knowledge base:
 *
 *   zctx ingest data/opn.json data/priloga2.json
 *   zctx ingest data/knowledge.json --replace
 *   zctx ingest data/izrazi.json --no-embed     # keyword search only
 *
 * Stages report through the ProgressReporter (spinners, text, or NDJSON
 * with --json).
 */

import { Command } from 'commander';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { ingestKnowledge, loadKnowledgeFiles } from '../../indexer/index.js';
import { CLIError } from '../../errors/index.js';
import { createProgressReporter } from '../utils/progress.js';
import { createEmbeddingServices, openKnowledgeStore } from '../utils/services.js';

/**
 * Command-specific options parsed from CLI arguments.
 */
interface IngestCommandOptions {
  /** false with --no-embed */
  embed: boolean;
  /** Remove stored passages first */
  replace?: boolean;
}

/**
 * Create the ingest command.
 */
export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('<files...>', 'Knowledge-resource JSON files')
    .description('Chunk, embed and store knowledge resources')
    .option('--no-embed', 'Store passages without embeddings (keyword search only)')
    .option('--replace', 'Remove all stored passages before storing the new ones')
    .action(async (files: string[], cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();
      ctx.debug(`Files: ${files.join(', ')}`);

      const resources = await loadKnowledgeFiles(files);
      if (resources.length === 0) {
        throw new CLIError('No knowledge resources found', 'Check the files and try again');
      }
      ctx.debug(`Resources: ${resources.map((r) => r.name).join(', ')}`);

      const config = loadConfig();
      const services = cmdOptions.embed ? createEmbeddingServices(config) : null;
      if (services) {
        ctx.debug(`Embedding: ${services.provider.model} (${services.provider.name})`);
      }

      const store = openKnowledgeStore(ctx);
      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
      });

      const result = await ingestKnowledge(resources, store, services?.client ?? null, {
        batchSize: config.embedding.batch_size,
        replace: cmdOptions.replace ?? false,
        embeddingModel: services?.provider.model,
        onStageStart: (stage, total) => reporter.startStage(stage, total),
        onProgress: (_stage, processed) => reporter.updateProgress(processed),
        onStageComplete: (_stage, stats) => reporter.completeStage(stats),
        onWarning: (message) => reporter.warn(message),
        onError: (error, chunkId) => reporter.error(error.message, chunkId),
      });

      reporter.showSummary(result);
    });
}
