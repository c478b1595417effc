/**
 * Search Command
 *
 * Free-text hybrid search over the knowledge base (vector + keyword search,
 * min-max fusion, MMR diversity):
 *
 *   zctx search "odmik od parcelne meje"
 *   zctx search "naklon strehe" -k 10 --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { composeDocumentQuery, formatRowsForDisplay, rowToRecord } from '../../search/index.js';
import { parseInput, SearchArgsSchema, TopKSchema } from '../validation.js';
import { createRetrievalEngine, openKnowledgeStore } from '../utils/services.js';

/**
 * Command-specific options parsed from CLI arguments.
 */
interface SearchCommandOptions {
  /** Number of results (defaults to retrieval.top_k) */
  topK?: string;
}

/**
 * Display empty results message with helpful tips.
 */
function displayEmptyResults(ctx: CommandContext, query: string): void {
  ctx.log(chalk.yellow(`No results found for "${query}"`));
  ctx.log('');
  ctx.log(chalk.dim('Tips:'));
  ctx.log(chalk.dim('  - Try different keywords or phrasing'));
  ctx.log(chalk.dim('  - Check that the knowledge base is ingested: zctx status'));
}

/**
 * Create the search command.
 */
export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'Search query text')
    .description('Search rule passages in the knowledge base')
    .option('-k, --top-k <number>', 'Number of results to return')
    .action(async (query: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();

      const { query: trimmedQuery } = parseInput(SearchArgsSchema, { query }, 'Invalid search query');
      const config = loadConfig();
      const topK =
        cmdOptions.topK === undefined
          ? config.retrieval.top_k
          : parseInput(TopKSchema, cmdOptions.topK, 'Invalid --top-k value');
      ctx.debug(`Query: "${trimmedQuery}", top-k: ${topK}`);

      const store = openKnowledgeStore(ctx);
      const engine = createRetrievalEngine(config, store, ctx);

      const searchStart = performance.now();
      const rows = await engine.retrieve(composeDocumentQuery(trimmedQuery), topK);
      ctx.debug(`Found ${rows.length} results in ${Math.round(performance.now() - searchStart)}ms`);

      if (ctx.options.json) {
        console.log(
          JSON.stringify({ query: trimmedQuery, count: rows.length, results: rows.map(rowToRecord) }, null, 2)
        );
      } else if (rows.length === 0) {
        displayEmptyResults(ctx, trimmedQuery);
      } else {
        ctx.log(
          chalk.bold(`Found ${rows.length} result${rows.length === 1 ? '' : 's'}`) +
            chalk.dim(` for "${trimmedQuery}"`)
        );
        ctx.log('');
        ctx.log(formatRowsForDisplay(rows));
      }
    });
}
