/**
 * Context Command
 *
 * Renders the citation block of rule passages for a project, ready to be
 * placed in a compliance prompt:
 *
 *   zctx context --facts project.json --eup LJ-12 --raba SSe
 *   zctx context --facts project.json -k 8 --json
 *
 * The facts file is a flat JSON object of key facts (vrsta_gradnje,
 * glavni_objekt, faktor_zazidanosti_fz, ...). Without it the query falls
 * back to general building-rule keywords.
 */

import { readFile } from 'node:fs/promises';
import { Command } from 'commander';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { FileNotFoundError, ValidationError } from '../../errors/index.js';
import { describeContext, type KeyFacts } from '../../search/index.js';
import { CodeListSchema, KeyFactsSchema, parseInput, TopKSchema } from '../validation.js';
import { createRetrievalEngine, openKnowledgeStore } from '../utils/services.js';

/**
 * Command-specific options parsed from CLI arguments.
 */
interface ContextCommandOptions {
  /** Path to the key facts JSON file */
  facts?: string;
  /** Comma-separated spatial planning unit codes */
  eup?: string;
  /** Comma-separated land-use codes */
  raba?: string;
  topK?: string;
}

/**
 * Read key facts from a JSON file.
 *
 * @throws FileNotFoundError if the file doesn't exist
 * @throws ValidationError if it isn't a flat JSON object
 */
export async function readKeyFacts(path: string): Promise<KeyFacts> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new FileNotFoundError(path);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Invalid JSON in ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return parseInput(KeyFactsSchema, parsed, `Invalid key facts in ${path}`);
}

/**
 * Create the context command.
 */
export function createContextCommand(getContext: () => CommandContext): Command {
  return new Command('context')
    .description('Render the rule passages relevant to a project')
    .option('-f, --facts <file>', 'Key facts JSON file')
    .option('--eup <codes>', 'Spatial planning unit codes, comma-separated')
    .option('--raba <codes>', 'Land-use codes, comma-separated')
    .option('-k, --top-k <number>', 'Number of passages')
    .action(async (cmdOptions: ContextCommandOptions) => {
      const ctx = getContext();

      const keyFacts = cmdOptions.facts ? await readKeyFacts(cmdOptions.facts) : {};
      const zoneUnits = parseInput(CodeListSchema, cmdOptions.eup ?? '', 'Invalid --eup value');
      const landUses = parseInput(CodeListSchema, cmdOptions.raba ?? '', 'Invalid --raba value');
      const config = loadConfig();
      const topK =
        cmdOptions.topK === undefined
          ? config.retrieval.top_k
          : parseInput(TopKSchema, cmdOptions.topK, 'Invalid --top-k value');
      ctx.debug(`Key facts: ${Object.keys(keyFacts).length}, EUP: ${zoneUnits.join(', ')}, raba: ${landUses.join(', ')}`);

      const store = openKnowledgeStore(ctx);
      const engine = createRetrievalEngine(config, store, ctx);
      const result = await engine.getContext(keyFacts, { zoneUnits, landUses, topK });

      if (ctx.options.json) {
        console.log(JSON.stringify({ ...result, message: describeContext(result) }, null, 2));
      } else {
        ctx.log(describeContext(result));
      }
    });
}
