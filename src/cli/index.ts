#!/usr/bin/env node
/**
 * zoning-context CLI Entry Point
 *
 * This is the main entry point for the `zctx` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';

import type { GlobalOptions, CommandContext } from './types.js';
import { createConfigCommand } from './commands/config.js';
import { createContextCommand } from './commands/context.js';
import { createIngestCommand } from './commands/ingest.js';
import { createSearchCommand } from './commands/search.js';
import { createStatusCommand } from './commands/status.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';

/**
 * Version from package.json (two levels up from both src/cli and dist/cli).
 */
function readVersion(): string {
  try {
    const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
    const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const program = new Command();

program
  .name('zctx')
  .description('Retrieve spatial-planning rule passages for building-permit compliance checks')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('zctx ingest data/opn.json data/priloga2.json')}   Store rule passages
  ${chalk.cyan('zctx search "odmik od parcelne meje"')}           Search the knowledge base
  ${chalk.cyan('zctx context -f project.json --eup LJ-12')}       Render the context block
  ${chalk.cyan('zctx status')}                                    Show passage counts
  ${chalk.cyan('zctx config set retrieval.top_k 8')}              Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createIngestCommand(getContext));
program.addCommand(createSearchCommand(getContext));
program.addCommand(createContextCommand(getContext));
program.addCommand(createStatusCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0] ?? ''}`,
    'Run: zctx --help  to see available commands'
  );
});

// Check the embedding provider's key before commands that embed
program.hook('preAction', (_program, actionCommand) => {
  const opts = getGlobalOptions();
  const validationOptions = getValidationOptionsForCommand(actionCommand.name());

  // `ingest --no-embed` stores passages without calling a provider
  if (validationOptions.skipEmbedding || actionCommand.getOptionValue('embed') === false) {
    return;
  }

  const result = validateStartupConfig(validationOptions);
  if (result.errors.length > 0 || (opts.verbose && result.warnings.length > 0)) {
    printStartupValidation(result, opts.verbose);

    if (result.errors.length > 0) {
      throw new CLIError('Configuration validation failed', 'Fix the issues above and try again');
    }
  }
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
