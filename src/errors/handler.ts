/**
 * Error formatting and process-level handling for the zctx CLI.
 *
 * Text output is colored for terminals; JSON output is meant for scripts
 * that pipe zctx into other tools.
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  type: string;
  code: number;
  hint?: string;
  stack?: string;
}

/**
 * Build the structured form of any thrown value.
 */
function toErrorOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (error instanceof CLIError) {
    return {
      error: error.message,
      type: error.name,
      code: error.code,
      hint: error.hint,
      stack: verbose ? error.stack : undefined,
    };
  }

  if (error instanceof Error) {
    return {
      error: error.message,
      type: error.name,
      code: 1,
      stack: verbose ? error.stack : undefined,
    };
  }

  return { error: String(error), type: 'Unknown', code: 1 };
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so formatting can be tested without
 * process.exit.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;
  const output = toErrorOutput(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines: string[] = [chalk.red('Error: ') + output.error];

  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  } else if (!(error instanceof CLIError) && error instanceof Error && !verbose) {
    // Plain errors carry no hint of their own
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  if (output.stack) {
    lines.push('');
    lines.push(chalk.dim('Stack trace:'));
    lines.push(chalk.dim(output.stack));
  }

  return lines.join('\n');
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Print the error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a handler for `uncaughtException` / `unhandledRejection`.
 *
 * @example
 * ```typescript
 * const handler = createGlobalErrorHandler({ verbose: true });
 * process.on('uncaughtException', handler);
 * process.on('unhandledRejection', handler);
 * ```
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
