/**
 * Startup Configuration Validation
 *
 * Validates the embedding provider configuration at CLI startup so a missing
 * key is reported before any work starts.
 *
 * This is a WARNING system, not a hard block: commands that don't need
 * embeddings still run.
 */

import chalk from 'chalk';
import { loadConfig } from './loader.js';
import { apiKeyEnvVar, hasApiKey, SETUP_INSTRUCTIONS } from './env.js';
import type { Config, EmbeddingProviderName } from './schema.js';

/**
 * Result of startup validation.
 */
export interface StartupValidationResult {
  /** Whether all required keys are present */
  valid: boolean;
  /** Warning messages (non-fatal issues) */
  warnings: string[];
  /** Error messages (will prevent some features) */
  errors: string[];
  /** Hint messages with setup instructions */
  hints: string[];
}

/**
 * Options for startup validation.
 */
export interface StartupValidationOptions {
  /** Skip embedding provider validation (for commands that don't embed) */
  skipEmbedding?: boolean;
  /** Use this config instead of loading it from disk */
  config?: Config;
}

/**
 * Validate configuration at CLI startup.
 *
 * Returns warnings/errors rather than throwing to allow partial functionality.
 *
 * @example
 * const result = validateStartupConfig();
 * if (result.errors.length > 0) {
 *   printStartupValidation(result);
 * }
 */
export function validateStartupConfig(
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  let config: Config | null = options.config ?? null;
  if (config === null) {
    try {
      config = loadConfig(false);
    } catch (error) {
      errors.push(error instanceof Error ? error.message : String(error));
      hints.push('Run: zctx config reset --force  to restore defaults');
    }
  }

  if (!options.skipEmbedding && config !== null) {
    const provider = config.embedding.provider;
    const check = validateEmbeddingProviderKey(provider);
    if (check !== null) {
      errors.push(check.message);
      hints.push(check.hint);
    } else if (provider === 'ollama') {
      warnings.push(`Using local Ollama embeddings (${config.embedding.model}); make sure the server is running`);
    }
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
    hints,
  };
}

/**
 * Check the embedding provider's API key. Returns null when it is usable.
 */
function validateEmbeddingProviderKey(
  provider: EmbeddingProviderName
): { message: string; hint: string } | null {
  if (hasApiKey(provider)) {
    return null;
  }
  return {
    message: `${provider} embedding provider configured but ${apiKeyEnvVar(provider) ?? 'API key'} is not set`,
    hint: SETUP_INSTRUCTIONS[provider],
  };
}

/**
 * Print startup validation warnings/errors to the console.
 *
 * @param verbose - Whether to show warnings too (default: only errors)
 */
export function printStartupValidation(
  result: StartupValidationResult,
  verbose = false
): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const hint of result.hints) {
    console.error(chalk.dim(`  ${hint}`));
  }

  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/**
 * Commands that embed text (queries or passages).
 */
export const COMMANDS_REQUIRING_EMBEDDING = ['ingest', 'search', 'context'];

/**
 * Validation options for a command name (e.g. 'search', 'status').
 */
export function getValidationOptionsForCommand(command: string): StartupValidationOptions {
  return {
    skipEmbedding: !COMMANDS_REQUIRING_EMBEDDING.includes(command),
  };
}
