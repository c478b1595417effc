/**
 * Config Command
 *
 * Manages ~/.zctx/config.toml via CLI:
 *   zctx config get <key>          - Get a specific value
 *   zctx config set <key> <value>  - Set a value (validated before writing)
 *   zctx config list               - Show all configuration
 *   zctx config path               - Show config file location
 *   zctx config reset --force      - Restore the defaults
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  getConfigValue,
  setConfigValue,
  listConfig,
  getConfigPath,
  resetConfig,
} from '../../config/loader.js';
import type { CommandContext } from '../types.js';

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Manage configuration settings');

  // zctx config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., zctx config get embedding.model)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key);

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('zctx config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          // Format the value nicely
          const formatted = formatValue(value);
          ctx.log(formatted);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // zctx config set <key> <value>
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., zctx config set retrieval.top_k 8)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        setConfigValue(key, value);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
        } else {
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // zctx config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();

      try {
        const entries = listConfig();

        if (ctx.options.json) {
          const obj = Object.fromEntries(entries);
          console.log(JSON.stringify(obj, null, 2));
        } else {
          ctx.log(chalk.bold('Configuration:'));
          ctx.log('');

          // Group by top-level key for readability
          let currentGroup = '';
          for (const [key, value] of entries) {
            const group = key.split('.')[0] ?? '';

            // Add spacing between groups
            if (group !== currentGroup) {
              if (currentGroup !== '') ctx.log('');
              currentGroup = group;
            }

            const formatted = formatValue(value);
            ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatted)}`);
          }

          ctx.log('');
          ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // zctx config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  // zctx config reset
  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        resetConfig();

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, message: 'Configuration reset to defaults' }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * Handle config errors with user-friendly messages
 */
function handleConfigError(ctx: CommandContext, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';

  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message }));
  } else {
    ctx.error(message);
  }

  process.exitCode = 1;
}
