/**
 * Centralized Path Definitions
 *
 * Single source of truth for all data directory paths.
 * All modules should import from here instead of computing paths locally.
 *
 * Directory structure:
 * ~/.zctx/            (or $ZCTX_HOME)
 * ├── knowledge.db    (SQLite knowledge base)
 * └── config.toml     (User configuration)
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

/**
 * Get the data directory (~/.zctx, overridden by ZCTX_HOME)
 */
export function getDataDir(): string {
  const override = getEnv('ZCTX_HOME')?.trim();
  return override ? resolve(override) : join(homedir(), '.zctx');
}

/**
 * Get the knowledge database path (<data dir>/knowledge.db)
 */
export function getDbPath(): string {
  return join(getDataDir(), 'knowledge.db');
}

/**
 * Get the config file path (<data dir>/config.toml)
 */
export function getConfigPath(): string {
  return join(getDataDir(), 'config.toml');
}
