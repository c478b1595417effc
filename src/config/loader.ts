/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the data directory (~/.zctx or $ZCTX_HOME)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getDataDir, getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

export { getDataDir, getConfigPath } from './paths.js';

/**
 * Ensure the data directory exists
 */
export function ensureDataDir(): void {
  const dataDir = getDataDir();
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isJsonMap(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return isRecord(value) && !(value instanceof Date);
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Merge sparse user overrides on top of a complete config, section by section.
 */
export function mergeConfig(base: Config, override: PartialConfig): Config {
  return {
    embedding: { ...base.embedding, ...override.embedding },
    retrieval: { ...base.retrieval, ...override.retrieval },
    context: { ...base.context, ...override.context },
  };
}

function readConfigDocument(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: zctx config reset --force`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the commented template on first run
 * @throws ConfigError if the config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureDataDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  const parsed = readConfigDocument(configPath);

  // Validate against the partial schema (allows missing fields)
  const validationResult = PartialConfigSchema.safeParse(parsed);

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validationResult.error.issues)}`,
      'Run: zctx config reset --force  to restore defaults'
    );
  }

  return mergeConfig(DEFAULT_CONFIG, validationResult.data);
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('retrieval.top_k') => 5
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();

  for (const part of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Whether a dotted key names a leaf setting of the config schema.
 */
export function isConfigKey(key: string): boolean {
  let current: unknown = DEFAULT_CONFIG;
  for (const part of key.split('.')) {
    if (!isRecord(current) || !Object.hasOwn(current, part)) {
      return false;
    }
    current = current[part];
  }
  return !isRecord(current);
}

/**
 * Set a specific config value by dot-notation path
 * The whole file is validated before anything is written back.
 */
export function setConfigValue(key: string, value: string): void {
  const configPath = getConfigPath();
  ensureDataDir();

  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }

  const document: TOML.JsonMap = fs.existsSync(configPath) ? readConfigDocument(configPath) : {};

  let current = document;
  for (const part of parts) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  const partial = PartialConfigSchema.safeParse(document);
  const full = partial.success
    ? ConfigSchema.safeParse(mergeConfig(DEFAULT_CONFIG, partial.data))
    : partial;

  if (!full.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(full.error.issues)}`,
      'Run: zctx config list  to see current values and types'
    );
  }

  fs.writeFileSync(configPath, TOML.stringify(document), 'utf-8');
}

/**
 * Delete the config file and write a fresh template.
 */
export function resetConfig(): Config {
  const configPath = getConfigPath();
  if (fs.existsSync(configPath)) {
    fs.unlinkSync(configPath);
  }
  return loadConfig(true);
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['retrieval.top_k', 5]
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isRecord(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig());
  return entries;
}
