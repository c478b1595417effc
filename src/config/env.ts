/**
 * Environment Variable Handler
 *
 * Loads and provides access to embedding API keys and the data directory
 * override. Supports .env files for local development via dotenv.
 *
 * Keys are never logged and never included in error messages; only their
 * presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import type { EmbeddingProviderName } from './schema.js';

// No-op if .env doesn't exist
dotenvConfig();

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

/**
 * Keys are optional at load time; only the configured provider needs one,
 * and that is checked when the provider is created.
 */
export const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OLLAMA_HOST: z.string().default(DEFAULT_OLLAMA_HOST),
  ZCTX_HOME: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

let _envCache: EnvVars | null = null;

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    GEMINI_API_KEY: process.env.GEMINI_API_KEY,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OLLAMA_HOST: process.env.OLLAMA_HOST || undefined,
    ZCTX_HOME: process.env.ZCTX_HOME,
  };
  const result = EnvSchema.safeParse(raw);

  _envCache = result.success
    ? result.data
    : { ...raw, OLLAMA_HOST: raw.OLLAMA_HOST ?? DEFAULT_OLLAMA_HOST };

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Environment variable holding the API key of a provider, or null when the
 * provider needs none.
 */
export function apiKeyEnvVar(provider: EmbeddingProviderName): 'GEMINI_API_KEY' | 'OPENAI_API_KEY' | null {
  switch (provider) {
    case 'gemini':
      return 'GEMINI_API_KEY';
    case 'openai':
      return 'OPENAI_API_KEY';
    case 'ollama':
      return null;
  }
}

/**
 * Check if a provider's API key is configured (non-empty) without exposing it.
 * Providers that need no key always report true.
 */
export function hasApiKey(provider: EmbeddingProviderName): boolean {
  const envVar = apiKeyEnvVar(provider);
  if (envVar === null) {
    return true;
  }
  return Boolean(getEnv(envVar)?.trim());
}

/**
 * Get the Ollama host URL.
 */
export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

/**
 * Provider-specific setup instructions, shown when a required key is missing.
 */
export const SETUP_INSTRUCTIONS: Record<EmbeddingProviderName, string> = {
  gemini: `
To embed with Google Gemini:

1. Create an API key at https://aistudio.google.com/app/apikey
2. Set the environment variable (or add it to .env):

   export GEMINI_API_KEY="..."
`.trim(),

  openai: `
To embed with OpenAI:

1. Get your API key from https://platform.openai.com/api-keys
2. Set the environment variable (or add it to .env):

   export OPENAI_API_KEY="..."

3. Set a matching model: zctx config set embedding.model text-embedding-3-small
`.trim(),

  ollama: `
To embed with Ollama (local):

1. Install Ollama from https://ollama.com/ and run: ollama serve
2. Pull an embedding model: ollama pull nomic-embed-text
3. Set the model: zctx config set embedding.model nomic-embed-text
4. (Optional) Set a custom host: export OLLAMA_HOST="http://localhost:11434"
`.trim(),
};
