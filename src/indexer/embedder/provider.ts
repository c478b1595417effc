/**
 * Embedding Provider Factory
 *
 * Creates embedding providers from configuration. Supports:
 * - Gemini (@google/generative-ai, task type passed through)
 * - OpenAI (official SDK)
 * - Ollama (ollama client against the local server)
 *
 * Providers return raw API payloads; EmbeddingClient extracts the vectors.
 */

import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  TaskType,
  type EmbedContentRequest,
} from '@google/generative-ai';
import { Ollama } from 'ollama';
import OpenAI from 'openai';

import { getEnv, getOllamaHost } from '../../config/env.js';
import type { EmbeddingProviderName } from '../../config/schema.js';
import { APIKeyError } from '../../errors/index.js';
import { EmbeddingRequestError } from './errors.js';
import type { EmbeddingConfig, EmbeddingProvider, EmbeddingTaskType } from './types.js';

/**
 * Default model per provider, used when the configured model is empty.
 */
export const DEFAULT_MODELS: Record<EmbeddingConfig['provider'], string> = {
  gemini: 'text-embedding-004',
  openai: 'text-embedding-3-small',
  ollama: 'nomic-embed-text',
};

const GEMINI_TASK_TYPES: Record<EmbeddingTaskType, TaskType> = {
  RETRIEVAL_QUERY: TaskType.RETRIEVAL_QUERY,
  RETRIEVAL_DOCUMENT: TaskType.RETRIEVAL_DOCUMENT,
};

/**
 * HTTP status carried by an SDK error, if the server answered.
 */
function statusOf(error: unknown): number | undefined {
  if (error instanceof GoogleGenerativeAIFetchError) {
    return error.status;
  }
  if (error instanceof Error && 'status_code' in error && typeof error.status_code === 'number') {
    return error.status_code;
  }
  return undefined;
}

/**
 * Run an SDK call, rethrowing its failures as EmbeddingRequestError.
 */
async function request<T>(provider: EmbeddingProviderName, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw new EmbeddingRequestError(
      provider,
      error instanceof Error ? error.message : String(error),
      statusOf(error)
    );
  }
}

function createGeminiProvider(model: string): EmbeddingProvider {
  const apiKey = getEnv('GEMINI_API_KEY')?.trim();
  if (!apiKey) {
    throw new APIKeyError('gemini', 'GEMINI_API_KEY');
  }
  const client = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model });

  const toRequest = (text: string, taskType: EmbeddingTaskType): EmbedContentRequest => ({
    content: { role: 'user', parts: [{ text }] },
    taskType: GEMINI_TASK_TYPES[taskType],
  });

  return {
    name: 'gemini',
    model,
    embed: (text, taskType) => request('gemini', () => client.embedContent(toRequest(text, taskType))),
    embedBatch: async (texts, taskType) => {
      const response = await request('gemini', () =>
        client.batchEmbedContents({ requests: texts.map((text) => toRequest(text, taskType)) })
      );
      return response.embeddings;
    },
  };
}

function createOpenAIProvider(model: string): EmbeddingProvider {
  const apiKey = getEnv('OPENAI_API_KEY')?.trim();
  if (!apiKey) {
    throw new APIKeyError('openai', 'OPENAI_API_KEY');
  }
  const client = new OpenAI({ apiKey });

  return {
    name: 'openai',
    model,
    embed: async (text) => {
      const response = await client.embeddings.create({ model, input: text });
      return response.data[0]?.embedding;
    },
    embedBatch: async (texts) => {
      const response = await client.embeddings.create({ model, input: texts });
      return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    },
  };
}

function createOllamaProvider(model: string): EmbeddingProvider {
  const client = new Ollama({ host: getOllamaHost() });

  return {
    name: 'ollama',
    model,
    embed: async (text) => {
      const response = await request('ollama', () => client.embed({ model, input: text }));
      return response.embeddings[0];
    },
    embedBatch: async (texts) => {
      const response = await request('ollama', () => client.embed({ model, input: texts }));
      return response.embeddings;
    },
  };
}

/**
 * Create an embedding provider from the [embedding] config section.
 *
 * @throws APIKeyError when a cloud provider's key is missing
 */
export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  const model = config.model.trim() || DEFAULT_MODELS[config.provider];

  switch (config.provider) {
    case 'gemini':
      return createGeminiProvider(model);
    case 'openai':
      return createOpenAIProvider(model);
    case 'ollama':
      return createOllamaProvider(model);
  }
}
