/**
 * Embedding Provider Tests
 *
 * The openai, ollama and @google/generative-ai clients are mocked; nothing
 * leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GoogleGenerativeAIFetchError } from '@google/generative-ai';

const { createEmbeddings, geminiClient, getGenerativeModel, ollamaClient, ollamaEmbed } = vi.hoisted(() => ({
  createEmbeddings: vi.fn(),
  geminiClient: vi.fn(),
  getGenerativeModel: vi.fn(),
  ollamaClient: vi.fn(),
  ollamaEmbed: vi.fn(),
}));

vi.mock('openai', () => ({
  default: class {
    embeddings = { create: createEmbeddings };
  },
}));

vi.mock('@google/generative-ai', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@google/generative-ai')>()),
  GoogleGenerativeAI: class {
    constructor(apiKey: string) {
      geminiClient(apiKey);
    }
    getGenerativeModel = getGenerativeModel;
  },
}));

vi.mock('ollama', () => ({
  Ollama: class {
    constructor(config: unknown) {
      ollamaClient(config);
    }
    embed = ollamaEmbed;
  },
}));

import { createEmbeddingProvider } from '../provider.js';
import { createEmbeddingClient } from '../client.js';
import { EmbeddingRequestError } from '../errors.js';
import { _clearEnvCache } from '../../../config/env.js';
import { APIKeyError } from '../../../errors/index.js';

describe('createEmbeddingProvider', () => {
  const embedContent = vi.fn();
  const batchEmbedContents = vi.fn();

  beforeEach(() => {
    _clearEnvCache();
    vi.clearAllMocks();
    getGenerativeModel.mockReturnValue({ embedContent, batchEmbedContents });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  describe('gemini', () => {
    it('requires GEMINI_API_KEY', () => {
      vi.stubEnv('GEMINI_API_KEY', '');

      expect(() => createEmbeddingProvider({ provider: 'gemini', model: 'text-embedding-004' })).toThrow(
        APIKeyError
      );
      expect(geminiClient).not.toHaveBeenCalled();
    });

    it('embeds a query with the key, model and task type', async () => {
      vi.stubEnv('GEMINI_API_KEY', 'test-secret');
      embedContent.mockResolvedValue({ embedding: { values: [0.1, 0.2] } });

      const provider = createEmbeddingProvider({ provider: 'gemini', model: 'text-embedding-004' });
      const vector = await createEmbeddingClient(provider).embed('odmik');

      expect(vector).toEqual([0.1, 0.2]);
      expect(geminiClient).toHaveBeenCalledWith('test-secret');
      expect(getGenerativeModel).toHaveBeenCalledWith({ model: 'text-embedding-004' });
      expect(embedContent).toHaveBeenCalledWith({
        content: { role: 'user', parts: [{ text: 'odmik' }] },
        taskType: 'RETRIEVAL_QUERY',
      });
    });

    it('embeds documents through batchEmbedContents', async () => {
      vi.stubEnv('GEMINI_API_KEY', 'test-secret');
      batchEmbedContents.mockResolvedValue({ embeddings: [{ values: [1] }, { values: [2] }] });

      const provider = createEmbeddingProvider({ provider: 'gemini', model: 'text-embedding-004' });
      const vectors = await createEmbeddingClient(provider).embedDocuments(['a', 'b']);

      expect(vectors).toEqual([[1], [2]]);
      expect(batchEmbedContents).toHaveBeenCalledWith({
        requests: [
          { content: { role: 'user', parts: [{ text: 'a' }] }, taskType: 'RETRIEVAL_DOCUMENT' },
          { content: { role: 'user', parts: [{ text: 'b' }] }, taskType: 'RETRIEVAL_DOCUMENT' },
        ],
      });
      expect(embedContent).not.toHaveBeenCalled();
    });

    it('raises EmbeddingRequestError with the HTTP status', async () => {
      vi.stubEnv('GEMINI_API_KEY', 'test-secret');
      embedContent.mockRejectedValue(new GoogleGenerativeAIFetchError('API key not valid', 400, 'Bad Request'));

      const provider = createEmbeddingProvider({ provider: 'gemini', model: 'text-embedding-004' });
      const result = provider.embed('x', 'RETRIEVAL_QUERY');

      await expect(result).rejects.toBeInstanceOf(EmbeddingRequestError);
      await expect(result).rejects.toMatchObject({ status: 400 });
      await expect(result).rejects.toThrow('API key not valid');
    });
  });

  describe('ollama', () => {
    it('connects to the configured host without a key', async () => {
      vi.stubEnv('OLLAMA_HOST', 'http://ollama.test:11434');
      ollamaEmbed.mockResolvedValue({ model: 'nomic-embed-text', embeddings: [[0.5, 0.5]] });

      const provider = createEmbeddingProvider({ provider: 'ollama', model: 'nomic-embed-text' });
      const vector = await createEmbeddingClient(provider).embed('streha');

      expect(vector).toEqual([0.5, 0.5]);
      expect(ollamaClient).toHaveBeenCalledWith({ host: 'http://ollama.test:11434' });
      expect(ollamaEmbed).toHaveBeenCalledWith({ model: 'nomic-embed-text', input: 'streha' });
    });

    it('embeds documents in one request', async () => {
      ollamaEmbed.mockResolvedValue({ model: 'nomic-embed-text', embeddings: [[1], [2]] });

      const provider = createEmbeddingProvider({ provider: 'ollama', model: 'nomic-embed-text' });
      const vectors = await createEmbeddingClient(provider).embedDocuments(['a', 'b']);

      expect(vectors).toEqual([[1], [2]]);
      expect(ollamaEmbed).toHaveBeenCalledTimes(1);
      expect(ollamaEmbed).toHaveBeenCalledWith({ model: 'nomic-embed-text', input: ['a', 'b'] });
    });

    it('wraps server errors with their status', async () => {
      ollamaEmbed.mockRejectedValue(Object.assign(new Error('model "x" not found'), { status_code: 404 }));

      const provider = createEmbeddingProvider({ provider: 'ollama', model: 'x' });

      await expect(provider.embed('x', 'RETRIEVAL_QUERY')).rejects.toThrow(
        'ollama embedding request failed (HTTP 404): model "x" not found'
      );
    });

    it('wraps network failures', async () => {
      ollamaEmbed.mockRejectedValue(new TypeError('fetch failed'));

      const provider = createEmbeddingProvider({ provider: 'ollama', model: 'nomic-embed-text' });

      await expect(provider.embed('x', 'RETRIEVAL_QUERY')).rejects.toThrow(
        'ollama embedding request failed: fetch failed'
      );
    });
  });

  describe('openai', () => {
    it('requires OPENAI_API_KEY', () => {
      vi.stubEnv('OPENAI_API_KEY', '');

      expect(() => createEmbeddingProvider({ provider: 'openai', model: 'text-embedding-3-small' })).toThrow(
        'openai API key not configured'
      );
    });

    it('returns batch embeddings in input order', async () => {
      vi.stubEnv('OPENAI_API_KEY', 'test-secret');
      createEmbeddings.mockResolvedValue({
        data: [
          { index: 1, embedding: [2] },
          { index: 0, embedding: [1] },
        ],
      });

      const provider = createEmbeddingProvider({ provider: 'openai', model: 'text-embedding-3-small' });
      const vectors = await createEmbeddingClient(provider).embedDocuments(['a', 'b']);

      expect(vectors).toEqual([[1], [2]]);
      expect(createEmbeddings).toHaveBeenCalledWith({ model: 'text-embedding-3-small', input: ['a', 'b'] });
    });
  });

  it('falls back to the default model for an empty name', () => {
    const provider = createEmbeddingProvider({ provider: 'ollama', model: ' ' });

    expect(provider.model).toBe('nomic-embed-text');
  });
});
