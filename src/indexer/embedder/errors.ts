/**
 * Embedding Errors
 *
 * All errors extend CLIError so the CLI prints them with a hint and exits
 * with their code.
 */

import { CLIError } from '../../errors/index.js';

/**
 * No embedding provider is configured, so queries cannot be embedded.
 * A configuration error, distinct from "no passages matched".
 *
 * Exit code 2: Configuration error
 */
export class EmbeddingUnavailableError extends CLIError {
  constructor(message = 'No embedding provider is configured') {
    super(
      message,
      'Set embedding.provider in config.toml and the provider API key (run: zctx config list)',
      2
    );
    this.name = 'EmbeddingUnavailableError';
  }
}

/**
 * The text to embed is empty after trimming. The provider is never called.
 */
export class EmptyQueryError extends CLIError {
  constructor() {
    super('Cannot embed empty text', 'Provide key facts or a non-empty query');
    this.name = 'EmptyQueryError';
  }
}

/**
 * The provider answered with something that is not a vector.
 */
export class EmbeddingResponseError extends CLIError {
  constructor(detail: string) {
    super(
      `Embedding provider returned no usable vector: ${detail}`,
      'Check embedding.provider and embedding.model in config.toml'
    );
    this.name = 'EmbeddingResponseError';
  }
}

/**
 * The provider request itself failed (HTTP error, unreachable server).
 */
export class EmbeddingRequestError extends CLIError {
  /** HTTP status, when the provider answered */
  public readonly status?: number;

  constructor(provider: string, detail: string, status?: number) {
    super(
      `${provider} embedding request failed${status !== undefined ? ` (HTTP ${status})` : ''}: ${detail}`,
      provider === 'ollama'
        ? 'Is the Ollama server running? Start it with: ollama serve'
        : 'Check the API key and embedding.model in config.toml'
    );
    this.name = 'EmbeddingRequestError';
    this.status = status;
  }
}

/**
 * An embedding call exceeded embedding.timeout_ms.
 */
export class EmbeddingTimeoutError extends CLIError {
  constructor(timeoutMs: number) {
    super(
      `Embedding operation timed out after ${timeoutMs}ms`,
      'The provider may be slow or unreachable. Consider increasing embedding.timeout_ms in config.toml'
    );
    this.name = 'EmbeddingTimeoutError';
  }
}
