/**
 * Search Module Errors
 *
 * Custom error classes for retrieval failures.
 * All errors extend CLIError for consistent error handling.
 */

import { CLIError } from '../errors/index.js';

/**
 * Thrown for invalid retrieval parameters: a negative or fractional top-k,
 * an MMR lambda or fusion weight outside [0, 1].
 *
 * These come from the caller, never from backend data, so they are raised
 * immediately instead of being degraded around.
 */
export class RetrievalParameterError extends CLIError {
  public readonly parameter: string;
  public readonly value: unknown;

  constructor(parameter: string, value: unknown, expected: string) {
    super(
      `Invalid ${parameter}: ${String(value)} (expected ${expected})`,
      'Run: zctx config list  to check the retrieval settings'
    );
    this.name = 'RetrievalParameterError';
    this.parameter = parameter;
    this.value = value;
  }
}

/**
 * Validate a weight in [0, 1].
 */
export function assertUnitInterval(parameter: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RetrievalParameterError(parameter, value, 'a number in [0, 1]');
  }
}

/**
 * Validate a result count (non-negative integer).
 */
export function assertTopK(value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RetrievalParameterError('topK', value, 'a non-negative integer');
  }
}
