/**
 * Zod validation schemas for CLI inputs
 *
 * These schemas validate and transform user input from the command line.
 * Commander.js parses arguments, then we validate with Zod for:
 * - Type coercion (string "5" -> number 5)
 * - Custom validation rules
 * - Helpful error messages
 */

import { z } from 'zod';

import { ValidationError } from '../errors/index.js';
import type { KeyFacts } from '../search/types.js';

/** Largest --top-k a command accepts */
export const MAX_TOP_K = 100;

// ============================================================================
// SHARED OPTION SCHEMAS
// ============================================================================

export const TopKSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'top-k must be a whole number')
  .transform((val) => parseInt(val, 10))
  .refine((val) => val >= 1 && val <= MAX_TOP_K, {
    message: `top-k must be a number between 1 and ${MAX_TOP_K}`,
  });

/**
 * Comma-separated codes ("LJ-12, BE-3" -> ['LJ-12', 'BE-3']).
 */
export const CodeListSchema = z
  .string()
  .transform((val) => val.split(',').map((code) => code.trim()).filter(Boolean));

// ============================================================================
// SEARCH COMMAND SCHEMA
// ============================================================================

export const SearchArgsSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'Search query cannot be empty')
    .max(2000, 'Search query too long (max 2000 chars)'),
});

// ============================================================================
// CONTEXT COMMAND SCHEMA
// ============================================================================

/**
 * Key facts file: a flat JSON object. Numbers and booleans become strings;
 * null marks a missing value.
 */
export const KeyFactsSchema = z
  .record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
  .transform((facts): KeyFacts =>
    Object.fromEntries(
      Object.entries(facts).map(([key, value]) => [key, value === null ? null : String(value)])
    )
  );

// ============================================================================
// VALIDATION HELPERS
// ============================================================================

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
}

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 *
 * @example
 * ```typescript
 * const result = validateInput(SearchArgsSchema, { query });
 * if (!result.success) {
 *   ctx.error(result.error);
 * }
 * ```
 */
export function validateInput<T extends z.ZodSchema>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; error: string } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, error: `Validation failed:\n  ${describeIssues(result.error).join('\n  ')}` };
}

/**
 * Validate input, throwing a ValidationError that lists every issue.
 *
 * @example
 * ```typescript
 * const topK = parseInput(TopKSchema, cmdOptions.topK, 'Invalid --top-k value');
 * ```
 */
export function parseInput<T extends z.ZodSchema>(schema: T, input: unknown, message: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, describeIssues(result.error));
  }
  return result.data;
}
