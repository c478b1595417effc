/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. better-sqlite3
 * returns `unknown` rows; validating them here keeps a drifted schema
 * (failed migration, manual edits) from surfacing as corrupt results.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM knowledge_chunks WHERE id = ?').get(id);
 * return row ? validateRow(KnowledgeChunkRowSchema, row, `knowledge_chunks.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Knowledge Chunk Schemas
// ============================================================================

/**
 * Full knowledge_chunks row (matches KnowledgeChunkRecord in schema.ts).
 */
export const KnowledgeChunkRowSchema = z.object({
  id: z.string(),
  source: z.string(),
  chunk_key: z.string(),
  content: z.string(),
  // SQLite returns BLOBs as Buffers via better-sqlite3
  embedding: z.instanceof(Buffer).nullable(),
  embedding_model: z.string().nullable(),
  dimensions: z.number().int().positive().nullable(),
  metadata: z.string().nullable(),
  created_at: z.string(),
});

export type KnowledgeChunkRow = z.infer<typeof KnowledgeChunkRowSchema>;

/**
 * Row returned by the full-text search query.
 */
export const KeywordHitRowSchema = KnowledgeChunkRowSchema.pick({
  id: true,
  source: true,
  chunk_key: true,
  content: true,
  metadata: true,
}).extend({
  score: z.number(),
});

export type KeywordHitRow = z.infer<typeof KeywordHitRowSchema>;

/**
 * Stored embedding of one chunk.
 */
export const EmbeddingRowSchema = z.object({
  id: z.string(),
  embedding: z.instanceof(Buffer),
});

export type EmbeddingRow = z.infer<typeof EmbeddingRowSchema>;

/**
 * Citation metadata JSON. Unknown keys are dropped.
 */
export const ChunkMetadataSchema = z.object({
  article: z.string().optional(),
  zone_unit: z.string().optional(),
  land_use: z.string().optional(),
  page: z.string().optional(),
  year: z.string().optional(),
});

/** Single-column COUNT(*) result */
export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation.
 *
 * Exit code 5: Database error (same as DatabaseError)
 */
export class SchemaValidationError extends CLIError {
  /** Individual validation issues from Zod */
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThis may indicate a database/code version mismatch.\n` +
      `Try: zctx status --verbose  to check database health`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @param context - Location for error messages (e.g., "knowledge_chunks.id=abc")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodSchema>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of database rows against a Zod schema.
 *
 * By default, throws on the first invalid row. With `continueOnError`,
 * invalid rows are reported to `onError` and left out.
 *
 * @throws SchemaValidationError if validation fails (unless continueOnError)
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string,
  options?: {
    continueOnError?: boolean;
    onError?: (row: unknown, error: z.ZodError) => void;
  }
): z.output<T>[] {
  const valid: z.output<T>[] = [];

  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    const result = schema.safeParse(row);

    if (result.success) {
      valid.push(result.data);
    } else if (options?.continueOnError) {
      options.onError?.(row, result.error);
    } else {
      throw new SchemaValidationError(
        `Database schema mismatch in ${context}[${i}]`,
        result.error.issues
      );
    }
  }

  return valid;
}
