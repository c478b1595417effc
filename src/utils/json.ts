/**
 * JSON Utilities
 *
 * Safe JSON parsing with schema validation and fallback for corrupted data.
 */

import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Parse a JSON string and validate it, returning a fallback on any failure.
 *
 * Use this for JSON stored in the database (chunk metadata) where a
 * corrupted value should degrade to the fallback instead of failing a query.
 *
 * @param json - The JSON string to parse (can be null/undefined)
 * @param schema - Zod schema the parsed value must satisfy
 * @param fallback - Value to return if parsing or validation fails
 * @param onError - Optional callback for logging/reporting failures
 *
 * @example
 * ```typescript
 * const metadata = safeJsonParse(row.metadata, z.record(z.unknown()), {});
 * ```
 */
export function safeJsonParse<T>(
  json: string | null | undefined,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fallback: T,
  onError?: (error: Error, rawValue: string) => void
): T {
  if (json === null || json === undefined) {
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    onError?.(new Error(result.error.issues.map((i) => i.message).join('; ')), json);
    return fallback;
  }
  return result.data;
}
