/**
 * Logger Interface for Library Code
 *
 * Library code (the retrieval engine, the knowledge store, ingestion) accepts
 * a Logger by injection. The CLI passes its CommandContext, which satisfies
 * this interface; tests pass silentLogger or a vi.fn() spy.
 */

/**
 * Generic logger interface for library code.
 *
 * Compatible with CommandContext so the CLI can pass ctx directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};

/**
 * Describe a caught value for a log line without assuming it is an Error.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
