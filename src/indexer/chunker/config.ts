/**
 * Chunker Configuration
 *
 * Size limits for knowledge passages.
 */

/**
 * Maximum characters per passage. Longer passages are split into numbered
 * parts, each repeating the header line.
 *
 * Keeps a passage well inside the embedding models' input limits
 * (text-embedding-004 takes 2048 tokens).
 */
export const MAX_CHUNK_CHARS = 6000;

/**
 * Estimate token count from text (~4 characters per token).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Split text into pieces of at most maxChars, preferring the last line break
 * and then the last space before the limit.
 *
 * @example
 * ```typescript
 * splitText('ena dva tri', 7); // ['ena dva', 'tri']
 * ```
 */
export function splitText(text: string, maxChars: number = MAX_CHUNK_CHARS): string[] {
  const pieces: string[] = [];
  let rest = text.trim();

  while (rest.length > maxChars) {
    const window = rest.slice(0, maxChars + 1);
    let cut = window.lastIndexOf('\n');
    if (cut <= 0) {
      cut = window.lastIndexOf(' ');
    }
    if (cut <= 0) {
      cut = maxChars;
    }
    pieces.push(rest.slice(0, cut).trimEnd());
    rest = rest.slice(cut).trimStart();
  }

  if (rest.length > 0) {
    pieces.push(rest);
  }
  return pieces;
}
