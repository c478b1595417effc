/**
 * Context Renderer
 *
 * Formats selected rows as a numbered, citation-annotated block for an LLM
 * prompt, and as ranked results for CLI display.
 *
 * @example
 * ```typescript
 * renderContext(rows);
 * // Relevant rules/citations:
 * // 1. source: OPN, article: 84. člen, zone unit: LJ-12 — Odmik od parcelne meje je najmanj 4 m …
 * // 2. source: unknown — Streha je simetrična dvokapnica …
 * ```
 *
 * @packageDocumentation
 */

import { CITATION_FIELDS } from './normalizer.js';
import type { CitationField, RenderOptions, Row } from './types.js';

/** Default header line of the context block */
export const DEFAULT_HEADER = 'Relevant rules/citations:';

/** Default maximum characters of passage text per line */
export const DEFAULT_SNIPPET_CHARS = 700;

const CITATION_LABELS: Record<CitationField, string> = {
  source: 'source',
  article: 'article',
  paragraph: 'paragraph',
  page: 'page',
  zoneUnit: 'zone unit',
  landUse: 'land use',
  year: 'year',
};

/**
 * Collapse whitespace and cut at the last word boundary before maxChars,
 * appending '…' when anything was cut.
 *
 * @example
 * ```typescript
 * summarizeText('Gradnja  je\ndovoljena', 100) // 'Gradnja je dovoljena'
 * summarizeText('ena dva tri', 9)            // 'ena dva…'
 * ```
 */
export function summarizeText(text: string, maxChars: number = DEFAULT_SNIPPET_CHARS): string {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }

  let truncated = normalized.slice(0, maxChars);
  const lastSpace = truncated.lastIndexOf(' ');
  if (lastSpace > 0) {
    truncated = truncated.slice(0, lastSpace);
  }
  return `${truncated}…`;
}

/**
 * Citation part of a line: present fields joined by ', ', or
 * 'source: unknown' when a row carries none.
 */
export function formatCitation(row: Row): string {
  const parts: string[] = [];
  for (const field of CITATION_FIELDS) {
    const value = row[field];
    if (value !== undefined && value !== '') {
      parts.push(`${CITATION_LABELS[field]}: ${value}`);
    }
  }
  return parts.length > 0 ? parts.join(', ') : 'source: unknown';
}

/**
 * Render the context block. No rows renders as ''.
 */
export function renderContext(rows: readonly Row[], options: RenderOptions = {}): string {
  if (rows.length === 0) {
    return '';
  }
  const { header = DEFAULT_HEADER, maxChars = DEFAULT_SNIPPET_CHARS } = options;

  const lines = rows.map((row, index) => {
    const summary = summarizeText(row.text, maxChars);
    const citation = formatCitation(row);
    return `${index + 1}. ${citation} — ${summary}`.trimEnd();
  });

  return [header, ...lines].join('\n');
}

/**
 * Format a score as a 3-decimal string.
 */
export function formatScore(score: number): string {
  return score.toFixed(3);
}

/**
 * Format ranked rows for CLI display, blank line between results.
 *
 * ```
 * [0.842] source: OPN, article: 84. člen
 *   Odmik od parcelne meje je najmanj 4 m …
 * ```
 */
export function formatRowsForDisplay(rows: readonly Row[], snippetChars = 200): string {
  return rows
    .map((row) => {
      const header = `[${formatScore(row.relevanceScore)}] ${formatCitation(row)}`;
      const snippet = summarizeText(row.text, snippetChars);
      return snippet === '' ? header : `${header}\n  ${snippet}`;
    })
    .join('\n\n');
}
