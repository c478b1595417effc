/**
 * Query Composer
 *
 * Builds the text that is embedded and keyword-searched from a project's key
 * facts. High-signal fields go first so they dominate the embedding; fields
 * holding a "no data" sentinel are left out.
 *
 * @example
 * ```typescript
 * composeQuery(
 *   { vrsta_gradnje: 'novogradnja', glavni_objekt: 'enostanovanjska hiša' },
 *   { zoneUnits: ['LJ-12'], landUses: ['SSe'] }
 * );
 * // Ključne značilnosti projekta za iskanje relevantnih prostorskih pravil:
 * // - Vrsta gradnje: novogradnja
 * // - Glavni objekt: enostanovanjska hiša
 * // - Namenske rabe: SSe
 * // - Enote urejanja prostora: LJ-12
 * ```
 */

import type { KeyFacts, ZoningCodes } from './types.js';

export const QUERY_HEADER = 'Ključne značilnosti projekta za iskanje relevantnih prostorskih pravil:';

/**
 * Query used when no usable fact remains, so the embedder never sees empty
 * input.
 */
export const DEFAULT_QUERY =
  'prostorski izvedbeni pogoji gradnja objektov namenska raba enota urejanja prostora ' +
  'faktor zazidanosti faktor izrabe odmiki višina etažnost streha';

/** Values that mean "missing", matched case-insensitively as substrings */
export const NO_DATA_SENTINELS: readonly string[] = ['ni podatka', 'no data'];

/** Free-text queries are capped at this many characters */
export const MAX_DOCUMENT_QUERY_CHARS = 8000;

/** Fields emitted first, in this order */
const PRIORITY_FIELDS: ReadonlyArray<readonly [key: string, label: string]> = [
  ['vrsta_gradnje', 'Vrsta gradnje'],
  ['glavni_objekt', 'Glavni objekt'],
];

/** Technical fields emitted after the zoning codes */
const TECHNICAL_FIELDS: ReadonlyArray<readonly [key: string, label: string]> = [
  ['klasifikacija_cc_si', 'Klasifikacija objekta (CC-SI)'],
  ['faktor_zazidanosti_fz', 'Faktor zazidanosti (FZ)'],
  ['faktor_izrabe_fi', 'Faktor izrabe (FI)'],
  ['gabariti_etaznost', 'Etažnost'],
  ['tlorisne_dimenzije', 'Tlorisne dimenzije'],
  ['visinske_kote', 'Višinske kote'],
  ['odmiki_parcel', 'Odmiki od parcelnih mej'],
  ['naklon_strehe', 'Naklon strehe'],
  ['zelene_povrsine', 'Zelene površine (FZP)'],
];

/**
 * Whether a fact value carries real content.
 */
export function isMeaningful(value: string | null | undefined): value is string {
  if (value === null || value === undefined) {
    return false;
  }
  const trimmed = value.trim();
  if (trimmed === '') {
    return false;
  }
  const lower = trimmed.toLowerCase();
  return !NO_DATA_SENTINELS.some((sentinel) => lower.includes(sentinel));
}

/**
 * Trim, drop empties and duplicates, and sort codes.
 */
export function cleanCodes(codes: readonly string[] | undefined): string[] {
  const cleaned = new Set<string>();
  for (const code of codes ?? []) {
    const trimmed = code.trim();
    if (trimmed !== '') {
      cleaned.add(trimmed);
    }
  }
  return [...cleaned].sort();
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Compose the retrieval query for a project's key facts.
 * Pure: equal input always yields the same string.
 */
export function composeQuery(keyFacts: KeyFacts, codes: ZoningCodes = {}): string {
  const lines: string[] = [];

  const addField = ([key, label]: readonly [string, string]): void => {
    const value = keyFacts[key];
    if (isMeaningful(value)) {
      lines.push(`- ${label}: ${collapse(value)}`);
    }
  };

  PRIORITY_FIELDS.forEach(addField);

  const landUses = cleanCodes(codes.landUses);
  if (landUses.length > 0) {
    lines.push(`- Namenske rabe: ${landUses.join(', ')}`);
  }
  const zoneUnits = cleanCodes(codes.zoneUnits);
  if (zoneUnits.length > 0) {
    lines.push(`- Enote urejanja prostora: ${zoneUnits.join(', ')}`);
  }

  TECHNICAL_FIELDS.forEach(addField);

  if (lines.length === 0) {
    return DEFAULT_QUERY;
  }
  return [QUERY_HEADER, ...lines].join('\n');
}

/**
 * Compose a query from free text (a whole document or a search phrase):
 * whitespace collapsed, capped at MAX_DOCUMENT_QUERY_CHARS.
 */
export function composeDocumentQuery(text: string): string {
  const collapsed = collapse(text);
  if (collapsed === '') {
    return DEFAULT_QUERY;
  }
  return collapsed.slice(0, MAX_DOCUMENT_QUERY_CHARS).trimEnd();
}
