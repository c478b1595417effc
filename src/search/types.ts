/**
 * Search Module Types
 *
 * Type definitions for the hybrid retrieval pipeline: raw backend rows,
 * canonical rows, key facts and the engine's options and result.
 */

/**
 * An untyped record as returned by a storage backend.
 * Field names are not fixed; the normalizer discovers them.
 */
export type RawRow = Record<string, unknown>;

/**
 * Citation fields carried by a row. All optional.
 */
export interface Citation {
  source?: string;
  article?: string;
  paragraph?: string;
  page?: string;
  zoneUnit?: string;
  landUse?: string;
  year?: string;
}

/** Citation field names in rendering order */
export type CitationField = keyof Citation;

/**
 * A retrieved rule passage in canonical form.
 *
 * `relevanceScore` is a per-query working value: the backend's raw score,
 * then its normalized value, then the fused score. MMR selects by the fused
 * score and leaves it unchanged.
 */
export interface Row extends Citation {
  /** Stable identifier (content hash when the backend supplies none) */
  id: string;
  /** Passage text (may be empty) */
  text: string;
  relevanceScore: number;
  /** Document-side embedding, used only to compare rows during MMR */
  embedding?: number[];
  /** The backend record the row was built from */
  raw: RawRow;
}

/**
 * Plain serializable form of a row handed to callers (logs, JSON output).
 * Uses the storage naming (`relevance_score`, `zone_unit`, `land_use`).
 */
export interface RowRecord {
  id: string;
  text: string;
  relevance_score: number;
  source?: string;
  article?: string;
  paragraph?: string;
  page?: string;
  zone_unit?: string;
  land_use?: string;
  year?: string;
}

/**
 * Key facts extracted from a project's documentation, keyed by field name
 * (e.g. `vrsta_gradnje`, `faktor_zazidanosti_fz`).
 */
export type KeyFacts = Record<string, string | null | undefined>;

/**
 * Zoning codes that scope which rules apply to the parcel.
 */
export interface ZoningCodes {
  /** Spatial planning unit codes (EUP) */
  zoneUnits?: readonly string[];
  /** Land-use codes (namenska raba) */
  landUses?: readonly string[];
}

/**
 * Options for a single context request.
 */
export interface ContextRequest extends ZoningCodes {
  /** Number of passages to place in the context (defaults to the engine's topK) */
  topK?: number;
}

/**
 * Result of a context request.
 */
export interface ContextResult {
  /** Rendered citation block ('' when nothing matched) */
  contextText: string;
  /** Selected rows as plain records, in selection order */
  rows: RowRecord[];
}

/**
 * Options for rendering the context block.
 */
export interface RenderOptions {
  /** First line of the block (default: 'Relevant rules/citations:') */
  header?: string;
  /** Maximum characters of passage text per line (default: 700) */
  maxChars?: number;
}
