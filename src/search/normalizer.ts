/**
 * Row Normalizer
 *
 * Maps backend records with varying field names onto the canonical Row.
 * Each canonical field has an ordered list of candidate keys; the first key
 * holding a non-null value wins. New source shapes are supported by adding
 * keys to FIELD_KEYS.
 *
 * normalizeRow never throws: malformed values become '', undefined or a
 * score of 0.
 */

import { sha256, stableStringify } from '../utils/index.js';
import type { CitationField, RawRow, Row, RowRecord } from './types.js';

/**
 * Candidate keys per canonical field, in priority order.
 */
export const FIELD_KEYS = {
  id: ['id', 'chunk_id', 'chunkId', 'uuid', '_id'],
  text: ['text', 'content', 'chunk', 'vsebina', 'body', 'passage'],
  score: ['relevance_score', 'relevanceScore', 'similarity', 'score', '_score'],
  source: ['source', 'vir', 'document', 'title'],
  article: ['article', 'clen', 'člen', 'section', 'razdelek', 'kljuc', 'key'],
  paragraph: ['paragraph', 'odstavek'],
  page: ['page', 'stran', 'page_number'],
  zoneUnit: ['zone_unit', 'zoneUnit', 'eup', 'enota_urejanja'],
  landUse: ['land_use', 'landUse', 'namenska_raba', 'raba'],
  year: ['year', 'leto'],
  embedding: ['embedding', 'vector', 'vektor'],
} as const satisfies Record<string, readonly string[]>;

/** Citation fields in the order they are rendered */
export const CITATION_FIELDS: readonly CitationField[] = [
  'source',
  'article',
  'paragraph',
  'page',
  'zoneUnit',
  'landUse',
  'year',
];

/** Record keys used for citation fields in serialized rows */
const RECORD_KEYS: Record<
  CitationField,
  'source' | 'article' | 'paragraph' | 'page' | 'zone_unit' | 'land_use' | 'year'
> = {
  source: 'source',
  article: 'article',
  paragraph: 'paragraph',
  page: 'page',
  zoneUnit: 'zone_unit',
  landUse: 'land_use',
  year: 'year',
};

/** Keys that vary per query or per model and must not affect a synthesized id */
const VOLATILE_KEYS: ReadonlySet<string> = new Set<string>([
  ...FIELD_KEYS.score,
  ...FIELD_KEYS.embedding,
]);

function pick(raw: RawRow, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = raw[key];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

/**
 * Coerce a scalar to text. Objects, arrays and non-finite numbers become ''.
 */
export function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
  if (typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  return '';
}

/**
 * Coerce a score. Numeric strings are parsed; anything else is 0.
 */
export function toScore(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/**
 * Coerce an embedding. Accepts number arrays and typed arrays; a list with
 * any non-numeric or non-finite entry is rejected as a whole.
 */
export function toEmbedding(value: unknown): number[] | undefined {
  const values: unknown[] | null = Array.isArray(value)
    ? value
    : isNumericView(value)
      ? Array.from(value)
      : null;

  if (values === null || values.length === 0) {
    return undefined;
  }

  const vector: number[] = [];
  for (const item of values) {
    if (typeof item !== 'number' || !Number.isFinite(item)) {
      return undefined;
    }
    vector.push(item);
  }
  return vector;
}

function isNumericView(value: unknown): value is ArrayLike<number> {
  return (
    ArrayBuffer.isView(value) &&
    !(value instanceof DataView) &&
    !(value instanceof BigInt64Array) &&
    !(value instanceof BigUint64Array)
  );
}

/**
 * Deterministic id for a record without one: hash of its sorted contents,
 * leaving out score and embedding keys so the same passage returned by
 * different backends gets the same id.
 */
export function synthesizeId(raw: RawRow): string {
  const stable: RawRow = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!VOLATILE_KEYS.has(key)) {
      stable[key] = value;
    }
  }
  return `row_${sha256(stableStringify(stable))}`;
}

/**
 * Normalize one backend record into a Row.
 */
export function normalizeRow(raw: RawRow): Row {
  const id = toText(pick(raw, FIELD_KEYS.id)).trim();

  const row: Row = {
    id: id === '' ? synthesizeId(raw) : id,
    text: toText(pick(raw, FIELD_KEYS.text)),
    relevanceScore: toScore(pick(raw, FIELD_KEYS.score)),
    raw: { ...raw },
  };

  for (const field of CITATION_FIELDS) {
    const value = toText(pick(raw, FIELD_KEYS[field])).trim();
    if (value !== '') {
      row[field] = value;
    }
  }

  const embedding = toEmbedding(pick(raw, FIELD_KEYS.embedding));
  if (embedding !== undefined) {
    row.embedding = embedding;
  }

  return row;
}

/**
 * Normalize a backend result list. Non-object entries are dropped.
 */
export function normalizeRows(raws: readonly unknown[]): Row[] {
  const rows: Row[] = [];
  for (const raw of raws) {
    if (isRawRow(raw)) {
      rows.push(normalizeRow(raw));
    }
  }
  return rows;
}

export function isRawRow(value: unknown): value is RawRow {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Plain serializable record for a row (no embedding, no raw record).
 */
export function rowToRecord(row: Row): RowRecord {
  const record: RowRecord = {
    id: row.id,
    text: row.text,
    relevance_score: row.relevanceScore,
  };
  for (const field of CITATION_FIELDS) {
    const value = row[field];
    if (value !== undefined) {
      record[RECORD_KEYS[field]] = value;
    }
  }
  return record;
}

/**
 * Canonical raw form of a row. Normalizing it yields the same row again.
 */
export function rowToRaw(row: Row): RawRow {
  const raw: RawRow = { ...rowToRecord(row) };
  if (row.embedding !== undefined) {
    raw.embedding = [...row.embedding];
  }
  return raw;
}
