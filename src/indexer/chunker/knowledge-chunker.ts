/**
 * Knowledge Chunker
 *
 * Splits knowledge resources into passages. Each known resource has its own
 * splitter that knows where the rule units sit in its JSON; anything else is
 * split by top-level key (objects) or by item (lists).
 *
 * Every passage starts with a header line naming its source and position,
 * e.g. `Vir: priloga2, Naselje: Bevke, Enota: BE-3`, followed by a blank line
 * and the body (strings as they are, anything else as compact JSON).
 */

import { sha256 } from '../../utils/index.js';
import type { ChunkMetadata } from '../../database/schema.js';
import type { ChunkResourcesResult, KnowledgeChunk, KnowledgeResource } from '../types.js';
import { MAX_CHUNK_CHARS, splitText } from './config.js';

/**
 * A passage before its id and final content are computed.
 */
interface Passage {
  key: string;
  header: string;
  body: unknown;
  metadata: ChunkMetadata;
}

/** Returns null when the payload does not have the expected shape */
type Splitter = (name: string, payload: unknown) => Passage[] | null;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function text(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

/** Item fields that carry citation metadata, in priority order */
const METADATA_KEYS: ReadonlyArray<readonly [keyof ChunkMetadata, readonly string[]]> = [
  ['article', ['clen', 'article']],
  ['zone_unit', ['enota_urejanja', 'urejevalna_enota', 'enote_urejanja_prostora', 'eup']],
  ['land_use', ['namenska_raba', 'podrobnejsa_namenska_raba', 'raba']],
  ['page', ['stran', 'page']],
  ['year', ['leto', 'year']],
];

/**
 * Citation metadata found in an item's own fields.
 */
export function metadataFrom(item: unknown): ChunkMetadata {
  const metadata: ChunkMetadata = {};
  if (!isObject(item)) {
    return metadata;
  }
  for (const [field, keys] of METADATA_KEYS) {
    const value = keys.map((key) => text(item[key])).find((candidate) => candidate !== '');
    if (value !== undefined) {
      metadata[field] = value;
    }
  }
  return metadata;
}

function listItems(items: unknown, describe: (item: unknown, index: number) => Omit<Passage, 'body'>): Passage[] | null {
  if (!Array.isArray(items)) {
    return null;
  }
  return items.map((item, index) => ({ ...describe(item, index), body: item }));
}

function field(item: unknown, key: string): string {
  return isObject(item) ? text(item[key]) : '';
}

const splitOpn: Splitter = (name, payload) => {
  if (!isObject(payload)) return null;

  const passages: Passage[] = [];
  for (const [section, articles] of Object.entries(payload)) {
    if (isObject(articles)) {
      for (const [key, content] of Object.entries(articles)) {
        passages.push({
          key: `${section}.${key}`,
          header: `Vir: ${name}, Razdelek: ${section}, Ključ: ${key}`,
          body: content,
          metadata: { ...metadataFrom(content), article: key },
        });
      }
    } else {
      passages.push({
        key: section,
        header: `Vir: ${name}, Razdelek: ${section}`,
        body: articles,
        metadata: { article: section },
      });
    }
  }
  return passages;
};

const splitPriloga1: Splitter = (name, payload) =>
  isObject(payload)
    ? listItems(payload.objects, (item, index) => ({
        key: `objekt_${field(item, 'id') || index + 1}`,
        header: `Vir: ${name}, Objekt: ${field(item, 'title')}`,
        metadata: metadataFrom(item),
      }))
    : null;

const splitPriloga2: Splitter = (name, payload) =>
  isObject(payload)
    ? listItems(payload.table_entries, (item, index) => ({
        key: field(item, 'enota_urejanja') || `vnos_${index + 1}`,
        header: `Vir: ${name}, Naselje: ${field(item, 'naselje')}, Enota: ${field(item, 'enota_urejanja')}`,
        metadata: metadataFrom(item),
      }))
    : null;

const splitPriloga34: Splitter = (name, payload) => {
  if (!isObject(payload)) return null;

  const priloga3 = isObject(payload.priloga3)
    ? listItems(payload.priloga3.entries, (item, index) => ({
        key: `p3_${field(item, 'urejevalna_enota') || index + 1}`,
        header: `Vir: ${name} (Priloga 3), Naselje: ${field(item, 'ime_naselja')}`,
        metadata: metadataFrom(item),
      }))
    : null;
  const priloga4 = listItems(payload.priloga4, (item, index) => ({
    key: `p4_${field(item, 'enote_urejanja_prostora') || index + 1}`,
    header: `Vir: ${name} (Priloga 4), Naselje: ${field(item, 'ime_naselja')}`,
    metadata: metadataFrom(item),
  }));

  if (priloga3 === null && priloga4 === null) return null;
  return [...(priloga3 ?? []), ...(priloga4 ?? [])];
};

const splitIzrazi: Splitter = (name, payload) =>
  isObject(payload)
    ? listItems(payload.terms, (item, index) => ({
        key: field(item, 'term') || `izraz_${index + 1}`,
        header: `Vir: ${name}, Izraz: ${field(item, 'term')}`,
        metadata: {},
      }))
    : null;

const splitUredba: Splitter = (name, payload) =>
  isObject(payload)
    ? Object.entries(payload).map(([key, content]) => ({
        key,
        header: `Vir: ${name}, Razdelek: ${key}`,
        body: content,
        metadata: { ...metadataFrom(content), article: key },
      }))
    : null;

/**
 * Fallback for resources without a dedicated splitter.
 */
function splitGeneric(name: string, payload: unknown): Passage[] {
  if (isObject(payload)) {
    return Object.entries(payload).map(([key, content]) => ({
      key,
      header: `Vir: ${name}, Ključ: ${key}`,
      body: content,
      metadata: metadataFrom(content),
    }));
  }
  if (Array.isArray(payload)) {
    return payload.map((item, index) => ({
      key: String(index + 1),
      header: `Vir: ${name}, Vnos: ${index + 1}`,
      body: item,
      metadata: metadataFrom(item),
    }));
  }
  return [{ key: name, header: `Vir: ${name}`, body: payload, metadata: {} }];
}

/** Resource-specific splitters by resource name */
export const RESOURCE_SPLITTERS: Readonly<Record<string, Splitter>> = {
  opn: splitOpn,
  priloga1: splitPriloga1,
  priloga2: splitPriloga2,
  'priloga3-4': splitPriloga34,
  izrazi: splitIzrazi,
  uredba: splitUredba,
};

/**
 * Body text of a passage: strings as they are, other values as compact JSON.
 */
export function renderBody(body: unknown): string {
  if (typeof body === 'string') {
    return body.trim();
  }
  return JSON.stringify(body) ?? '';
}

/**
 * Deterministic chunk id.
 */
export function chunkId(source: string, key: string, content: string): string {
  return sha256(`${source}\n${key}\n${content}`);
}

function toChunks(source: string, passage: Passage, maxChars: number): KnowledgeChunk[] {
  const body = renderBody(passage.body);
  if (body === '' || body === 'null' || body === '{}' || body === '[]') {
    return [];
  }

  const pieces = splitText(body, Math.max(1, maxChars - passage.header.length - 2));
  return pieces.map((piece, index) => {
    const key = pieces.length > 1 ? `${passage.key}#${index + 1}` : passage.key;
    const content = `${passage.header}\n\n${piece}`;
    return { id: chunkId(source, key, content), source, key, content, metadata: passage.metadata };
  });
}

/**
 * Split knowledge resources into passages.
 *
 * Unexpected shapes are reported as warnings and split generically; an
 * identical passage seen twice is kept once.
 *
 * @example
 * ```typescript
 * const { chunks, warnings } = chunkKnowledgeResources([
 *   { name: 'izrazi', payload: { terms: [{ term: 'Faktor zazidanosti', definition: '...' }] } },
 * ]);
 * // chunks[0].key === 'Faktor zazidanosti'
 * ```
 */
export function chunkKnowledgeResources(
  resources: readonly KnowledgeResource[],
  options: { maxChars?: number } = {}
): ChunkResourcesResult {
  const maxChars = options.maxChars ?? MAX_CHUNK_CHARS;
  const chunks: KnowledgeChunk[] = [];
  const warnings: string[] = [];
  const bySource: Record<string, number> = {};
  const seen = new Set<string>();

  for (const { name, payload } of resources) {
    const splitter = RESOURCE_SPLITTERS[name];
    let passages = splitter ? splitter(name, payload) : splitGeneric(name, payload);
    if (passages === null) {
      warnings.push(`${name}: unexpected structure, split by top-level key`);
      passages = splitGeneric(name, payload);
    }

    let produced = 0;
    let count = 0;
    for (const passage of passages) {
      for (const chunk of toChunks(name, passage, maxChars)) {
        produced++;
        if (!seen.has(chunk.id)) {
          seen.add(chunk.id);
          chunks.push(chunk);
          count++;
        }
      }
    }

    if (produced === 0) {
      warnings.push(`${name}: no passages found`);
    }
    bySource[name] = (bySource[name] ?? 0) + count;
  }

  return { chunks, warnings, bySource };
}
