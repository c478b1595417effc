import { createHash } from 'node:crypto';

/**
 * Hex SHA-256 digest of a UTF-8 string.
 */
export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * JSON-like serialization with object keys sorted at every level.
 *
 * Total over any value: typed arrays and Buffers become number lists,
 * bigints become strings, functions and symbols become null, and cycles
 * are cut with a "[circular]" marker.
 */
export function stableStringify(value: unknown): string {
  return serialize(value, new Set<object>());
}

function serialize(value: unknown, seen: Set<object>): string {
  if (value === null || value === undefined) {
    return 'null';
  }

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return Number.isFinite(value) ? String(value) : 'null';
    case 'boolean':
      return value ? 'true' : 'false';
    case 'bigint':
      return JSON.stringify(value.toString());
    case 'function':
    case 'symbol':
      return 'null';
  }

  if (typeof value !== 'object') {
    return 'null';
  }

  if (seen.has(value)) {
    return '"[circular]"';
  }

  if (value instanceof Date) {
    return JSON.stringify(Number.isNaN(value.getTime()) ? null : value.toISOString());
  }

  if (ArrayBuffer.isView(value)) {
    const bytes = new Uint8Array(value.buffer, value.byteOffset, value.byteLength);
    return `[${Array.from(bytes).join(',')}]`;
  }

  seen.add(value);
  let out: string;
  if (Array.isArray(value)) {
    out = `[${value.map((item: unknown) => serialize(item, seen)).join(',')}]`;
  } else {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${serialize(v, seen)}`);
    out = `{${entries.join(',')}}`;
  }
  seen.delete(value);
  return out;
}
