/**
 * Knowledge Resource Loading
 *
 * Reads knowledge-resource JSON files. A file is either one resource, named
 * after the file (`opn.json` → `opn`), or a bundle whose top-level keys are
 * all known resource names:
 *
 * ```json
 * { "opn": { ... }, "izrazi": { "terms": [ ... ] } }
 * ```
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { z } from 'zod';

import { FileNotFoundError, ValidationError } from '../errors/index.js';
import { RESOURCE_SPLITTERS } from './chunker/index.js';
import type { KnowledgeResource } from './types.js';

const BundleSchema = z.record(z.unknown());

/**
 * Resource name for a file path: the basename without its extension.
 */
export function resourceNameFromPath(path: string): string {
  return basename(path, extname(path));
}

/**
 * Whether a name has a resource-specific splitter.
 */
export function isKnownResource(name: string): boolean {
  return Object.hasOwn(RESOURCE_SPLITTERS, name);
}

/**
 * Turn a parsed file into resources.
 */
export function toResources(name: string, payload: unknown): KnowledgeResource[] {
  if (isKnownResource(name)) {
    return [{ name, payload }];
  }

  const bundle = BundleSchema.safeParse(payload);
  if (bundle.success) {
    const keys = Object.keys(bundle.data);
    if (keys.length > 0 && keys.every(isKnownResource)) {
      return keys.map((key) => ({ name: key, payload: bundle.data[key] }));
    }
  }

  return [{ name, payload }];
}

/**
 * Load the resources in one JSON file.
 *
 * @throws FileNotFoundError if the file doesn't exist
 * @throws ValidationError if the file isn't valid JSON
 */
export async function loadKnowledgeFile(path: string): Promise<KnowledgeResource[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new FileNotFoundError(path);
    }
    throw error;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid JSON in ${path}`, [message]);
  }

  return toResources(resourceNameFromPath(path), payload);
}

/**
 * Load several files. A resource name seen again replaces the earlier one.
 */
export async function loadKnowledgeFiles(paths: readonly string[]): Promise<KnowledgeResource[]> {
  const byName = new Map<string, KnowledgeResource>();
  for (const path of paths) {
    for (const resource of await loadKnowledgeFile(path)) {
      byName.set(resource.name, resource);
    }
  }
  return [...byName.values()];
}
