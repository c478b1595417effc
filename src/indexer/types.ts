/**
 * Knowledge Ingestion Types
 *
 * Type definitions for turning knowledge resources (the municipal plan, its
 * annexes, the glossary and the decree) into stored, embedded passages.
 */

import type { ChunkMetadata } from '../database/schema.js';

/**
 * A knowledge resource as loaded from JSON.
 *
 * Known names get a resource-specific split (`opn`, `priloga1`, `priloga2`,
 * `priloga3-4`, `izrazi`, `uredba`); any other name is split by top-level
 * key or list item.
 */
export interface KnowledgeResource {
  name: string;
  payload: unknown;
}

/**
 * A passage ready for embedding and storage.
 */
export interface KnowledgeChunk {
  /** SHA-256 of source, key and content */
  id: string;
  /** Resource name */
  source: string;
  /** Key within the resource (section.article, EUP code, term, ...) */
  key: string;
  /** Header line plus the passage body */
  content: string;
  metadata: ChunkMetadata;
}

/**
 * Result of splitting a set of resources.
 */
export interface ChunkResourcesResult {
  chunks: KnowledgeChunk[];
  /** Non-fatal problems (unexpected shapes, empty resources) */
  warnings: string[];
  /** Chunk count per resource */
  bySource: Record<string, number>;
}

/**
 * Stages of an ingest run, in order.
 */
export type IngestStage = 'chunking' | 'embedding' | 'storing';

/**
 * Statistics for a completed stage.
 */
export interface StageStats {
  stage: IngestStage;
  processed: number;
  total: number;
  durationMs: number;
  details?: Record<string, unknown>;
}

/**
 * Final result of an ingest run.
 */
export interface IngestResult {
  /** Chunks produced from the resources */
  chunksCreated: number;
  /** Chunks that received an embedding */
  chunksEmbedded: number;
  /** Chunks written to the store */
  chunksStored: number;
  /** Chunks removed first (replace mode) */
  chunksRemoved: number;
  /** Chunk count per resource */
  bySource: Record<string, number>;
  /** Embedding model used, or null when embedding was skipped */
  embeddingModel: string | null;
  totalDurationMs: number;
  stageDurations: Partial<Record<IngestStage, number>>;
  warnings: string[];
  errors: string[];
}
