import type { MetadataFilter, UnitMetadata } from '../types/unit.types.js';

export interface VectorSearchResult {
  id: string;
  score: number;
  metadata: Readonly<UnitMetadata>;
}

export interface VectorIndexEntry {
  id: string;
  vector: Float32Array;
  metadata: Readonly<UnitMetadata>;
}

/**
 * Stores (id, vector, metadata) triples and answers top-k similarity queries.
 * Scores are monotone similarities (higher = closer); equal scores keep
 * insertion order.
 */
export interface VectorIndex {
  upsert(id: string, vector: Float32Array, metadata: Readonly<UnitMetadata>): Promise<void>;
  remove(id: string): Promise<boolean>;
  search(query: Float32Array, topK: number, filter?: MetadataFilter): Promise<VectorSearchResult[]>;
  has(id: string): boolean;
  /** Entries in insertion order. */
  entries(): VectorIndexEntry[];
  clear(): Promise<void>;
  readonly size: number;
  /** 0 until the first vector fixes it. */
  readonly dimensions: number;
}

export function toPredicate(
  filter: MetadataFilter | undefined,
): ((metadata: Readonly<UnitMetadata>) => boolean) | undefined {
  if (filter === undefined) return undefined;
  if (typeof filter === 'function') return filter;
  const expected = Object.entries(filter);
  if (expected.length === 0) return undefined;
  return (metadata) => expected.every(([key, value]) => metadata[key] === value);
}
