import type { VectorIndex, VectorIndexEntry, VectorSearchResult } from './vectorIndex.js';
import { toPredicate } from './vectorIndex.js';
import type { MetadataFilter, UnitMetadata } from '../types/unit.types.js';
import { DimensionMismatchError } from '../errors/indexing.js';
import { KeyedLock } from '../util/keyedLock.js';

interface Entry extends VectorIndexEntry {
  seq: number;
}

export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const ai = a[i] ?? 0;
    const bi = b[i] ?? 0;
    dot += ai * bi;
    normA += ai * ai;
    normB += bi * bi;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

/**
 * Exact (brute-force) cosine index held in memory. Writes to one id are
 * serialized; an overwritten id keeps its original insertion position.
 */
export class MemoryVectorIndex implements VectorIndex {
  private readonly entriesById = new Map<string, Entry>();
  private readonly lock = new KeyedLock();
  private nextSeq = 0;
  private _dimensions = 0;

  get dimensions(): number {
    return this._dimensions;
  }

  get size(): number {
    return this.entriesById.size;
  }

  async upsert(id: string, vector: Float32Array, metadata: Readonly<UnitMetadata>): Promise<void> {
    await this.lock.run(id, () => {
      this.checkDimensions(vector);
      const existing = this.entriesById.get(id);
      this.entriesById.set(id, {
        id,
        vector: Float32Array.from(vector),
        metadata: { ...metadata },
        seq: existing?.seq ?? this.nextSeq++,
      });
    });
  }

  async remove(id: string): Promise<boolean> {
    return this.lock.run(id, () => this.entriesById.delete(id));
  }

  async search(query: Float32Array, topK: number, filter?: MetadataFilter): Promise<VectorSearchResult[]> {
    if (topK <= 0 || this.entriesById.size === 0 || query.length === 0) return [];
    this.checkDimensions(query);

    const accept = toPredicate(filter);
    const scored: Array<VectorSearchResult & { seq: number }> = [];
    for (const entry of this.entriesById.values()) {
      if (accept && !accept(entry.metadata)) continue;
      scored.push({
        id: entry.id,
        score: cosineSimilarity(query, entry.vector),
        metadata: entry.metadata,
        seq: entry.seq,
      });
    }

    scored.sort((a, b) => b.score - a.score || a.seq - b.seq);
    return scored.slice(0, topK).map(({ id, score, metadata }) => ({ id, score, metadata }));
  }

  has(id: string): boolean {
    return this.entriesById.has(id);
  }

  entries(): VectorIndexEntry[] {
    return [...this.entriesById.values()]
      .sort((a, b) => a.seq - b.seq)
      .map(({ id, vector, metadata }) => ({ id, vector, metadata }));
  }

  async clear(): Promise<void> {
    this.entriesById.clear();
    this.nextSeq = 0;
    this._dimensions = 0;
  }

  private checkDimensions(vector: Float32Array): void {
    if (this._dimensions === 0) {
      this._dimensions = vector.length;
    } else if (vector.length !== this._dimensions) {
      throw new DimensionMismatchError(this._dimensions, vector.length);
    }
  }
}
