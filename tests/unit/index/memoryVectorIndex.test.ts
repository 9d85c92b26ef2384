import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryVectorIndex, cosineSimilarity } from '../../../src/index/memoryVectorIndex.js';
import { toPredicate } from '../../../src/index/vectorIndex.js';
import { DimensionMismatchError } from '../../../src/errors/indexing.js';

const vec = (...values: number[]): Float32Array => Float32Array.from(values);

describe('cosineSimilarity', () => {
  it('scores identical, orthogonal and opposite vectors', () => {
    expect(cosineSimilarity(vec(1, 0), vec(2, 0))).toBeCloseTo(1);
    expect(cosineSimilarity(vec(1, 0), vec(0, 1))).toBe(0);
    expect(cosineSimilarity(vec(1, 0), vec(-1, 0))).toBeCloseTo(-1);
  });

  it('returns 0 for zero or mismatched vectors', () => {
    expect(cosineSimilarity(vec(0, 0), vec(1, 0))).toBe(0);
    expect(cosineSimilarity(vec(1), vec(1, 0))).toBe(0);
  });
});

describe('MemoryVectorIndex', () => {
  let index: MemoryVectorIndex;

  beforeEach(async () => {
    index = new MemoryVectorIndex();
    await index.upsert('a', vec(1, 0), { source: 'a.md' });
    await index.upsert('b', vec(0.6, 0.8), { source: 'b.md' });
    await index.upsert('c', vec(0, 1), { source: 'c.md' });
  });

  it('returns at most topK results in descending score order', async () => {
    const results = await index.search(vec(1, 0), 2);
    expect(results.map((r) => r.id)).toEqual(['a', 'b']);
    expect(results[0]?.score).toBeCloseTo(1);
    expect(results[1]?.score).toBeCloseTo(0.6);
  });

  it('breaks score ties by insertion order', async () => {
    await index.upsert('d', vec(1, 0), { source: 'd.md' });
    const results = await index.search(vec(1, 0), 4);
    expect(results.map((r) => r.id)).toEqual(['a', 'd', 'b', 'c']);
  });

  it('keeps the original insertion position when an id is overwritten', async () => {
    await index.upsert('d', vec(0, 1), { source: 'd.md' });
    await index.upsert('c', vec(0, 1), { source: 'c2.md' });
    const results = await index.search(vec(0, 1), 2);
    expect(results.map((r) => r.id)).toEqual(['c', 'd']);
    expect(results[0]?.metadata).toEqual({ source: 'c2.md' });
    expect(index.size).toBe(4);
  });

  it('applies equality and predicate filters', async () => {
    const byMap = await index.search(vec(1, 0), 5, { source: 'c.md' });
    expect(byMap.map((r) => r.id)).toEqual(['c']);

    const byFn = await index.search(vec(1, 0), 5, (m) => m['source'] !== 'a.md');
    expect(byFn.map((r) => r.id)).toEqual(['b', 'c']);
  });

  it('returns an empty list for an empty index or non-positive topK', async () => {
    expect(await new MemoryVectorIndex().search(vec(1, 0), 3)).toEqual([]);
    expect(await index.search(vec(1, 0), 0)).toEqual([]);
  });

  it('rejects vectors of another dimension', async () => {
    await expect(index.upsert('x', vec(1, 2, 3), {})).rejects.toBeInstanceOf(DimensionMismatchError);
    await expect(index.search(vec(1), 1)).rejects.toThrow('Vector dimension mismatch: expected 2, got 1');
  });

  it('removes entries and reports whether they existed', async () => {
    expect(await index.remove('b')).toBe(true);
    expect(await index.remove('b')).toBe(false);
    expect(index.has('b')).toBe(false);
    expect(index.entries().map((e) => e.id)).toEqual(['a', 'c']);
  });

  it('stores a copy of the vector', async () => {
    const v = vec(1, 0);
    await index.upsert('e', v, {});
    v[0] = 0;
    expect(Array.from(index.entries()[3]?.vector ?? [])).toEqual([1, 0]);
  });

  it('keeps one entry per id under concurrent upserts', async () => {
    await Promise.all([
      index.upsert('z', vec(1, 0), { n: '1' }),
      index.upsert('z', vec(0, 1), { n: '2' }),
      index.upsert('z', vec(1, 1), { n: '3' }),
    ]);
    const z = index.entries().filter((e) => e.id === 'z');
    expect(z).toHaveLength(1);
    expect(z[0]?.metadata).toEqual({ n: '3' });
  });

  it('resets dimensions on clear', async () => {
    await index.clear();
    expect(index.size).toBe(0);
    expect(index.dimensions).toBe(0);
    await index.upsert('x', vec(1, 2, 3), {});
    expect(index.dimensions).toBe(3);
  });
});

describe('toPredicate', () => {
  it('treats an empty map as no filter', () => {
    expect(toPredicate(undefined)).toBeUndefined();
    expect(toPredicate({})).toBeUndefined();
  });

  it('requires every key to match', () => {
    const accept = toPredicate({ language: 'python', source: 'a.py' });
    expect(accept?.({ language: 'python', source: 'a.py', symbol: 'f' })).toBe(true);
    expect(accept?.({ language: 'python', source: 'b.py' })).toBe(false);
  });
});
