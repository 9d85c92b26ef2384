import { describe, it, expect, beforeEach } from 'vitest';
import { KeywordIndex } from '../../../src/retrieval/keywordIndex.js';

describe('KeywordIndex', () => {
  let index: KeywordIndex;

  beforeEach(async () => {
    index = new KeywordIndex();
    await index.add({
      id: 'k1',
      text: 'export function parseArgs(argv) {}',
      metadata: { source: 'src/cli.ts', symbol: 'parseArgs' },
    });
    await index.add({ id: 'k2', text: 'retry with backoff', metadata: { source: 'src/retry.ts' } });
  });

  it('finds camelCase identifiers from their split words', async () => {
    const hits = await index.search('parse args');
    expect(hits.map((h) => h.id)).toEqual(['k1']);
    expect(hits[0]?.score).toBeGreaterThan(0);
  });

  it('replaces a unit that is added again', async () => {
    await index.add({ id: 'k2', text: 'exponential delay', metadata: { source: 'src/retry.ts' } });
    expect(await index.search('backoff')).toEqual([]);
    expect((await index.search('exponential')).map((h) => h.id)).toEqual(['k2']);
    expect(index.size).toBe(2);
  });

  it('removes units', async () => {
    await index.remove('k1');
    await index.remove('missing');
    expect(index.size).toBe(1);
    expect(await index.search('parse')).toEqual([]);
  });

  it('returns nothing for a query without tokens or a non-positive limit', async () => {
    expect(await index.search('...')).toEqual([]);
    expect(await index.search('backoff', 0)).toEqual([]);
  });

  it('empties on clear', async () => {
    index.clear();
    expect(index.size).toBe(0);
    expect(await index.search('backoff')).toEqual([]);
  });
});
