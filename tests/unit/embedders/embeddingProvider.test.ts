import { describe, it, expect } from 'vitest';
import { HashingEmbedder } from '../../../src/embedders/embeddingProvider.js';

function norm(v: Float32Array): number {
  let sum = 0;
  for (const x of v) sum += x * x;
  return Math.sqrt(sum);
}

describe('HashingEmbedder', () => {
  it('carries its dimensions in the signature', () => {
    const embedder = new HashingEmbedder(64);
    expect(embedder.dimensions).toBe(64);
    expect(embedder.signature).toBe('hashing:64');
  });

  it('is deterministic for identical text', async () => {
    const embedder = new HashingEmbedder(64);
    const a = await embedder.embed('parse the config file');
    const b = await embedder.embed('parse the config file');
    expect(Array.from(a)).toEqual(Array.from(b));
  });

  it('returns unit-length vectors of the configured size', async () => {
    const vector = await new HashingEmbedder(128).embed('retry with exponential backoff');
    expect(vector).toHaveLength(128);
    expect(norm(vector)).toBeCloseTo(1, 5);
  });

  it('returns the zero vector for text without tokens', async () => {
    const vector = await new HashingEmbedder(16).embed('  ...  ');
    expect(Array.from(vector)).toEqual(new Array<number>(16).fill(0));
  });

  it('is always available', async () => {
    await expect(new HashingEmbedder().isAvailable()).resolves.toBe(true);
  });
});
