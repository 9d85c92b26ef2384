import { describe, it, expect } from 'vitest';
import { InMemoryCorpus } from '../../../src/corpus/corpus.js';
import type { CorpusDocument } from '../../../src/types/unit.types.js';

async function paths(corpus: InMemoryCorpus): Promise<string[]> {
  const out: string[] = [];
  for await (const doc of corpus.documents()) out.push(doc.path);
  return out;
}

describe('InMemoryCorpus', () => {
  it('yields documents in path order', async () => {
    const corpus = new InMemoryCorpus([
      { path: 'b.md', contents: 'B', language: 'markdown' },
      { path: 'a.md', contents: 'A', language: 'markdown' },
    ]);
    expect(await paths(corpus)).toEqual(['a.md', 'b.md']);
  });

  it('is unaffected by later changes to the input', async () => {
    const docs: CorpusDocument[] = [{ path: 'a.md', contents: 'A', language: 'markdown' }];
    const corpus = new InMemoryCorpus(docs);
    docs.push({ path: 'z.md', contents: 'Z', language: 'markdown' });
    expect(await paths(corpus)).toEqual(['a.md']);
  });
});
