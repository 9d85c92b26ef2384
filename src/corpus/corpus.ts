import type { CorpusDocument } from '../types/unit.types.js';
import type { ChunkingError } from '../errors/indexing.js';

export type SkipHandler = (error: ChunkingError) => void;

/**
 * A finite, point-in-time snapshot of documents. Iterating twice over an
 * unchanged snapshot yields the same documents in the same order.
 */
export interface Corpus {
  documents(onSkip?: SkipHandler): AsyncIterable<CorpusDocument>;
}

/** Corpus held in memory; documents are yielded in path order. */
export class InMemoryCorpus implements Corpus {
  private readonly docs: CorpusDocument[];

  constructor(docs: CorpusDocument[]) {
    this.docs = [...docs].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  async *documents(): AsyncIterable<CorpusDocument> {
    for (const doc of this.docs) {
      yield { ...doc };
    }
  }
}
