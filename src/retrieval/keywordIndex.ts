import { create, insert, search, remove } from '@orama/orama';
import type { Orama } from '@orama/orama';
import type { Unit } from '../types/unit.types.js';
import { extractCodeTokens, normalizeQuery } from '../indexing/tokenizer.js';

const SCHEMA = {
  id: 'string',
  text: 'string',
  source: 'string',
  symbol: 'string',
} as const;

export interface KeywordHit {
  id: string;
  score: number;
}

/** BM25 full-text index over unit text, symbol and source path. */
export class KeywordIndex {
  private db: Orama<typeof SCHEMA>;
  private readonly ids = new Set<string>();

  constructor() {
    this.db = create({ schema: SCHEMA });
  }

  async add(unit: Unit): Promise<void> {
    if (this.ids.has(unit.id)) {
      await remove(this.db, unit.id);
    }
    const codeTokens = extractCodeTokens(unit.text);
    await insert(this.db, {
      id: unit.id,
      text: codeTokens ? `${unit.text}\n${codeTokens}` : unit.text,
      source: unit.metadata['source'] ?? '',
      symbol: unit.metadata['symbol'] ?? '',
    });
    this.ids.add(unit.id);
  }

  async remove(id: string): Promise<void> {
    if (!this.ids.has(id)) return;
    await remove(this.db, id);
    this.ids.delete(id);
  }

  async search(query: string, topK = 10): Promise<KeywordHit[]> {
    const term = normalizeQuery(query);
    if (!term || topK <= 0 || this.ids.size === 0) return [];

    const results = await search(this.db, {
      term,
      properties: ['text', 'symbol', 'source'],
      limit: topK,
      threshold: 1,
    });
    return results.hits.map((hit) => ({ id: hit.id, score: hit.score }));
  }

  clear(): void {
    this.db = create({ schema: SCHEMA });
    this.ids.clear();
  }

  get size(): number {
    return this.ids.size;
  }
}
