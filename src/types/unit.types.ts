export type UnitMetadata = Record<string, string>;

/** A retrievable span of the corpus with a content- and location-derived id. */
export interface Unit {
  readonly id: string;
  readonly text: string;
  readonly metadata: Readonly<UnitMetadata>;
  readonly vector?: Float32Array;
}

export interface CorpusDocument {
  path: string;
  contents: string;
  language: string;
}

/** Equality map over metadata keys, or an arbitrary predicate. */
export type MetadataFilter =
  | Readonly<UnitMetadata>
  | ((metadata: Readonly<UnitMetadata>) => boolean);

export interface Query {
  text: string;
  topK: number;
  filters?: MetadataFilter;
}

export type RetrievalStrategy = 'vector' | 'keyword';

export interface RetrievedUnit {
  unit: Unit;
  /** Ranking score: cosine similarity, or fused rank score with several strategies. */
  score: number;
  /** Cosine similarity to the query (0 when only the keyword strategy matched). */
  similarity: number;
  strategies: RetrievalStrategy[];
}

export interface IndexReport {
  documents: number;
  units: number;
  embedded: number;
  reused: number;
  truncated: number;
  removed: number;
  skipped: number;
}
