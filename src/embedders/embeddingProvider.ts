import { tokenize } from '../indexing/tokenizer.js';
import { fnv1a } from '../util/hash.js';

export interface EmbeddingProvider {
  /** Must be deterministic for identical text under one model version. */
  embed(text: string): Promise<Float32Array>;
  readonly dimensions: number;
  /** Identifies model + dimensions; persisted indexes built under another signature are discarded. */
  readonly signature: string;
  isAvailable(): Promise<boolean>;
}

/**
 * Offline embedder: signed feature hashing of word tokens and token bigrams,
 * L2-normalised. No model download, fully deterministic.
 */
export class HashingEmbedder implements EmbeddingProvider {
  constructor(readonly dimensions = 256) {}

  get signature(): string {
    return `hashing:${this.dimensions}`;
  }

  embed(text: string): Promise<Float32Array> {
    const vector = new Float32Array(this.dimensions);
    const tokens = tokenize(text);
    const features = [...tokens];
    for (let i = 1; i < tokens.length; i++) {
      features.push(`${tokens[i - 1]} ${tokens[i]}`);
    }

    for (const feature of features) {
      const hash = fnv1a(feature);
      const slot = hash % this.dimensions;
      vector[slot] = (vector[slot] ?? 0) + ((hash >>> 31) === 1 ? -1 : 1);
    }

    let norm = 0;
    for (const v of vector) norm += v * v;
    norm = Math.sqrt(norm);
    if (norm > 0) {
      for (let i = 0; i < vector.length; i++) {
        vector[i] = (vector[i] ?? 0) / norm;
      }
    }
    return Promise.resolve(vector);
  }

  isAvailable(): Promise<boolean> {
    return Promise.resolve(true);
  }
}
