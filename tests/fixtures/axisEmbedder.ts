import type { EmbeddingProvider } from '../../src/embedders/embeddingProvider.js';
import { EmbeddingError } from '../../src/errors/indexing.js';
import { tokenize } from '../../src/indexing/tokenizer.js';

/**
 * Test embedder with one dimension per axis word: component i counts the
 * occurrences of axes[i] among the text's tokens. Can be told to fail.
 */
export class AxisEmbedder implements EmbeddingProvider {
  readonly dimensions: number;
  readonly signature: string;
  readonly calls: string[] = [];
  /** Number of upcoming calls that reject. */
  failuresLeft = 0;
  /** Reject every call whose text contains this token. */
  failOn: string | undefined;

  constructor(private readonly axes: string[]) {
    this.dimensions = axes.length;
    this.signature = `axis:${axes.join(',')}`;
  }

  async embed(text: string): Promise<Float32Array> {
    this.calls.push(text);
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new EmbeddingError('embedder unavailable');
    }
    const tokens = tokenize(text);
    if (this.failOn !== undefined && tokens.includes(this.failOn)) {
      throw new EmbeddingError(`cannot embed "${this.failOn}"`);
    }
    return new Float32Array(this.axes.map((axis) => tokens.filter((t) => t === axis).length));
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

export const noSleep = (): Promise<void> => Promise.resolve();
