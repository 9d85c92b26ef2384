import { z } from 'zod';
import type { EmbeddingProvider } from './embeddingProvider.js';
import { BackendError } from '../errors/backend.js';
import { EmbeddingError, DimensionMismatchError } from '../errors/indexing.js';

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).optional(),
});

export class OllamaEmbedder implements EmbeddingProvider {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly model = 'nomic-embed-text',
    readonly dimensions = 768,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  get signature(): string {
    return `ollama:${this.model}:${this.dimensions}`;
  }

  async embed(text: string): Promise<Float32Array> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, input: text }),
      });
    } catch (err) {
      throw new BackendError('Failed to connect to Ollama for embeddings', undefined, err);
    }

    if (!response.ok) {
      throw new BackendError(
        `Ollama embed request failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }

    const parsed = embedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new EmbeddingError('Ollama returned a malformed embed response');
    }
    const embedding = parsed.data.embeddings?.[0];
    if (!embedding) {
      throw new EmbeddingError('Ollama returned empty embeddings array');
    }
    // A model that disagrees with the configured dimension is a configuration error
    if (embedding.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, embedding.length);
    }
    return new Float32Array(embedding);
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
