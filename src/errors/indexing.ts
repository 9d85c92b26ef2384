import { SifterError } from './base.js';

/** A corpus file could not be turned into units. Reported and skipped. */
export class ChunkingError extends SifterError {
  constructor(
    message: string,
    public readonly source: string,
    cause?: unknown,
  ) {
    super(message, 'CHUNKING_ERROR', cause);
  }
}

export class EmbeddingError extends SifterError {
  constructor(message: string, cause?: unknown) {
    super(message, 'EMBEDDING_ERROR', cause);
  }
}

export class DimensionMismatchError extends SifterError {
  override readonly fatal = true;

  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}`, 'DIMENSION_MISMATCH');
  }
}

export class IndexingFailedError extends SifterError {
  override readonly fatal = true;

  constructor(
    message: string,
    public readonly unitId: string,
    cause?: unknown,
  ) {
    super(message, 'INDEXING_FAILED', cause);
  }
}
