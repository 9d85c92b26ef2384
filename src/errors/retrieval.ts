import { SifterError } from './base.js';

export class InvalidQueryError extends SifterError {
  constructor(message: string) {
    super(message, 'INVALID_QUERY');
  }
}

/** Embedding the query kept failing; distinct from a search with no matches. */
export class RetrievalFailedError extends SifterError {
  override readonly fatal = true;

  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(message, 'RETRIEVAL_FAILED', cause);
  }
}

export class ReasoningFailedError extends SifterError {
  override readonly fatal = true;

  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(message, 'REASONING_FAILED', cause);
  }
}
