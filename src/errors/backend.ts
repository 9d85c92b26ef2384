import { SifterError } from './base.js';

export class BackendError extends SifterError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, 'BACKEND_ERROR', cause);
  }
}
