export class SifterError extends Error {
  /** Fatal errors end the analysis run instead of a single tool call. */
  readonly fatal: boolean = false;

  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RetryExhaustedError extends SifterError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(message, 'RETRY_EXHAUSTED', cause);
  }
}

export function isFatal(err: unknown): boolean {
  return err instanceof SifterError && err.fatal;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
