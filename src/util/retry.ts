import { RetryExhaustedError, isFatal, errorMessage } from '../errors/base.js';

export interface RetryOptions {
  /** Total attempts, including the first call. */
  attempts: number;
  baseDelayMs?: number;
  factor?: number;
  maxDelayMs?: number;
  /** Return false to stop retrying and rethrow the error unchanged. */
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_BASE_DELAY_MS = 200;
const DEFAULT_FACTOR = 2;
const DEFAULT_MAX_DELAY_MS = 5000;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Delay before retry number `attempt` (1-based): base * factor^(attempt-1), capped. */
export function backoffDelay(attempt: number, options: RetryOptions): number {
  const base = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const factor = options.factor ?? DEFAULT_FACTOR;
  const cap = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  return Math.min(cap, Math.floor(base * Math.pow(factor, attempt - 1)));
}

/**
 * Run `operation` until it succeeds or `attempts` calls have failed.
 * Fatal errors are never retried. Exhaustion throws RetryExhaustedError
 * carrying the last failure as `cause`.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const shouldRetry = options.shouldRetry ?? ((err: unknown) => !isFatal(err));
  const sleep = options.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation();
    } catch (err) {
      lastError = err;
      if (!shouldRetry(err)) throw err;
      if (attempt === attempts) break;
      const delay = backoffDelay(attempt, options);
      options.onRetry?.(err, attempt, delay);
      await sleep(delay);
    }
  }

  throw new RetryExhaustedError(
    `All ${attempts} attempts failed: ${errorMessage(lastError)}`,
    attempts,
    lastError,
  );
}
