import type { AppConfig, BackendConfig } from '../types/config.types.js';
import { SifterError } from '../errors/base.js';

export class ConfigValidationError extends SifterError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_INVALID', cause);
  }
}

function validateBackend(backend: BackendConfig): void {
  if (backend.type === 'openai-compatible') {
    if (!backend.baseUrl || backend.baseUrl.trim() === '') {
      throw new ConfigValidationError(
        'Backend type "openai-compatible" requires baseUrl. Set OPENAI_BASE_URL env var or provide in config.',
      );
    }
    if (!backend.model || backend.model.trim() === '') {
      throw new ConfigValidationError('Backend type "openai-compatible" requires model.');
    }
  }
  if (backend.type === 'ollama') {
    if (!backend.baseUrl || backend.baseUrl.trim() === '') {
      throw new ConfigValidationError('Backend type "ollama" requires baseUrl.');
    }
    if (!backend.model || backend.model.trim() === '') {
      throw new ConfigValidationError('Backend type "ollama" requires model.');
    }
  }
}

function requireAtLeast(name: string, value: number, min: number): void {
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigValidationError(`${name} must be >= ${min}, got ${value}.`);
  }
}

export function validateConfig(config: AppConfig): void {
  validateBackend(config.backend);

  const { chunker, embedder, index, retrieval, loop } = config;
  requireAtLeast('chunker.maxUnitChars', chunker.maxUnitChars, 1);
  requireAtLeast('chunker.overlapChars', chunker.overlapChars, 0);
  if (chunker.overlapChars >= chunker.maxUnitChars) {
    throw new ConfigValidationError('chunker.overlapChars must be smaller than chunker.maxUnitChars.');
  }
  if (chunker.hardMaxChars < chunker.maxUnitChars) {
    throw new ConfigValidationError('chunker.hardMaxChars must be >= chunker.maxUnitChars.');
  }

  requireAtLeast('embedder.dimensions', embedder.dimensions, 1);
  requireAtLeast('index.concurrency', index.concurrency, 1);
  requireAtLeast('retrieval.topK', retrieval.topK, 1);
  requireAtLeast('retrieval.retryAttempts', retrieval.retryAttempts, 1);
  if (retrieval.strategies.length === 0) {
    throw new ConfigValidationError('retrieval.strategies must name at least one strategy.');
  }

  requireAtLeast('loop.maxTasks', loop.maxTasks, 1);
  requireAtLeast('loop.maxIterations', loop.maxIterations, 1);
  requireAtLeast('loop.maxDurationMs', loop.maxDurationMs, 1);
  requireAtLeast('loop.concurrency', loop.concurrency, 1);
  requireAtLeast('loop.maxConsecutiveFailures', loop.maxConsecutiveFailures, 0);
  if (loop.memoryCapacity !== undefined) {
    requireAtLeast('loop.memoryCapacity', loop.memoryCapacity, 1);
  }
}
