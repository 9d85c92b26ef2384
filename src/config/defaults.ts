import type { AppConfig } from '../types/config.types.js';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

export const DEFAULT_CONFIG: AppConfig = {
  chunker: {
    strategy: 'structural',
    maxUnitChars: 1500,
    overlapChars: 200,
    hardMaxChars: 4000,
  },
  embedder: {
    type: 'hashing',
    dimensions: 256,
  },
  index: {
    concurrency: 8,
  },
  retrieval: {
    topK: 5,
    strategies: ['vector', 'keyword'],
    retryAttempts: 3,
    retryBaseDelayMs: 200,
  },
  backend: {
    type: 'none',
  },
  loop: {
    taskKind: 'analyze',
    maxTasks: 8,
    maxIterations: 16,
    maxDurationMs: 120_000,
    concurrency: 2,
    maxConsecutiveFailures: 3,
    followUpsPerFinding: 1,
    maxDepth: 1,
    stopOnConfidence: 'high',
  },
  logLevel: 'info',
};
