import type { RetrievalStrategy } from './unit.types.js';
import type { TaskKind } from './analysis.types.js';

export interface OllamaConfig {
  type: 'ollama';
  baseUrl: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export interface OpenAICompatibleConfig {
  type: 'openai-compatible';
  baseUrl: string;
  apiKey?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

/** `none` selects the offline extractive analyzer. */
export interface NoBackendConfig {
  type: 'none';
}

export type BackendConfig = OllamaConfig | OpenAICompatibleConfig | NoBackendConfig;

export interface ChunkerConfig {
  strategy: 'structural' | 'text';
  maxUnitChars: number;
  overlapChars: number;
  hardMaxChars: number;
}

export interface EmbedderConfig {
  type: 'hashing' | 'ollama';
  dimensions: number;
  baseUrl?: string;
  model?: string;
}

export interface IndexConfig {
  persistPath?: string;
  concurrency: number;
}

export interface RetrievalConfig {
  topK: number;
  strategies: RetrievalStrategy[];
  retryAttempts: number;
  retryBaseDelayMs: number;
}

export interface LoopConfig {
  taskKind: TaskKind;
  maxTasks: number;
  maxIterations: number;
  maxDurationMs: number;
  concurrency: number;
  maxConsecutiveFailures: number;
  followUpsPerFinding: number;
  maxDepth: number;
  stopOnConfidence: 'medium' | 'high' | null;
  /** Findings kept per run before the run fails with `memory_exhausted`; unbounded when unset. */
  memoryCapacity?: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  chunker: ChunkerConfig;
  embedder: EmbedderConfig;
  index: IndexConfig;
  retrieval: RetrievalConfig;
  backend: BackendConfig;
  loop: LoopConfig;
  logLevel: LogLevel;
}
