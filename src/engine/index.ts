import type { AppConfig } from '../types/config.types.js';
import type { EmbeddingProvider } from '../embedders/embeddingProvider.js';
import { HashingEmbedder } from '../embedders/embeddingProvider.js';
import { OllamaEmbedder } from '../embedders/ollamaEmbedder.js';
import type { InferenceBackend } from '../backends/inferenceBackend.js';
import { createBackend } from '../backends/backendFactory.js';
import { BackendAnalyzer, ExtractiveAnalyzer, type ReasoningAnalyzer } from '../reasoning/analyzer.js';
import { createChunker } from '../indexing/chunker.js';
import { CorpusIndexer } from '../indexing/indexer.js';
import { MemoryVectorIndex } from '../index/memoryVectorIndex.js';
import { UnitStore } from '../index/unitStore.js';
import { IndexSnapshotStore } from '../index/indexSnapshot.js';
import { KeywordIndex } from '../retrieval/keywordIndex.js';
import { Retriever } from '../retrieval/retriever.js';
import { ToolRegistry } from '../tools/toolRegistry.js';
import { registerBuiltinTools } from '../tools/builtinTools.js';
import { GoalDecomposer } from '../planner/taskProposer.js';
import { confidentFinding, neverSatisfied, type GoalPolicy } from '../planner/goalPolicy.js';
import { ExecutionLoop, type LoopEvent } from '../loop/executionLoop.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import { DEFAULT_OLLAMA_URL } from '../config/defaults.js';
import type { RetryOptions } from '../util/retry.js';
import type { AnalysisEngine } from './analysisEngine.js';
import { LocalAnalysisEngine } from './analysisEngine.js';

export type { AnalysisEngine } from './analysisEngine.js';
export { LocalAnalysisEngine } from './analysisEngine.js';

/** Collaborators that replace the ones the config would build. */
export interface EngineOverrides {
  embedder?: EmbeddingProvider;
  backend?: InferenceBackend;
  analyzer?: ReasoningAnalyzer;
  policy?: GoalPolicy;
  logger?: Logger;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
  onEvent?: (event: LoopEvent) => void;
}

function createEmbedder(config: AppConfig['embedder']): EmbeddingProvider {
  if (config.type === 'ollama') {
    return new OllamaEmbedder(
      config.baseUrl ?? DEFAULT_OLLAMA_URL,
      config.model ?? 'nomic-embed-text',
      config.dimensions,
    );
  }
  return new HashingEmbedder(config.dimensions);
}

/**
 * Wires the whole pipeline from config: in-memory vector and keyword indexes,
 * optionally restored from the JSON snapshot at `index.persistPath`.
 */
export async function createAnalysisEngine(
  config: AppConfig,
  overrides: EngineOverrides = {},
): Promise<AnalysisEngine> {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const retry: Omit<RetryOptions, 'shouldRetry'> = {
    attempts: config.retrieval.retryAttempts,
    baseDelayMs: config.retrieval.retryBaseDelayMs,
    ...(overrides.sleep !== undefined && { sleep: overrides.sleep }),
  };

  const embedder = overrides.embedder ?? createEmbedder(config.embedder);
  const vectorIndex = new MemoryVectorIndex();
  const units = new UnitStore();
  const keywordIndex = config.retrieval.strategies.includes('keyword') ? new KeywordIndex() : undefined;

  const indexer = new CorpusIndexer({
    chunker: createChunker(config.chunker),
    embedder,
    vectorIndex,
    units,
    concurrency: config.index.concurrency,
    retry,
    logger: logger.child('index'),
    ...(keywordIndex !== undefined && { keywordIndex }),
  });

  const retriever = new Retriever({
    embedder,
    vectorIndex,
    units,
    strategies: config.retrieval.strategies,
    retry,
    logger: logger.child('retrieve'),
    ...(keywordIndex !== undefined && { keywordIndex }),
  });

  const backend = overrides.backend ?? createBackend(config.backend);
  const analyzer =
    overrides.analyzer ??
    (backend
      ? new BackendAnalyzer(backend, { retry, logger: logger.child('reason') })
      : new ExtractiveAnalyzer());

  const registry = new ToolRegistry();
  const { loop: loopConfig } = config;
  const policy =
    overrides.policy ??
    (loopConfig.stopOnConfidence ? confidentFinding(loopConfig.stopOnConfidence) : neverSatisfied);

  const loop = new ExecutionLoop({
    registry,
    proposer: new GoalDecomposer({
      kind: loopConfig.taskKind,
      followUpsPerFinding: loopConfig.followUpsPerFinding,
      maxDepth: loopConfig.maxDepth,
      lookup: (id) => units.get(id),
    }),
    policy,
    limits: { ...loopConfig, topK: config.retrieval.topK },
    logger: logger.child('loop'),
    ...(overrides.clock !== undefined && { clock: overrides.clock }),
    ...(overrides.onEvent !== undefined && { onEvent: overrides.onEvent }),
  });

  const persistPath = config.index.persistPath;
  const engine = new LocalAnalysisEngine({
    embedder,
    vectorIndex,
    units,
    indexer,
    retriever,
    registry,
    loop,
    logger,
    ...(keywordIndex !== undefined && { keywordIndex }),
    ...(persistPath !== undefined && {
      snapshots: new IndexSnapshotStore(persistPath, logger.child('snapshot')),
    }),
  });

  registerBuiltinTools(registry, {
    retriever,
    analyzer,
    defaultTopK: config.retrieval.topK,
    indexDirectory: (directory, options) => engine.indexDirectory(directory, options),
  });

  await engine.restore();
  return engine;
}
