// Public API: explicit named exports only (no re-export *)

export type { AnalysisEngine } from './engine/analysisEngine.js';
export type { EngineOverrides } from './engine/index.js';
export type { Corpus, SkipHandler } from './corpus/corpus.js';
export type { Chunker } from './indexing/chunker.js';
export type { EmbeddingProvider } from './embedders/embeddingProvider.js';
export type { VectorIndex, VectorSearchResult } from './index/vectorIndex.js';
export type { InferenceBackend } from './backends/inferenceBackend.js';
export type { ReasoningAnalyzer } from './reasoning/analyzer.js';
export type { TaskProposer, TaskProposal } from './planner/taskProposer.js';
export type { GoalPolicy } from './planner/goalPolicy.js';
export type { ToolResult, ToolHandler } from './tools/toolRegistry.js';
export type { LoopEvent, RunOptions } from './loop/executionLoop.js';
export type { Logger } from './logging/logger.js';
export type {
  Unit,
  UnitMetadata,
  CorpusDocument,
  MetadataFilter,
  Query,
  RetrievedUnit,
  IndexReport,
} from './types/unit.types.js';
export type {
  Finding,
  Task,
  Confidence,
  PlannerState,
  StopReason,
  RunResult,
  Observation,
} from './types/analysis.types.js';
export type { AppConfig } from './types/config.types.js';
export type { InferenceResponse, InferenceRequest, ChatMessage } from './types/inference.types.js';

export { createAnalysisEngine, LocalAnalysisEngine } from './engine/index.js';
export { InMemoryCorpus } from './corpus/corpus.js';
export { DirectoryCorpus } from './corpus/directoryCorpus.js';
export { StructuralChunker, TextChunker, createChunker } from './indexing/chunker.js';
export { CorpusIndexer } from './indexing/indexer.js';
export { HashingEmbedder } from './embedders/embeddingProvider.js';
export { OllamaEmbedder } from './embedders/ollamaEmbedder.js';
export { MemoryVectorIndex } from './index/memoryVectorIndex.js';
export { UnitStore } from './index/unitStore.js';
export { IndexSnapshotStore } from './index/indexSnapshot.js';
export { KeywordIndex } from './retrieval/keywordIndex.js';
export { Retriever } from './retrieval/retriever.js';
export { AnalysisMemory } from './memory/analysisMemory.js';
export { intentFingerprint } from './memory/fingerprint.js';
export { Planner } from './planner/planner.js';
export { TaskTree } from './planner/taskTree.js';
export { GoalDecomposer } from './planner/taskProposer.js';
export { neverSatisfied, confidentFinding, minFindings, anyPolicy } from './planner/goalPolicy.js';
export { ToolRegistry } from './tools/toolRegistry.js';
export { registerBuiltinTools } from './tools/builtinTools.js';
export { BackendAnalyzer, ExtractiveAnalyzer } from './reasoning/analyzer.js';
export { formatContext } from './reasoning/contextFormatter.js';
export { ExecutionLoop } from './loop/executionLoop.js';
export { createBackend } from './backends/backendFactory.js';
export { loadConfig } from './config/loader.js';
export { validateConfig, ConfigValidationError } from './config/validator.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export { createLogger } from './logging/logger.js';
export { SifterError } from './errors/base.js';
export { ChunkingError, EmbeddingError, DimensionMismatchError, IndexingFailedError } from './errors/indexing.js';
export { RetrievalFailedError, ReasoningFailedError, InvalidQueryError } from './errors/retrieval.js';
export { ToolError, UnknownToolError, InvalidArgumentsError } from './errors/tool.js';
export { PlannerStateError, MemoryExhaustedError, RunFailedError } from './errors/run.js';
export { BackendError } from './errors/backend.js';
