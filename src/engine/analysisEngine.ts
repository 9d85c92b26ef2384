import { resolve } from 'node:path';
import type { Corpus } from '../corpus/corpus.js';
import { DirectoryCorpus } from '../corpus/directoryCorpus.js';
import type { CorpusIndexer, IndexRunOptions } from '../indexing/indexer.js';
import type { EmbeddingProvider } from '../embedders/embeddingProvider.js';
import type { VectorIndex } from '../index/vectorIndex.js';
import type { UnitStore } from '../index/unitStore.js';
import type { IndexSnapshotStore } from '../index/indexSnapshot.js';
import type { KeywordIndex } from '../retrieval/keywordIndex.js';
import type { Retriever, RetrieveOptions } from '../retrieval/retriever.js';
import type { ToolRegistry } from '../tools/toolRegistry.js';
import type { ExecutionLoop, RunOptions } from '../loop/executionLoop.js';
import type { RunResult } from '../types/analysis.types.js';
import type { IndexReport, RetrievedUnit } from '../types/unit.types.js';
import type { Logger } from '../logging/logger.js';

/**
 * AnalysisEngine: indexing, retrieval and iterative analysis behind one
 * handle. Front ends (CLI, scripts) only talk to this interface.
 */
export interface AnalysisEngine {
  /** Index every text file under `directory`; by default units of vanished files are dropped. */
  indexDirectory(directory: string, options?: IndexRunOptions): Promise<IndexReport>;

  indexCorpus(corpus: Corpus, options?: IndexRunOptions): Promise<IndexReport>;

  search(query: string, options?: RetrieveOptions): Promise<RetrievedUnit[]>;

  /** Run the plan/act/observe loop for one goal. Never rejects on collaborator failure. */
  analyze(goal: string, options?: RunOptions): Promise<RunResult>;

  readonly tools: ToolRegistry;

  clearIndex(): Promise<void>;

  /** Write the index snapshot, when a persist path is configured. */
  dispose(): Promise<void>;
}

export interface EngineComponents {
  embedder: EmbeddingProvider;
  vectorIndex: VectorIndex;
  units: UnitStore;
  keywordIndex?: KeywordIndex;
  indexer: CorpusIndexer;
  retriever: Retriever;
  registry: ToolRegistry;
  loop: ExecutionLoop;
  snapshots?: IndexSnapshotStore;
  logger: Logger;
}

export class LocalAnalysisEngine implements AnalysisEngine {
  private dirty = false;

  constructor(private readonly c: EngineComponents) {}

  get tools(): ToolRegistry {
    return this.c.registry;
  }

  async indexDirectory(directory: string, options: IndexRunOptions = {}): Promise<IndexReport> {
    const root = resolve(directory);
    this.c.logger.info(`indexing ${root}`);
    return this.indexCorpus(new DirectoryCorpus(root), { prune: true, ...options });
  }

  async indexCorpus(corpus: Corpus, options: IndexRunOptions = {}): Promise<IndexReport> {
    const report = await this.c.indexer.index(corpus, options);
    this.dirty = true;
    await this.persist();
    return report;
  }

  search(query: string, options?: RetrieveOptions): Promise<RetrievedUnit[]> {
    return this.c.retriever.search(query, options);
  }

  analyze(goal: string, options?: RunOptions): Promise<RunResult> {
    return this.c.loop.run(goal, options);
  }

  async clearIndex(): Promise<void> {
    this.c.units.clear();
    await this.c.vectorIndex.clear();
    this.c.keywordIndex?.clear();
    this.dirty = true;
  }

  async dispose(): Promise<void> {
    await this.persist();
  }

  /** Load a snapshot into the empty stores. Returns the number of units restored. */
  async restore(): Promise<number> {
    const { snapshots, embedder, units, vectorIndex, keywordIndex, logger } = this.c;
    if (!snapshots) return 0;
    const snapshot = await snapshots.load({ embedder: embedder.signature, dimensions: embedder.dimensions });
    if (!snapshot) return 0;

    for (const unit of snapshot.units) {
      units.put(unit);
      if (unit.vector !== undefined) {
        await vectorIndex.upsert(unit.id, unit.vector, unit.metadata);
      }
      await keywordIndex?.add(unit);
    }
    logger.info(`restored ${snapshot.units.length} units from ${snapshots.path}`);
    return snapshot.units.length;
  }

  private async persist(): Promise<void> {
    const { snapshots, embedder, units } = this.c;
    if (!snapshots || !this.dirty) return;
    await snapshots.save({
      embedder: embedder.signature,
      dimensions: embedder.dimensions,
      units: units.all(),
    });
    this.dirty = false;
  }
}
