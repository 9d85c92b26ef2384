import type { Corpus } from '../corpus/corpus.js';
import type { Chunker } from './chunker.js';
import { chunkCorpus } from './chunker.js';
import type { EmbeddingProvider } from '../embedders/embeddingProvider.js';
import type { VectorIndex } from '../index/vectorIndex.js';
import type { UnitStore } from '../index/unitStore.js';
import type { KeywordIndex } from '../retrieval/keywordIndex.js';
import type { IndexReport, Unit } from '../types/unit.types.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { buildContextualContent } from './tokenizer.js';
import { Semaphore } from '../util/semaphore.js';
import { withRetry, type RetryOptions } from '../util/retry.js';
import { RetryExhaustedError, SifterError, errorMessage } from '../errors/base.js';
import { IndexingFailedError } from '../errors/indexing.js';

/** Max embedding calls in flight at once. */
const DEFAULT_CONCURRENCY = 8;

export interface IndexerDeps {
  chunker: Chunker;
  embedder: EmbeddingProvider;
  vectorIndex: VectorIndex;
  units: UnitStore;
  keywordIndex?: KeywordIndex;
  concurrency?: number;
  retry?: Omit<RetryOptions, 'shouldRetry'>;
  logger?: Logger;
}

export interface IndexRunOptions {
  /**
   * Treat the corpus as the complete snapshot: units of sources absent from
   * it are removed. Units of re-read sources are always replaced.
   */
  prune?: boolean;
  signal?: AbortSignal;
}

/**
 * Corpus → Chunker → Embedder → VectorIndex.
 *
 * Phase 1: Chunk the corpus lazily; units already indexed under the same id
 *           are reused without embedding again.
 * Phase 2: Embed new units with bounded concurrency and retry.
 * Phase 3: Store units and upsert vectors sequentially in chunk order, so
 *           insertion order (and therefore tie-breaking) is reproducible.
 * Phase 4: Drop stale units.
 *
 * Truncated units are stored and keyword-indexed but never embedded.
 */
export class CorpusIndexer {
  private readonly logger: Logger;
  private readonly retry: Omit<RetryOptions, 'shouldRetry'>;

  constructor(private readonly deps: IndexerDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.retry = deps.retry ?? { attempts: 3 };
  }

  async index(corpus: Corpus, options: IndexRunOptions = {}): Promise<IndexReport> {
    const { units, vectorIndex, keywordIndex } = this.deps;
    const report: IndexReport = {
      documents: 0,
      units: 0,
      embedded: 0,
      reused: 0,
      truncated: 0,
      removed: 0,
      skipped: 0,
    };

    const sources = new Set<string>();
    const seenIds = new Set<string>();
    const ordered: Unit[] = [];
    const toEmbed: Unit[] = [];

    const onSkip = (err: SifterError): void => {
      report.skipped++;
      this.logger.warn(`skipped ${err.message}`);
    };

    // Phase 1
    for await (const unit of chunkCorpus(corpus, this.deps.chunker, onSkip)) {
      options.signal?.throwIfAborted();
      const source = unit.metadata['source'] ?? '';
      if (!sources.has(source)) {
        sources.add(source);
        report.documents++;
      }
      seenIds.add(unit.id);
      ordered.push(unit);

      if (unit.metadata['truncated'] === 'true') {
        report.truncated++;
      } else if (!vectorIndex.has(unit.id)) {
        toEmbed.push(unit);
      }
    }
    report.units = ordered.length;

    // Phase 2
    const vectors = await this.embedAll(toEmbed, options.signal);
    report.embedded = vectors.size;

    // Phase 3
    for (const unit of ordered) {
      const fresh = vectors.get(unit.id);
      const previous = units.get(unit.id);
      const vector = fresh ?? previous?.vector;
      const stored: Unit = { ...unit, ...(vector !== undefined && { vector }) };

      units.put(stored);
      if (vector !== undefined) {
        if (!fresh) report.reused++;
        await vectorIndex.upsert(unit.id, vector, unit.metadata);
      }
      await keywordIndex?.add(stored);
    }

    // Phase 4
    for (const id of units.ids()) {
      if (seenIds.has(id)) continue;
      const source = units.get(id)?.metadata['source'] ?? '';
      if (options.prune === false && !sources.has(source)) continue;
      await this.removeUnit(id);
      report.removed++;
    }

    this.logger.info(
      `indexed ${report.documents} documents: ${report.units} units ` +
        `(${report.embedded} embedded, ${report.reused} reused, ${report.truncated} truncated, ` +
        `${report.removed} removed, ${report.skipped} skipped)`,
    );
    return report;
  }

  /** Remove every unit that came from `source`. Returns the number removed. */
  async removeSource(source: string): Promise<number> {
    let removed = 0;
    for (const id of this.deps.units.ids()) {
      if (this.deps.units.get(id)?.metadata['source'] === source) {
        await this.removeUnit(id);
        removed++;
      }
    }
    return removed;
  }

  private async removeUnit(id: string): Promise<void> {
    this.deps.units.delete(id);
    await this.deps.vectorIndex.remove(id);
    await this.deps.keywordIndex?.remove(id);
  }

  private async embedAll(units: Unit[], signal?: AbortSignal): Promise<Map<string, Float32Array>> {
    const sem = new Semaphore(this.deps.concurrency ?? DEFAULT_CONCURRENCY);
    const settled = await Promise.allSettled(
      units.map((unit) =>
        sem.run(async () => {
          signal?.throwIfAborted();
          return [unit.id, await this.embedUnit(unit)] as const;
        }),
      ),
    );

    const vectors = new Map<string, Float32Array>();
    for (const outcome of settled) {
      if (outcome.status === 'rejected') throw outcome.reason;
      vectors.set(outcome.value[0], outcome.value[1]);
    }
    return vectors;
  }

  private async embedUnit(unit: Unit): Promise<Float32Array> {
    try {
      return await withRetry(() => this.deps.embedder.embed(buildContextualContent(unit)), {
        ...this.retry,
        onRetry: (err, attempt, delayMs) => {
          this.logger.warn(
            `embedding ${unit.id} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${errorMessage(err)}`,
          );
        },
      });
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new IndexingFailedError(
          `Indexing failed: could not embed ${unit.metadata['source'] ?? unit.id} after ${err.attempts} attempts`,
          unit.id,
          err.cause,
        );
      }
      throw err;
    }
  }
}
