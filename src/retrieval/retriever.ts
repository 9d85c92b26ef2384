import type { EmbeddingProvider } from '../embedders/embeddingProvider.js';
import type { VectorIndex } from '../index/vectorIndex.js';
import { toPredicate } from '../index/vectorIndex.js';
import type { UnitStore } from '../index/unitStore.js';
import type { KeywordIndex } from './keywordIndex.js';
import type {
  MetadataFilter,
  RetrievalStrategy,
  RetrievedUnit,
  Unit,
} from '../types/unit.types.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { withRetry, type RetryOptions } from '../util/retry.js';
import { RetryExhaustedError } from '../errors/base.js';
import { InvalidQueryError, RetrievalFailedError } from '../errors/retrieval.js';

/** Reciprocal Rank Fusion constant. */
const RRF_K = 60;

export interface RetrieverDeps {
  embedder: EmbeddingProvider;
  vectorIndex: VectorIndex;
  units: UnitStore;
  keywordIndex?: KeywordIndex;
  strategies?: RetrievalStrategy[];
  retry?: Omit<RetryOptions, 'shouldRetry'>;
  logger?: Logger;
}

export interface RetrieveOptions {
  topK?: number;
  filters?: MetadataFilter;
}

interface Candidate {
  id: string;
  score: number;
  similarity: number;
  strategies: RetrievalStrategy[];
  order: number;
}

export class Retriever {
  private readonly strategies: RetrievalStrategy[];
  private readonly retry: Omit<RetryOptions, 'shouldRetry'>;
  private readonly logger: Logger;

  constructor(private readonly deps: RetrieverDeps) {
    const requested = deps.strategies ?? ['vector'];
    this.strategies = requested.filter((s) => s === 'vector' || deps.keywordIndex !== undefined);
    this.retry = deps.retry ?? { attempts: 3 };
    this.logger = deps.logger ?? silentLogger;
  }

  /** Ranked, deduplicated units for a natural-language query. */
  async searchCodebase(query: string, topK: number, filters?: MetadataFilter): Promise<Unit[]> {
    const hits = await this.search(query, { topK, ...(filters !== undefined && { filters }) });
    return hits.map((hit) => hit.unit);
  }

  async search(query: string, options: RetrieveOptions = {}): Promise<RetrievedUnit[]> {
    const topK = options.topK ?? 5;
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new InvalidQueryError(`topK must be a positive integer, got ${topK}`);
    }
    if (query.trim() === '') {
      throw new InvalidQueryError('query must not be empty');
    }

    const accept = toPredicate(options.filters);
    const fused = this.strategies.length > 1;
    const candidateCount = fused ? topK * 2 : topK;
    const candidates = new Map<string, Candidate>();
    let order = 0;

    const addCandidate = (id: string, rank: number, similarity: number, strategy: RetrievalStrategy): void => {
      const contribution = fused ? 1 / (RRF_K + rank + 1) : similarity;
      const existing = candidates.get(id);
      if (existing) {
        existing.score += contribution;
        existing.similarity = Math.max(existing.similarity, similarity);
        existing.strategies.push(strategy);
        return;
      }
      candidates.set(id, { id, score: contribution, similarity, strategies: [strategy], order: order++ });
    };

    if (this.strategies.includes('vector') && this.deps.vectorIndex.size > 0) {
      const vector = await this.embedQuery(query);
      const hits = await this.deps.vectorIndex.search(vector, candidateCount, options.filters);
      hits.forEach((hit, rank) => addCandidate(hit.id, rank, hit.score, 'vector'));
    }

    const keywordIndex = this.deps.keywordIndex;
    if (this.strategies.includes('keyword') && keywordIndex) {
      // Filters apply after BM25, so over-fetch before dropping rejected units
      const hits = await keywordIndex.search(query, accept ? candidateCount * 4 : candidateCount);
      let rank = 0;
      for (const hit of hits) {
        const unit = this.deps.units.get(hit.id);
        if (!unit || (accept && !accept(unit.metadata))) continue;
        addCandidate(hit.id, rank++, 0, 'keyword');
      }
    }

    const ranked = [...candidates.values()].sort((a, b) => b.score - a.score || a.order - b.order);
    const results: RetrievedUnit[] = [];
    for (const candidate of ranked) {
      if (results.length >= topK) break;
      const unit = this.deps.units.get(candidate.id);
      if (!unit) {
        this.logger.debug(`index entry ${candidate.id} has no stored unit; skipping`);
        continue;
      }
      results.push({
        unit,
        score: candidate.score,
        similarity: candidate.similarity,
        strategies: candidate.strategies,
      });
    }
    return results;
  }

  /** Stored units in the order given; unknown ids are skipped. */
  getUnits(ids: readonly string[]): Unit[] {
    const seen = new Set<string>();
    const units: Unit[] = [];
    for (const id of ids) {
      if (seen.has(id)) continue;
      seen.add(id);
      const unit = this.deps.units.get(id);
      if (unit) units.push(unit);
    }
    return units;
  }

  private async embedQuery(query: string): Promise<Float32Array> {
    try {
      return await withRetry(() => this.deps.embedder.embed(query), {
        ...this.retry,
        onRetry: (err, attempt, delayMs) => {
          this.logger.warn(
            `query embedding failed (attempt ${attempt}/${this.retry.attempts}), retrying in ${delayMs}ms: ${String(err)}`,
          );
          this.retry.onRetry?.(err, attempt, delayMs);
        },
      });
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new RetrievalFailedError(
          `Retrieval failed after ${err.attempts} embedding attempts`,
          err.attempts,
          err.cause,
        );
      }
      throw err;
    }
  }
}
