import { z } from 'zod';
import type { Retriever } from '../retrieval/retriever.js';
import type { ReasoningAnalyzer } from '../reasoning/analyzer.js';
import type { Confidence, Observation } from '../types/analysis.types.js';
import type { IndexReport } from '../types/unit.types.js';
import { unitLabel } from '../reasoning/contextFormatter.js';
import type { ToolRegistry } from './toolRegistry.js';

export const TOOL_NAMES = {
  index: 'index',
  search: 'search',
  analyze: 'analyze',
} as const;

export const indexArgsSchema = z.object({
  directory: z.string().min(1),
  prune: z.boolean().optional(),
});

const filtersSchema = z.record(z.string());

export const searchArgsSchema = z.object({
  query: z.string().min(1),
  topK: z.number().int().positive().optional(),
  filters: filtersSchema.optional(),
});

export const analyzeArgsSchema = z.object({
  instruction: z.string().min(1),
  query: z.string().min(1).optional(),
  unitIds: z.array(z.string()).optional(),
  topK: z.number().int().positive().optional(),
  filters: filtersSchema.optional(),
});

export interface BuiltinToolDeps {
  retriever: Retriever;
  analyzer: ReasoningAnalyzer;
  /** Indexes a directory; the `index` tool is registered only when given. */
  indexDirectory?: (
    directory: string,
    options: { prune?: boolean; signal?: AbortSignal },
  ) => Promise<IndexReport>;
  defaultTopK?: number;
}

/** Confidence of a plain search, from the best cosine similarity among its hits. */
export function confidenceFromSimilarity(similarity: number): Confidence {
  if (similarity >= 0.8) return 'high';
  if (similarity >= 0.5) return 'medium';
  return 'low';
}

export function registerBuiltinTools(registry: ToolRegistry, deps: BuiltinToolDeps): void {
  const { retriever, analyzer } = deps;
  const defaultTopK = deps.defaultTopK ?? 5;

  const indexDirectory = deps.indexDirectory;
  if (indexDirectory) {
    registry.register(
      TOOL_NAMES.index,
      indexArgsSchema,
      async ({ directory, prune }, { signal }): Promise<Observation> => {
        const report = await indexDirectory(directory, {
          ...(prune !== undefined && { prune }),
          ...(signal !== undefined && { signal }),
        });
        return {
          unitIds: [],
          conclusion:
            `Indexed ${report.documents} documents into ${report.units} units ` +
            `(${report.embedded} embedded, ${report.reused} reused, ${report.truncated} truncated, ` +
            `${report.removed} removed, ${report.skipped} skipped)`,
          confidence: 'high',
          status: report.skipped > 0 ? 'partial' : 'ok',
        };
      },
      'Index a directory into the corpus index.',
    );
  }

  registry.register(
    TOOL_NAMES.search,
    searchArgsSchema,
    async ({ query, topK, filters }): Promise<Observation> => {
      const hits = await retriever.search(query, {
        topK: topK ?? defaultTopK,
        ...(filters !== undefined && { filters }),
      });
      if (hits.length === 0) {
        return {
          unitIds: [],
          conclusion: `No units matched "${query}"`,
          confidence: 'low',
          status: 'partial',
        };
      }
      const best = Math.max(...hits.map((hit) => hit.similarity));
      return {
        unitIds: hits.map((hit) => hit.unit.id),
        conclusion: `${hits.length} unit(s) matched "${query}": ${hits.map((hit) => unitLabel(hit.unit)).join(', ')}`,
        confidence: confidenceFromSimilarity(best),
        status: 'ok',
      };
    },
    'Retrieve the units most similar to a query.',
  );

  registry.register(
    TOOL_NAMES.analyze,
    analyzeArgsSchema,
    async ({ instruction, query, unitIds, topK, filters }): Promise<Observation> => {
      const units = unitIds
        ? retriever.getUnits(unitIds)
        : await retriever.searchCodebase(query ?? instruction, topK ?? defaultTopK, filters);
      if (units.length === 0) {
        return {
          unitIds: [],
          conclusion: `No context found for "${instruction}"`,
          confidence: 'low',
          status: 'partial',
        };
      }
      const outcome = await analyzer.analyze(units, instruction);
      return {
        unitIds: units.map((unit) => unit.id),
        conclusion: outcome.conclusion,
        confidence: outcome.confidence,
        status: 'ok',
      };
    },
    'Retrieve context for an instruction and reason over it.',
  );
}
