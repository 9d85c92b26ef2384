import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import {
  TOOL_NAMES,
  confidenceFromSimilarity,
  registerBuiltinTools,
} from '../../../src/tools/builtinTools.js';
import type { BuiltinToolDeps } from '../../../src/tools/builtinTools.js';
import { ToolRegistry } from '../../../src/tools/toolRegistry.js';
import type { ToolResult } from '../../../src/tools/toolRegistry.js';
import { Retriever } from '../../../src/retrieval/retriever.js';
import { MemoryVectorIndex } from '../../../src/index/memoryVectorIndex.js';
import { UnitStore } from '../../../src/index/unitStore.js';
import type { ReasoningAnalyzer } from '../../../src/reasoning/analyzer.js';
import type { Observation } from '../../../src/types/analysis.types.js';
import type { Unit } from '../../../src/types/unit.types.js';
import { AxisEmbedder, noSleep } from '../../fixtures/axisEmbedder.js';

const UNITS: Array<{ unit: Unit; vector: number[] }> = [
  {
    unit: {
      id: 'u1',
      text: 'alpha alpha',
      metadata: { source: 'src/a.ts', startLine: '1', endLine: '3', symbol: 'parseArgs' },
    },
    vector: [2, 0, 0],
  },
  { unit: { id: 'u2', text: 'alpha beta', metadata: { source: 'src/b.ts' } }, vector: [1, 1, 0] },
  { unit: { id: 'u3', text: 'gamma', metadata: { source: 'notes.md' } }, vector: [0, 0, 1] },
];

function valueOf(result: ToolResult): Observation {
  if (!result.ok) throw result.error;
  return result.value;
}

describe('confidenceFromSimilarity', () => {
  it('maps similarity bands to confidence', () => {
    expect(confidenceFromSimilarity(0.8)).toBe('high');
    expect(confidenceFromSimilarity(0.79)).toBe('medium');
    expect(confidenceFromSimilarity(0.5)).toBe('medium');
    expect(confidenceFromSimilarity(0.49)).toBe('low');
  });
});

describe('registerBuiltinTools', () => {
  let embedder: AxisEmbedder;
  let retriever: Retriever;
  let analyze: Mock<ReasoningAnalyzer['analyze']>;
  let registry: ToolRegistry;

  function register(extra: Partial<BuiltinToolDeps> = {}): void {
    registerBuiltinTools(registry, { retriever, analyzer: { analyze }, ...extra });
  }

  beforeEach(async () => {
    embedder = new AxisEmbedder(['alpha', 'beta', 'gamma']);
    const vectorIndex = new MemoryVectorIndex();
    const units = new UnitStore();
    for (const { unit, vector } of UNITS) {
      units.put(unit);
      await vectorIndex.upsert(unit.id, Float32Array.from(vector), unit.metadata);
    }
    retriever = new Retriever({ embedder, vectorIndex, units, retry: { attempts: 3, sleep: noSleep } });
    analyze = vi.fn<ReasoningAnalyzer['analyze']>(async (found) => ({
      conclusion: `saw ${found.length}`,
      confidence: 'medium',
    }));
    registry = new ToolRegistry();
  });

  it('registers search and analyze, and index only with an indexer', () => {
    register();
    expect(registry.list().map((t) => t.name)).toEqual([TOOL_NAMES.search, TOOL_NAMES.analyze]);
  });

  describe('search', () => {
    it('lists matched units with a confidence from the best similarity', async () => {
      register();
      const value = valueOf(await registry.invoke('search', { query: 'alpha', topK: 2 }));
      expect(value).toEqual({
        unitIds: ['u1', 'u2'],
        conclusion: '2 unit(s) matched "alpha": src/a.ts:1-3 (parseArgs), src/b.ts',
        confidence: 'high',
        status: 'ok',
      });
    });

    it('gives medium confidence for a weaker best match', async () => {
      register();
      const value = valueOf(await registry.invoke('search', { query: 'beta', topK: 1 }));
      expect(value.unitIds).toEqual(['u2']);
      expect(value.confidence).toBe('medium');
    });

    it('returns a partial observation when nothing matches', async () => {
      register();
      const value = valueOf(
        await registry.invoke('search', { query: 'alpha', filters: { source: 'missing.ts' } }),
      );
      expect(value).toEqual({
        unitIds: [],
        conclusion: 'No units matched "alpha"',
        confidence: 'low',
        status: 'partial',
      });
    });

    it('reports exhausted retrieval as an unavailable collaborator', async () => {
      register();
      embedder.failuresLeft = 3;
      const result = await registry.invoke('search', { query: 'alpha' });
      if (result.ok) throw new Error('expected failure');
      expect(result.error.toolCode).toBe('COLLABORATOR_UNAVAILABLE');
      expect(result.error.message).toBe('search failed: Retrieval failed after 3 embedding attempts');
    });
  });

  describe('analyze', () => {
    it('retrieves context for the instruction and reasons over it', async () => {
      register();
      const value = valueOf(await registry.invoke('analyze', { instruction: 'Explain alpha', topK: 1 }));
      expect(value).toEqual({ unitIds: ['u1'], conclusion: 'saw 1', confidence: 'medium', status: 'ok' });
      expect(analyze).toHaveBeenCalledWith([expect.objectContaining({ id: 'u1' })], 'Explain alpha');
    });

    it('searches with the query when one is given', async () => {
      register();
      const value = valueOf(
        await registry.invoke('analyze', { instruction: 'Explain it', query: 'gamma', topK: 1 }),
      );
      expect(value.unitIds).toEqual(['u3']);
    });

    it('uses explicit unit ids in the order given', async () => {
      register();
      const value = valueOf(
        await registry.invoke('analyze', { instruction: 'Compare', unitIds: ['u3', 'nope', 'u1'] }),
      );
      expect(value.unitIds).toEqual(['u3', 'u1']);
      expect(embedder.calls).toEqual([]);
    });

    it('does not call the analyzer without context', async () => {
      register();
      const value = valueOf(
        await registry.invoke('analyze', { instruction: 'Explain', filters: { source: 'missing.ts' } }),
      );
      expect(value).toEqual({
        unitIds: [],
        conclusion: 'No context found for "Explain"',
        confidence: 'low',
        status: 'partial',
      });
      expect(analyze).not.toHaveBeenCalled();
    });
  });

  describe('index', () => {
    it('summarises the index report', async () => {
      const indexDirectory = vi.fn<NonNullable<BuiltinToolDeps['indexDirectory']>>(async () => ({
        documents: 2,
        units: 5,
        embedded: 4,
        reused: 1,
        truncated: 0,
        removed: 0,
        skipped: 1,
      }));
      register({ indexDirectory });

      const value = valueOf(await registry.invoke('index', { directory: '/repo', prune: false }));
      expect(value).toEqual({
        unitIds: [],
        conclusion: 'Indexed 2 documents into 5 units (4 embedded, 1 reused, 0 truncated, 0 removed, 1 skipped)',
        confidence: 'high',
        status: 'partial',
      });
      expect(indexDirectory).toHaveBeenCalledWith('/repo', { prune: false });
    });
  });
});
