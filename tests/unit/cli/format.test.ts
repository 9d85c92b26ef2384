import { describe, it, expect } from 'vitest';
import { formatIndexReport, formatRunResult, formatSearchResults } from '../../../src/cli/format.js';
import { defaultPersistPath } from '../../../src/cli/engine.js';
import { parsePositiveInt } from '../../../src/cli/commands/search.js';
import type { RunResult } from '../../../src/types/analysis.types.js';

describe('formatIndexReport', () => {
  it('summarises counts on two lines', () => {
    expect(
      formatIndexReport('/repo', {
        documents: 3,
        units: 7,
        embedded: 5,
        reused: 2,
        truncated: 1,
        removed: 0,
        skipped: 1,
      }),
    ).toBe('Indexed 3 files (7 units) from /repo\n  embedded 5, reused 2, truncated 1, removed 0, skipped 1\n');
  });
});

describe('formatSearchResults', () => {
  it('numbers hits with score and strategies', () => {
    const out = formatSearchResults('retry', [
      {
        unit: { id: 'u1', text: 'x', metadata: { source: 'src/retry.ts', startLine: '3', endLine: '9' } },
        score: 0.03226,
        similarity: 0.5,
        strategies: ['vector', 'keyword'],
      },
    ]);
    expect(out).toBe('1. src/retry.ts:3-9  score=0.032 [vector+keyword]\n');
  });

  it('says when nothing matched', () => {
    expect(formatSearchResults('retry', [])).toBe('No results found for: retry\n');
  });
});

describe('formatRunResult', () => {
  it('prints status, error and each finding', () => {
    const result: RunResult = {
      goal: 'Explain retry',
      state: 'failed',
      stopReason: 'collaborator_failure',
      partial: true,
      iterations: 1,
      tasks: [
        {
          id: 'task-1',
          kind: 'analyze',
          goalDescription: 'Explain retry',
          query: 'Explain retry',
          depth: 0,
          fingerprint: 'analyze:0',
          status: 'failed',
        },
      ],
      findings: [
        {
          taskId: 'task-1',
          query: 'Explain retry',
          retrievedUnitIds: [],
          conclusion: 'analyze failed: backend down',
          confidence: 'low',
          status: 'failed',
        },
      ],
      error: { code: 'COLLABORATOR_UNAVAILABLE', message: 'analyze failed: backend down' },
    };
    expect(formatRunResult(result)).toBe(
      [
        'Goal: Explain retry',
        'Status: failed (collaborator_failure, partial) after 1 iteration(s)',
        'Error: [COLLABORATOR_UNAVAILABLE] analyze failed: backend down',
        '',
        '## task-1: Explain retry',
        'status=failed confidence=low units=0',
        'analyze failed: backend down',
      ].join('\n') + '\n',
    );
  });
});

describe('cli helpers', () => {
  it('keeps the snapshot under .sifter in the corpus root', () => {
    expect(defaultPersistPath('/repo')).toBe('/repo/.sifter/index.json');
  });

  it('parses positive integers only', () => {
    expect(parsePositiveInt('3')).toBe(3);
    expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer.');
    expect(() => parsePositiveInt('2.5')).toThrow('Expected a positive integer.');
  });
});
