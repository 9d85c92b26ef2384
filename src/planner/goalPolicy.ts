import type { AnalysisMemory } from '../memory/analysisMemory.js';
import type { Confidence } from '../types/analysis.types.js';

export interface GoalContext {
  goal: string;
  memory: AnalysisMemory;
}

/** Decides deterministically whether the findings so far answer the goal. */
export interface GoalPolicy {
  readonly name: string;
  isSatisfied(context: GoalContext): boolean;
}

const CONFIDENCE_RANK: Record<Confidence, number> = { low: 0, medium: 1, high: 2 };

export function atLeast(confidence: Confidence, level: Confidence): boolean {
  return CONFIDENCE_RANK[confidence] >= CONFIDENCE_RANK[level];
}

/** Run until the budget or the supply of new sub-tasks runs out. */
export const neverSatisfied: GoalPolicy = {
  name: 'never',
  isSatisfied: () => false,
};

export function confidentFinding(level: Confidence = 'high'): GoalPolicy {
  return {
    name: `confident-finding(${level})`,
    isSatisfied: ({ memory }) =>
      memory.query((f) => f.status === 'ok' && atLeast(f.confidence, level)).length > 0,
  };
}

export function minFindings(count: number): GoalPolicy {
  return {
    name: `min-findings(${count})`,
    isSatisfied: ({ memory }) => memory.query((f) => f.status !== 'failed').length >= count,
  };
}

export function anyPolicy(...policies: GoalPolicy[]): GoalPolicy {
  return {
    name: policies.map((p) => p.name).join('|') || 'never',
    isSatisfied: (context) => policies.some((p) => p.isSatisfied(context)),
  };
}
