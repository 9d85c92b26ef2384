import type { AnalysisMemory } from '../memory/analysisMemory.js';
import type { TaskKind } from '../types/analysis.types.js';
import type { Unit } from '../types/unit.types.js';
import type { ReadonlyTaskTree } from './taskTree.js';

export interface TaskProposal {
  kind: TaskKind;
  goalDescription: string;
  query: string;
  parentTaskId?: string;
}

export interface ProposalContext {
  goal: string;
  memory: AnalysisMemory;
  tree: ReadonlyTaskTree;
}

/**
 * Suggests candidate sub-tasks, most important first. Proposers are
 * stateless: the same context always yields the same list, and the planner
 * drops candidates that are already covered or queued.
 */
export interface TaskProposer {
  propose(context: ProposalContext): TaskProposal[];
}

/** Split a goal into sub-queries at sentence ends, semicolons and line breaks. */
export function splitGoal(goal: string): string[] {
  const seen = new Set<string>();
  const parts: string[] = [];
  for (const raw of goal.split(/(?<=[.?!])\s+|[\n;]+/)) {
    const part = raw.trim().replace(/[\s.?!,:]+$/, '');
    const key = part.toLowerCase();
    if (part === '' || seen.has(key)) continue;
    seen.add(key);
    parts.push(part);
  }
  return parts;
}

export interface GoalDecomposerOptions {
  kind?: TaskKind;
  /** Follow-up tasks per successful finding (0 disables follow-ups). */
  followUpsPerFinding?: number;
  /** Follow-ups are only proposed below tasks shallower than this. */
  maxDepth?: number;
  /** Resolves retrieved unit ids so follow-ups can name their symbols. */
  lookup?: (id: string) => Unit | undefined;
}

/**
 * Default proposer. Root tasks come from the goal's own clauses; each
 * successful finding can add child tasks asking how the symbols it surfaced
 * are used elsewhere.
 */
export class GoalDecomposer implements TaskProposer {
  private readonly kind: TaskKind;
  private readonly followUps: number;
  private readonly maxDepth: number;

  constructor(private readonly options: GoalDecomposerOptions = {}) {
    this.kind = options.kind ?? 'analyze';
    this.followUps = options.followUpsPerFinding ?? 0;
    this.maxDepth = options.maxDepth ?? 1;
  }

  propose({ goal, memory, tree }: ProposalContext): TaskProposal[] {
    const proposals: TaskProposal[] = splitGoal(goal).map((part) => ({
      kind: this.kind,
      goalDescription: part,
      query: part,
    }));

    const lookup = this.options.lookup;
    if (this.followUps <= 0 || !lookup) return proposals;

    for (const finding of memory.query((f) => f.status === 'ok')) {
      const task = tree.get(finding.taskId);
      if (!task || task.depth >= this.maxDepth) continue;

      const symbols: string[] = [];
      for (const id of finding.retrievedUnitIds) {
        const symbol = lookup(id)?.metadata['symbol'];
        if (symbol && !symbols.includes(symbol)) symbols.push(symbol);
        if (symbols.length >= this.followUps) break;
      }
      for (const symbol of symbols) {
        proposals.push({
          kind: this.kind,
          goalDescription: `How is ${symbol} used?`,
          query: symbol,
          parentTaskId: task.id,
        });
      }
    }
    return proposals;
  }
}
