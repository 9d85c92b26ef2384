import type { AnalysisMemory } from '../memory/analysisMemory.js';
import type { Finding, PlannerState, StopReason, Task } from '../types/analysis.types.js';
import { PlannerStateError } from '../errors/run.js';
import { intentFingerprint } from '../memory/fingerprint.js';
import type { GoalPolicy } from './goalPolicy.js';
import type { TaskProposer } from './taskProposer.js';
import type { TaskTree } from './taskTree.js';

export interface PlannerDeps {
  tree: TaskTree;
  memory: AnalysisMemory;
  proposer: TaskProposer;
  policy: GoalPolicy;
  /** Maximum number of tasks issued over the whole run. */
  maxTasks: number;
}

/**
 * Deterministic planning state machine for one analysis run.
 *
 *   idle -> proposing -> awaiting_result -> integrating -> proposing ...
 *
 * `done` and `failed` are terminal. Tasks come out in task-tree order and
 * their findings must come back in that same order.
 */
export class Planner {
  private current: PlannerState = 'idle';
  private goalText = '';
  private reason: StopReason | undefined;
  private failure: unknown;
  private issuedCount = 0;
  private readonly issuedIds = new Set<string>();
  private readonly outstanding: string[] = [];

  constructor(private readonly deps: PlannerDeps) {}

  get state(): PlannerState {
    return this.current;
  }

  get goal(): string {
    return this.goalText;
  }

  get stopReason(): StopReason | undefined {
    return this.reason;
  }

  get error(): unknown {
    return this.failure;
  }

  get tasksIssued(): number {
    return this.issuedCount;
  }

  get isTerminal(): boolean {
    return this.current === 'done' || this.current === 'failed';
  }

  start(goal: string): void {
    this.expect('idle', 'start');
    this.goalText = goal;
    this.current = 'proposing';
  }

  /**
   * Issue up to `limit` tasks. Returns an empty list, having moved to `done`,
   * when the budget is spent, the goal is satisfied or nothing uncovered is left.
   */
  propose(limit = 1): Task[] {
    this.expect('proposing', 'propose');
    const { tree, memory, proposer, policy, maxTasks } = this.deps;

    if (this.issuedCount >= maxTasks) return this.stop('task_budget');
    if (policy.isSatisfied({ goal: this.goalText, memory })) return this.stop('goal_satisfied');

    for (const proposal of proposer.propose({ goal: this.goalText, memory, tree })) {
      const fingerprint = intentFingerprint(proposal.kind, proposal.query);
      if (memory.hasCovered(fingerprint) || tree.hasFingerprint(fingerprint)) continue;
      tree.add({ ...proposal, fingerprint });
    }

    const room = Math.min(Math.max(1, limit), maxTasks - this.issuedCount);
    const batch = tree
      .pending()
      .filter((task) => !this.issuedIds.has(task.id))
      .slice(0, room);
    if (batch.length === 0) return this.stop('no_new_coverage');

    for (const task of batch) {
      this.issuedIds.add(task.id);
      this.outstanding.push(task.id);
    }
    this.issuedCount += batch.length;
    this.current = 'awaiting_result';
    return batch.map((task) => ({ ...task }));
  }

  /**
   * Record the finding of the oldest outstanding task. With `hold`, the
   * planner stays in `integrating` after the last outstanding finding so the
   * caller can still fail the run.
   */
  integrate(finding: Finding, options: { hold?: boolean } = {}): void {
    this.expect('awaiting_result', 'integrate');
    const expected = this.outstanding[0];
    if (finding.taskId !== expected) {
      throw new PlannerStateError(
        `Finding for ${finding.taskId} arrived out of order (expected ${expected ?? 'none'})`,
      );
    }
    const task = this.deps.tree.get(finding.taskId);
    if (!task) throw new PlannerStateError(`Unknown task ${finding.taskId}`);

    this.current = 'integrating';
    this.deps.memory.append(finding);
    this.deps.memory.markCovered(task.fingerprint);
    this.outstanding.shift();

    if (this.outstanding.length > 0) {
      this.current = 'awaiting_result';
      return;
    }
    if (options.hold) return;
    if (this.issuedCount >= this.deps.maxTasks) {
      this.stop('task_budget');
    } else if (this.deps.policy.isSatisfied({ goal: this.goalText, memory: this.deps.memory })) {
      this.stop('goal_satisfied');
    } else {
      this.current = 'proposing';
    }
  }

  finish(reason: StopReason): void {
    this.expectLive('finish');
    this.stop(reason);
  }

  fail(reason: StopReason, error?: unknown): void {
    this.expectLive('fail');
    this.current = 'failed';
    this.reason = reason;
    this.failure = error;
    this.outstanding.length = 0;
  }

  private stop(reason: StopReason): Task[] {
    this.current = 'done';
    this.reason = reason;
    this.outstanding.length = 0;
    return [];
  }

  private expect(state: PlannerState, action: string): void {
    if (this.current !== state) {
      throw new PlannerStateError(`Cannot ${action} while ${this.current}`);
    }
  }

  private expectLive(action: string): void {
    if (this.isTerminal) {
      throw new PlannerStateError(`Cannot ${action} while ${this.current}`);
    }
  }
}
