import type { Finding, RunResult, StopReason, Task } from '../types/analysis.types.js';
import type { LoopConfig } from '../types/config.types.js';
import type { ToolRegistry } from '../tools/toolRegistry.js';
import type { TaskProposer } from '../planner/taskProposer.js';
import type { GoalPolicy } from '../planner/goalPolicy.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { AnalysisMemory } from '../memory/analysisMemory.js';
import { TaskTree } from '../planner/taskTree.js';
import { Planner } from '../planner/planner.js';
import { SifterError, errorMessage } from '../errors/base.js';
import { MemoryExhaustedError, RunFailedError } from '../errors/run.js';
import type { ToolError } from '../errors/tool.js';

export type LoopEvent =
  | { type: 'task_issued'; iteration: number; task: Task }
  | { type: 'finding'; iteration: number; finding: Finding }
  | { type: 'stopped'; state: 'done' | 'failed'; reason: StopReason; iterations: number };

export type LoopLimits = Pick<
  LoopConfig,
  'maxTasks' | 'maxIterations' | 'maxDurationMs' | 'concurrency' | 'maxConsecutiveFailures' | 'memoryCapacity'
> & {
  /** Units retrieved per task. */
  topK?: number;
};

export interface ExecutionLoopDeps {
  registry: ToolRegistry;
  proposer: TaskProposer;
  policy: GoalPolicy;
  limits: LoopLimits;
  clock?: () => number;
  logger?: Logger;
  onEvent?: (event: LoopEvent) => void;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Called for this run's events, after the loop-wide `onEvent`. */
  onEvent?: (event: LoopEvent) => void;
}

interface TaskOutcome {
  finding: Finding;
  error?: ToolError;
}

const ABORTED: unique symbol = Symbol('aborted');
const TIMED_OUT: unique symbol = Symbol('timed_out');

/**
 * Settles with `work`, or with ABORTED when the signal fires, or with
 * TIMED_OUT after `timeoutMs`, whichever comes first. A losing `work` keeps
 * running unobserved.
 */
function raceCycle<T>(
  work: Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<T | typeof ABORTED | typeof TIMED_OUT> {
  if (signal?.aborted) return Promise.resolve(ABORTED);
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      settle();
      resolve(ABORTED);
    };
    const timer = setTimeout(() => {
      settle();
      resolve(TIMED_OUT);
    }, Math.max(0, timeoutMs));
    const settle = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        settle();
        resolve(value);
      },
      (err: unknown) => {
        settle();
        reject(err);
      },
    );
  });
}

/**
 * Plan → act → observe → integrate, until the planner stops or a limit is hit.
 *
 * Every run gets its own memory, task tree and planner, so one loop may serve
 * concurrent runs. Tasks of one cycle are executed concurrently; their
 * findings are integrated in issue order. Collaborator failures never escape
 * `run`: they end up in the result as failed findings or a failed run.
 */
export class ExecutionLoop {
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(private readonly deps: ExecutionLoopDeps) {
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? silentLogger;
  }

  async run(goal: string, options: RunOptions = {}): Promise<RunResult> {
    const { limits, proposer, policy } = this.deps;
    const { signal } = options;
    const emit = (event: LoopEvent): void => {
      this.emit(event);
      options.onEvent?.(event);
    };
    const memory = new AnalysisMemory(
      limits.memoryCapacity !== undefined ? { capacity: limits.memoryCapacity } : {},
    );
    const tree = new TaskTree();
    const planner = new Planner({ tree, memory, proposer, policy, maxTasks: limits.maxTasks });

    const startedAt = this.clock();
    let iterations = 0;
    let consecutiveFailures = 0;

    planner.start(goal);
    this.logger.debug(`run started: "${goal}" (policy ${policy.name})`);

    cycle: while (!planner.isTerminal) {
      if (signal?.aborted) {
        planner.finish('cancelled');
        break;
      }
      if (iterations >= limits.maxIterations) {
        planner.finish('iteration_cap');
        break;
      }
      if (this.clock() - startedAt >= limits.maxDurationMs) {
        planner.finish('time_budget');
        break;
      }

      const tasks = planner.propose(limits.concurrency);
      if (tasks.length === 0) break;
      iterations++;

      for (const task of tasks) {
        tree.setStatus(task.id, 'in_progress');
        emit({ type: 'task_issued', iteration: iterations, task });
      }

      const remainingMs = limits.maxDurationMs - (this.clock() - startedAt);
      const outcomes = await raceCycle(
        Promise.all(tasks.map((task) => this.execute(task, signal))),
        remainingMs,
        signal,
      );
      if (outcomes === ABORTED || outcomes === TIMED_OUT) {
        for (const task of tasks) tree.setStatus(task.id, 'pending');
        planner.finish(outcomes === ABORTED ? 'cancelled' : 'time_budget');
        break;
      }

      // Every completed outcome is integrated before the run may fail.
      let runFailure: Error | undefined;
      for (const { finding, error } of outcomes) {
        if (error?.fatal) {
          runFailure ??= error;
        } else {
          consecutiveFailures = finding.status === 'failed' ? consecutiveFailures + 1 : 0;
          if (limits.maxConsecutiveFailures > 0 && consecutiveFailures >= limits.maxConsecutiveFailures) {
            runFailure ??= new RunFailedError(`${consecutiveFailures} consecutive tool calls failed`, error);
          }
        }

        tree.setStatus(finding.taskId, finding.status === 'failed' ? 'failed' : 'done');
        try {
          planner.integrate(finding, { hold: runFailure !== undefined });
        } catch (err) {
          if (err instanceof MemoryExhaustedError) {
            planner.fail('memory_exhausted', err);
            break cycle;
          }
          throw err;
        }
        emit({ type: 'finding', iteration: iterations, finding });
      }
      if (runFailure !== undefined) {
        if (!planner.isTerminal) planner.fail('collaborator_failure', runFailure);
        break;
      }
    }

    const state = planner.state === 'failed' ? 'failed' : 'done';
    const stopReason = planner.stopReason ?? 'no_new_coverage';
    emit({ type: 'stopped', state, reason: stopReason, iterations });

    const failure = planner.error;
    return {
      goal,
      state,
      stopReason,
      partial: stopReason !== 'goal_satisfied' && stopReason !== 'no_new_coverage',
      findings: memory.findings,
      tasks: tree.list(),
      iterations,
      ...(state === 'failed' &&
        failure !== undefined && {
          error: {
            code: failure instanceof SifterError ? failure.code : 'RUN_FAILED',
            message: errorMessage(failure),
          },
        }),
    };
  }

  private async execute(task: Task, signal?: AbortSignal): Promise<TaskOutcome> {
    const topK = this.deps.limits.topK;
    const args =
      task.kind === 'search'
        ? { query: task.query, ...(topK !== undefined && { topK }) }
        : { instruction: task.goalDescription, query: task.query, ...(topK !== undefined && { topK }) };

    const result = await this.deps.registry.invoke(task.kind, args, signal ? { signal } : {});
    if (result.ok) {
      return {
        finding: {
          taskId: task.id,
          query: task.query,
          retrievedUnitIds: result.value.unitIds,
          conclusion: result.value.conclusion,
          confidence: result.value.confidence,
          status: result.value.status ?? 'ok',
        },
      };
    }

    const { error } = result;
    this.logger.warn(`${task.id} (${task.kind}) failed: ${error.message}`);
    return {
      error,
      finding: {
        taskId: task.id,
        query: task.query,
        retrievedUnitIds: [],
        conclusion: error.message,
        confidence: 'low',
        status: 'failed',
        error: { code: error.code, message: error.message },
      },
    };
  }

  private emit(event: LoopEvent): void {
    switch (event.type) {
      case 'task_issued':
        this.logger.debug(`[${event.iteration}] issue ${event.task.id} ${event.task.kind}: ${event.task.query}`);
        break;
      case 'finding':
        this.logger.debug(
          `[${event.iteration}] ${event.finding.taskId} -> ${event.finding.status} (${event.finding.confidence})`,
        );
        break;
      case 'stopped':
        this.logger.info(`run ${event.state}: ${event.reason} after ${event.iterations} iteration(s)`);
        break;
    }
    this.deps.onEvent?.(event);
  }
}
