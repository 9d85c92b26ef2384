import type { Task, TaskKind, TaskStatus } from '../types/analysis.types.js';
import { PlannerStateError } from '../errors/run.js';

export interface NewTask {
  kind: TaskKind;
  goalDescription: string;
  query: string;
  fingerprint: string;
  parentTaskId?: string;
}

export interface ReadonlyTaskTree {
  get(id: string): Task | undefined;
  hasFingerprint(fingerprint: string): boolean;
  /** Pending tasks in tree order: depth-first, siblings in insertion order. */
  pending(): Task[];
  list(): Task[];
  readonly size: number;
}

/**
 * Tree of tasks for one analysis run. Ids are assigned in creation order
 * (task-1, task-2, ...), and no two tasks share a fingerprint.
 */
export class TaskTree implements ReadonlyTaskTree {
  private readonly tasks = new Map<string, Task>();
  private readonly roots: string[] = [];
  private readonly children = new Map<string, string[]>();
  private readonly fingerprints = new Set<string>();

  add(init: NewTask): Task {
    if (this.fingerprints.has(init.fingerprint)) {
      throw new PlannerStateError(`Duplicate task fingerprint ${init.fingerprint}`);
    }
    const parent = init.parentTaskId !== undefined ? this.tasks.get(init.parentTaskId) : undefined;
    if (init.parentTaskId !== undefined && !parent) {
      throw new PlannerStateError(`Unknown parent task ${init.parentTaskId}`);
    }

    const task: Task = {
      id: `task-${this.tasks.size + 1}`,
      kind: init.kind,
      goalDescription: init.goalDescription,
      query: init.query,
      depth: parent ? parent.depth + 1 : 0,
      fingerprint: init.fingerprint,
      status: 'pending',
      ...(parent !== undefined && { parentTaskId: parent.id }),
    };

    this.tasks.set(task.id, task);
    this.fingerprints.add(task.fingerprint);
    if (parent) {
      const siblings = this.children.get(parent.id) ?? [];
      siblings.push(task.id);
      this.children.set(parent.id, siblings);
    } else {
      this.roots.push(task.id);
    }
    return task;
  }

  get(id: string): Task | undefined {
    return this.tasks.get(id);
  }

  hasFingerprint(fingerprint: string): boolean {
    return this.fingerprints.has(fingerprint);
  }

  setStatus(id: string, status: TaskStatus): void {
    const task = this.tasks.get(id);
    if (!task) throw new PlannerStateError(`Unknown task ${id}`);
    task.status = status;
  }

  pending(): Task[] {
    const out: Task[] = [];
    const visit = (id: string): void => {
      const task = this.tasks.get(id);
      if (!task) return;
      if (task.status === 'pending') out.push(task);
      for (const child of this.children.get(id) ?? []) visit(child);
    };
    for (const root of this.roots) visit(root);
    return out;
  }

  list(): Task[] {
    return [...this.tasks.values()].map((task) => ({ ...task }));
  }

  get size(): number {
    return this.tasks.size;
  }
}
