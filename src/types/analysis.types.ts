export type Confidence = 'low' | 'medium' | 'high';
export type FindingStatus = 'ok' | 'partial' | 'failed';

export interface Finding {
  readonly taskId: string;
  readonly query: string;
  readonly retrievedUnitIds: readonly string[];
  readonly conclusion: string;
  readonly confidence: Confidence;
  readonly status: FindingStatus;
  readonly error?: { readonly code: string; readonly message: string };
}

export type TaskKind = 'search' | 'analyze';
export type TaskStatus = 'pending' | 'in_progress' | 'done' | 'failed';

export interface Task {
  readonly id: string;
  readonly kind: TaskKind;
  readonly goalDescription: string;
  /** Retrieval query issued for this task. */
  readonly query: string;
  readonly parentTaskId?: string;
  readonly depth: number;
  readonly fingerprint: string;
  status: TaskStatus;
}

export type PlannerState =
  | 'idle'
  | 'proposing'
  | 'awaiting_result'
  | 'integrating'
  | 'done'
  | 'failed';

export type StopReason =
  | 'goal_satisfied'
  | 'no_new_coverage'
  | 'task_budget'
  | 'iteration_cap'
  | 'time_budget'
  | 'cancelled'
  | 'collaborator_failure'
  | 'memory_exhausted';

export interface RunResult {
  goal: string;
  state: 'done' | 'failed';
  stopReason: StopReason;
  /** True whenever the run stopped before running out of things to ask. */
  partial: boolean;
  findings: readonly Finding[];
  tasks: readonly Task[];
  iterations: number;
  error?: { code: string; message: string };
}

/** What a tool hands back; the loop turns it into a Finding. */
export interface Observation {
  unitIds: string[];
  conclusion: string;
  confidence: Confidence;
  status?: Exclude<FindingStatus, 'failed'>;
}

export interface AnalysisOutcome {
  conclusion: string;
  confidence: Confidence;
}
