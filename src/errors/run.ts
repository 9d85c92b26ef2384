import { SifterError } from './base.js';

export class PlannerStateError extends SifterError {
  constructor(message: string) {
    super(message, 'PLANNER_STATE');
  }
}

export class MemoryExhaustedError extends SifterError {
  override readonly fatal = true;

  constructor(public readonly capacity: number) {
    super(`Analysis memory is full (${capacity} findings)`, 'MEMORY_EXHAUSTED');
  }
}

export class RunFailedError extends SifterError {
  override readonly fatal = true;

  constructor(message: string, cause?: unknown) {
    super(message, 'RUN_FAILED', cause);
  }
}
