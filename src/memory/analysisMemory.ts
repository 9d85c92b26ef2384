import type { Finding } from '../types/analysis.types.js';
import { MemoryExhaustedError } from '../errors/run.js';

export interface AnalysisMemoryOptions {
  /** Maximum number of findings; appending beyond it is fatal to the run. */
  capacity?: number;
}

/**
 * Append-only log of findings plus the coverage set of one analysis run.
 * Nothing here mutates or deletes a recorded finding.
 */
export class AnalysisMemory {
  private readonly log: Finding[] = [];
  private readonly covered = new Set<string>();
  private readonly capacity: number;

  constructor(options: AnalysisMemoryOptions = {}) {
    this.capacity = options.capacity ?? Number.POSITIVE_INFINITY;
  }

  append(finding: Finding): void {
    if (this.log.length >= this.capacity) {
      throw new MemoryExhaustedError(this.capacity);
    }
    this.log.push(
      Object.freeze({
        ...finding,
        retrievedUnitIds: Object.freeze([...finding.retrievedUnitIds]),
        ...(finding.error !== undefined && { error: Object.freeze({ ...finding.error }) }),
      }),
    );
  }

  query(predicate: (finding: Finding) => boolean = () => true): Finding[] {
    return this.log.filter(predicate);
  }

  get findings(): readonly Finding[] {
    return [...this.log];
  }

  get size(): number {
    return this.log.length;
  }

  hasCovered(fingerprint: string): boolean {
    return this.covered.has(fingerprint);
  }

  markCovered(fingerprint: string): void {
    this.covered.add(fingerprint);
  }

  get coverage(): ReadonlySet<string> {
    return new Set(this.covered);
  }
}
