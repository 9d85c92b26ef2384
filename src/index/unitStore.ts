import type { Unit } from '../types/unit.types.js';

/** Full unit records by id, in first-insertion order. */
export class UnitStore {
  private readonly units = new Map<string, Unit>();

  put(unit: Unit): void {
    this.units.set(unit.id, Object.freeze({ ...unit, metadata: Object.freeze({ ...unit.metadata }) }));
  }

  get(id: string): Unit | undefined {
    return this.units.get(id);
  }

  has(id: string): boolean {
    return this.units.has(id);
  }

  delete(id: string): boolean {
    return this.units.delete(id);
  }

  ids(): string[] {
    return [...this.units.keys()];
  }

  all(): Unit[] {
    return [...this.units.values()];
  }

  clear(): void {
    this.units.clear();
  }

  get size(): number {
    return this.units.size;
  }
}
