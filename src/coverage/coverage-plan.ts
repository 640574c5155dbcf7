import type { CoverageUnit } from './interfaces/coverage.interface';

/**
 * Ordered, immutable list of coverage units with restartable iteration.
 */
export class CoveragePlan implements Iterable<CoverageUnit> {
  readonly units: readonly CoverageUnit[];

  constructor(units: readonly CoverageUnit[]) {
    this.units = Object.freeze([...units].sort((a, b) => a.rank - b.rank));
  }

  get size(): number {
    return this.units.length;
  }

  get totalExpected(): number {
    return this.units.reduce((sum, unit) => sum + unit.expectedCount, 0);
  }

  [Symbol.iterator](): Iterator<CoverageUnit> {
    return this.units[Symbol.iterator]();
  }

  /**
   * Lazily yields the units that follow `unitId` in plan order. A null id
   * starts from the first unit; an id not in the plan yields nothing.
   */
  *after(unitId: string | null): Generator<CoverageUnit> {
    let index = 0;
    if (unitId !== null) {
      const position = this.units.findIndex((unit) => unit.id === unitId);
      if (position === -1) return;
      index = position + 1;
    }
    for (; index < this.units.length; index++) {
      yield this.units[index];
    }
  }

  find(unitId: string): CoverageUnit | undefined {
    return this.units.find((unit) => unit.id === unitId);
  }
}
