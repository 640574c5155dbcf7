import { Injectable } from '@nestjs/common';
import { InvalidRegionError } from '../common/errors';
import { CoveragePlan } from './coverage-plan';
import {
  CoverageProfile,
  CoverageUnit,
  DensityClass,
  DensityTable,
  PlanOptions,
  PROFILE_UNIT_CAPS,
  RegionDescriptor,
} from './interfaces/coverage.interface';

/**
 * Ranks the sub-regions of a target area by expected yield.
 *
 * Pure: no I/O, same input always gives the same order. Ranking is by
 * expected count descending, ties by ascending sub-region id. Keywords are
 * part of the contract but do not affect ranking.
 */
@Injectable()
export class CoveragePlanner {
  plan(
    region: RegionDescriptor,
    keywords: readonly string[],
    densityTable: DensityTable,
    options: PlanOptions = {},
  ): CoveragePlan {
    const regionKey = region.key.trim();
    if (!regionKey || densityTable.length === 0) {
      throw new InvalidRegionError(region.key);
    }

    const unique = new Map<string, DensityTable[number]>();
    for (const entry of densityTable) {
      if (!unique.has(entry.subRegionId)) unique.set(entry.subRegionId, entry);
    }

    const ranked = [...unique.values()].sort(
      (a, b) =>
        b.expectedCount - a.expectedCount ||
        compareIds(a.subRegionId, b.subRegionId),
    );

    const cap = this.resolveCap(options);
    const selected = cap === null ? ranked : ranked.slice(0, cap);
    const total = selected.reduce((sum, e) => sum + Math.max(0, e.expectedCount), 0);

    return new CoveragePlan(
      selected.map((entry, index) => ({
        id: entry.subRegionId,
        regionKey,
        label: entry.label ?? null,
        densityClass: entry.densityClass,
        expectedCount: entry.expectedCount,
        weight: total > 0 ? Math.max(0, entry.expectedCount) / total : 0,
        rank: index + 1,
      })),
    );
  }

  /**
   * Single-unit plan for a region without density data. The unit is named
   * after the region itself.
   */
  fallbackPlan(region: RegionDescriptor, expectedCount: number): CoveragePlan {
    const regionKey = region.key.trim();
    if (!regionKey) {
      throw new InvalidRegionError(region.key);
    }
    const unit: CoverageUnit = {
      id: regionKey,
      regionKey,
      label: region.label ?? null,
      densityClass: DensityClass.UNKNOWN,
      expectedCount,
      weight: 1,
      rank: 1,
    };
    return new CoveragePlan([unit]);
  }

  private resolveCap(options: PlanOptions): number | null {
    const profileCap = PROFILE_UNIT_CAPS[options.profile ?? CoverageProfile.AGGRESSIVE];
    if (options.maxUnits === undefined) return profileCap;
    return profileCap === null
      ? options.maxUnits
      : Math.min(profileCap, options.maxUnits);
  }
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
