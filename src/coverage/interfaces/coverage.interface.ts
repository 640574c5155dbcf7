export enum DensityClass {
  VERY_HIGH = 'very_high',
  HIGH = 'high',
  MEDIUM = 'medium',
  LOW = 'low',
  UNKNOWN = 'unknown',
}

export enum CoverageProfile {
  BUDGET = 'budget',
  BALANCED = 'balanced',
  AGGRESSIVE = 'aggressive',
}

/** Maximum number of units each profile keeps after ranking (null = all) */
export const PROFILE_UNIT_CAPS: Record<CoverageProfile, number | null> = {
  [CoverageProfile.BUDGET]: 10,
  [CoverageProfile.BALANCED]: 25,
  [CoverageProfile.AGGRESSIVE]: null,
};

export interface RegionDescriptor {
  /** Lookup key of the region's density table, e.g. `los-angeles-ca` */
  key: string;
  label?: string;
}

export interface DensityEntry {
  subRegionId: string;
  label?: string;
  densityClass: DensityClass;
  expectedCount: number;
}

export type DensityTable = readonly DensityEntry[];

export interface CoverageUnit {
  /** Sub-region identifier (e.g. a postal code) */
  id: string;
  regionKey: string;
  label: string | null;
  densityClass: DensityClass;
  expectedCount: number;
  /** Share of the plan's total expected count */
  weight: number;
  /** 1-based position in plan order */
  rank: number;
}

export interface PlanOptions {
  profile?: CoverageProfile;
  maxUnits?: number;
}

export const DENSITY_TABLE_SOURCE = 'DENSITY_TABLE_SOURCE';

export interface DensityTableSource {
  /** Entries for the region; empty when the region is unknown */
  lookup(region: RegionDescriptor): Promise<DensityTable>;
}
