import type { RawRecord } from '../../src/capabilities/interfaces/capabilities.interface';
import {
  defaultExecutionSettings,
  ExecutionSettings,
} from '../../src/config/execution.settings';
import {
  CoverageUnit,
  DensityClass,
} from '../../src/coverage/interfaces/coverage.interface';
import {
  RateBudgetScheduler,
  RateBudgetSchedulerOptions,
} from '../../src/scheduler/rate-budget.scheduler';
import type { WorkItemUpsert } from '../../src/store/interfaces/campaign-repository.interface';
import { ProcessingStage } from '../../src/store/interfaces/campaign-state.interface';

/** Defaults with no pacing and no backoff waits */
export function testSettings(overrides: Record<string, string> = {}): ExecutionSettings {
  return defaultExecutionSettings({
    DISCOVERY_MIN_INTERVAL_MS: '0',
    SUMMARIZER_MIN_INTERVAL_MS: '0',
    VERIFIER_MIN_INTERVAL_MS: '0',
    BACKOFF_BASE_DELAY_MS: '0',
    BACKOFF_MAX_DELAY_MS: '0',
    ...overrides,
  });
}

export function testScheduler(
  settings: ExecutionSettings,
  overrides: Partial<RateBudgetSchedulerOptions> = {},
): RateBudgetScheduler {
  return new RateBudgetScheduler({
    campaignId: 'campaign-1',
    costCeiling: 100,
    limits: settings.capabilities,
    backoff: settings.backoff,
    sink: async () => undefined,
    ...overrides,
  });
}

export function testUnit(overrides: Partial<CoverageUnit> = {}): CoverageUnit {
  return {
    id: '90012',
    regionKey: 'los-angeles-ca',
    label: 'Downtown LA',
    densityClass: DensityClass.HIGH,
    expectedCount: 10,
    weight: 1,
    rank: 1,
    ...overrides,
  };
}

export function testRecord(overrides: Partial<RawRecord> = {}): RawRecord {
  return {
    externalId: 'place-1',
    name: 'Sunset Bakery',
    email: 'hello@sunset-bakery.test',
    phone: null,
    website: 'https://sunset-bakery.test',
    category: 'bakery',
    address: '1 Main St',
    rating: 4.8,
    reviewCount: 120,
    ...overrides,
  };
}

export function testItem(overrides: Partial<WorkItemUpsert> = {}): WorkItemUpsert {
  const profile = testRecord();
  return {
    campaignId: 'campaign-1',
    unitId: '90012',
    unitRank: 1,
    externalId: profile.externalId,
    ordinal: 0,
    stage: ProcessingStage.DISCOVERED,
    name: profile.name,
    contactChannel: 'hello@sunset-bakery.test',
    payload: { profile },
    failureKind: null,
    failureReason: null,
    failedStage: null,
    ...overrides,
  };
}

