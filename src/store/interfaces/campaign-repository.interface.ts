import type { CoverageUnit } from '../../coverage/interfaces/coverage.interface';
import type {
  LedgerDelta,
  LedgerEntry,
} from '../../scheduler/interfaces/scheduler.interface';
import type { Campaign } from '../entities/campaign.entity';
import type { Checkpoint } from '../entities/checkpoint.entity';
import type { WorkItem } from '../entities/work-item.entity';
import type { ProcessingStage } from './campaign-state.interface';

export const CAMPAIGN_REPOSITORY = 'CAMPAIGN_REPOSITORY';

export type CampaignFields = Omit<Campaign, 'createdAt' | 'updatedAt'>;

/** Fields to merge into the campaign with this id, created when missing */
export type CampaignUpsert = Pick<Campaign, 'id'> & Partial<CampaignFields>;

export type WorkItemUpsert = Omit<WorkItem, 'id' | 'createdAt' | 'updatedAt'>;

export type CheckpointState = Omit<Checkpoint, 'updatedAt'>;

export type StageCounts = Record<ProcessingStage, number>;

/** A unit skipped because its discovery call failed */
export interface UnitFailure {
  unitId: string;
  rank: number;
  reason: string;
  failedAt: Date;
}

/**
 * Durable campaign state. Every method rejects with `InfrastructureError`
 * when storage is unavailable.
 */
export interface CampaignRepository {
  upsertCampaign(campaign: CampaignUpsert): Promise<Campaign>;
  getCampaign(campaignId: string): Promise<Campaign | null>;

  saveCoveragePlan(campaignId: string, units: readonly CoverageUnit[]): Promise<void>;
  /** Units in rank order */
  loadCoveragePlan(campaignId: string): Promise<CoverageUnit[]>;
  recordUnitFailure(campaignId: string, unitId: string, reason: string): Promise<void>;
  /** Failed units in rank order */
  listUnitFailures(campaignId: string): Promise<UnitFailure[]>;

  /**
   * Inserts or advances the item keyed by (campaignId, externalId). An
   * update that would move the stage backwards, or touch a failed item, is
   * ignored and the stored item returned.
   */
  upsertWorkItem(item: WorkItemUpsert): Promise<WorkItem>;
  /** Items of one unit in discovery order */
  listUnitItems(campaignId: string, unitId: string): Promise<WorkItem[]>;
  listResults(campaignId: string, limit: number, offset: number): Promise<WorkItem[]>;
  countItemsByStage(campaignId: string): Promise<StageCounts>;

  writeCheckpoint(checkpoint: CheckpointState): Promise<void>;
  readCheckpoint(campaignId: string): Promise<Checkpoint | null>;

  /**
   * Adds a ledger delta and the campaign's cost in one transaction. Negative
   * costs are rejected.
   */
  recordCost(campaignId: string, delta: LedgerDelta): Promise<void>;
  readLedger(campaignId: string): Promise<LedgerEntry[]>;

  /** Running campaigns whose heartbeat is missing or older than `before` */
  findStalledCampaigns(before: Date): Promise<Campaign[]>;
}

export function emptyStageCounts(): StageCounts {
  return {
    discovered: 0,
    researched: 0,
    summarized: 0,
    verified: 0,
    failed: 0,
  };
}
