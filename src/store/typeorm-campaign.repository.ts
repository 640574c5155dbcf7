import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, IsNull, LessThan, Not, Repository } from 'typeorm';
import { InfrastructureError } from '../common/errors';
import type { CoverageUnit } from '../coverage/interfaces/coverage.interface';
import type {
  LedgerDelta,
  LedgerEntry,
} from '../scheduler/interfaces/scheduler.interface';
import { BudgetLedgerEntry } from './entities/budget-ledger-entry.entity';
import { Campaign } from './entities/campaign.entity';
import { Checkpoint } from './entities/checkpoint.entity';
import { CoverageUnitRecord } from './entities/coverage-unit.entity';
import { WorkItem } from './entities/work-item.entity';
import {
  CampaignRepository,
  CampaignUpsert,
  CheckpointState,
  emptyStageCounts,
  StageCounts,
  UnitFailure,
  WorkItemUpsert,
} from './interfaces/campaign-repository.interface';
import {
  CampaignStatus,
  ProcessingStage,
} from './interfaces/campaign-state.interface';
import { canApplyWorkItem } from './work-item-merge';

@Injectable()
export class TypeOrmCampaignRepository implements CampaignRepository {
  private readonly logger = new Logger(TypeOrmCampaignRepository.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
    @InjectRepository(Campaign)
    private readonly campaigns: Repository<Campaign>,
    @InjectRepository(CoverageUnitRecord)
    private readonly units: Repository<CoverageUnitRecord>,
    @InjectRepository(WorkItem)
    private readonly items: Repository<WorkItem>,
    @InjectRepository(Checkpoint)
    private readonly checkpoints: Repository<Checkpoint>,
    @InjectRepository(BudgetLedgerEntry)
    private readonly ledger: Repository<BudgetLedgerEntry>,
  ) {}

  upsertCampaign(campaign: CampaignUpsert): Promise<Campaign> {
    return this.guard('upsertCampaign', async () => {
      const existing = await this.campaigns.findOne({ where: { id: campaign.id } });
      const merged = existing
        ? this.campaigns.merge(existing, campaign)
        : this.campaigns.create(campaign);
      return this.campaigns.save(merged);
    });
  }

  getCampaign(campaignId: string): Promise<Campaign | null> {
    return this.guard('getCampaign', () =>
      this.campaigns.findOne({ where: { id: campaignId } }),
    );
  }

  saveCoveragePlan(campaignId: string, units: readonly CoverageUnit[]): Promise<void> {
    return this.guard('saveCoveragePlan', async () => {
      await this.dataSource.transaction(async (manager) => {
        await manager.delete(CoverageUnitRecord, { campaignId });
        await manager.save(
          CoverageUnitRecord,
          units.map((unit) =>
            manager.create(CoverageUnitRecord, {
              campaignId,
              unitId: unit.id,
              regionKey: unit.regionKey,
              label: unit.label,
              densityClass: unit.densityClass,
              expectedCount: unit.expectedCount,
              weight: unit.weight,
              rank: unit.rank,
            }),
          ),
        );
      });
    });
  }

  loadCoveragePlan(campaignId: string): Promise<CoverageUnit[]> {
    return this.guard('loadCoveragePlan', async () => {
      const records = await this.units.find({
        where: { campaignId },
        order: { rank: 'ASC' },
      });
      return records.map((record) => ({
        id: record.unitId,
        regionKey: record.regionKey,
        label: record.label,
        densityClass: record.densityClass,
        expectedCount: record.expectedCount,
        weight: record.weight,
        rank: record.rank,
      }));
    });
  }

  recordUnitFailure(campaignId: string, unitId: string, reason: string): Promise<void> {
    return this.guard('recordUnitFailure', async () => {
      await this.units.update(
        { campaignId, unitId },
        { discoveryFailure: reason.slice(0, 500), discoveryFailedAt: new Date() },
      );
    });
  }

  listUnitFailures(campaignId: string): Promise<UnitFailure[]> {
    return this.guard('listUnitFailures', async () => {
      const records = await this.units.find({
        where: { campaignId, discoveryFailure: Not(IsNull()) },
        order: { rank: 'ASC' },
      });
      return records.flatMap((record) =>
        record.discoveryFailure !== null && record.discoveryFailedAt !== null
          ? [
              {
                unitId: record.unitId,
                rank: record.rank,
                reason: record.discoveryFailure,
                failedAt: record.discoveryFailedAt,
              },
            ]
          : [],
      );
    });
  }

  upsertWorkItem(item: WorkItemUpsert): Promise<WorkItem> {
    return this.guard('upsertWorkItem', async () => {
      const existing = await this.items.findOne({
        where: { campaignId: item.campaignId, externalId: item.externalId },
      });
      if (!existing) {
        return this.items.save(this.items.create(item));
      }
      if (!canApplyWorkItem(existing, item)) {
        this.logger.debug(
          `Ignoring ${item.stage} for ${item.externalId}: stored stage is ${existing.stage}`,
        );
        return existing;
      }
      return this.items.save(this.items.merge(existing, item));
    });
  }

  listUnitItems(campaignId: string, unitId: string): Promise<WorkItem[]> {
    return this.guard('listUnitItems', () =>
      this.items.find({
        where: { campaignId, unitId },
        order: { ordinal: 'ASC' },
      }),
    );
  }

  listResults(campaignId: string, limit: number, offset: number): Promise<WorkItem[]> {
    return this.guard('listResults', () =>
      this.items.find({
        where: { campaignId },
        order: { unitRank: 'ASC', ordinal: 'ASC' },
        take: limit,
        skip: offset,
      }),
    );
  }

  countItemsByStage(campaignId: string): Promise<StageCounts> {
    return this.guard('countItemsByStage', async () => {
      const rows = await this.items
        .createQueryBuilder('item')
        .select('item.stage', 'stage')
        .addSelect('COUNT(*)', 'count')
        .where('item.campaignId = :campaignId', { campaignId })
        .groupBy('item.stage')
        .getRawMany<{ stage: string; count: string | number }>();

      const counts = emptyStageCounts();
      for (const row of rows) {
        const stage = Object.values(ProcessingStage).find((value) => value === row.stage);
        if (stage) counts[stage] = Number(row.count);
      }
      return counts;
    });
  }

  writeCheckpoint(checkpoint: CheckpointState): Promise<void> {
    return this.guard('writeCheckpoint', async () => {
      await this.checkpoints.save(this.checkpoints.create(checkpoint));
    });
  }

  readCheckpoint(campaignId: string): Promise<Checkpoint | null> {
    return this.guard('readCheckpoint', () =>
      this.checkpoints.findOne({ where: { campaignId } }),
    );
  }

  async recordCost(campaignId: string, delta: LedgerDelta): Promise<void> {
    if (!(delta.cost >= 0)) {
      throw new RangeError(`Cost delta must be non-negative, got ${delta.cost}`);
    }

    await this.guard('recordCost', () =>
      this.dataSource.transaction(async (manager) => {
        const entry =
          (await manager.findOne(BudgetLedgerEntry, {
            where: { campaignId, capability: delta.capability },
          })) ??
          manager.create(BudgetLedgerEntry, {
            campaignId,
            capability: delta.capability,
            callsMade: 0,
            failures: 0,
            costAccrued: 0,
            lastCallAt: null,
          });

        entry.callsMade += delta.calls;
        entry.failures += delta.failures;
        entry.costAccrued += delta.cost;
        entry.lastCallAt = delta.at;
        await manager.save(BudgetLedgerEntry, entry);

        if (delta.cost > 0) {
          await manager.increment(Campaign, { id: campaignId }, 'costSpent', delta.cost);
        }
      }),
    );
  }

  readLedger(campaignId: string): Promise<LedgerEntry[]> {
    return this.guard('readLedger', async () => {
      const rows = await this.ledger.find({
        where: { campaignId },
        order: { capability: 'ASC' },
      });
      return rows.map((row) => ({
        capability: row.capability,
        callsMade: row.callsMade,
        failures: row.failures,
        costAccrued: row.costAccrued,
        lastCallAt: row.lastCallAt,
      }));
    });
  }

  findStalledCampaigns(before: Date): Promise<Campaign[]> {
    return this.guard('findStalledCampaigns', () =>
      this.campaigns.find({
        where: [
          { status: CampaignStatus.RUNNING, heartbeatAt: LessThan(before) },
          { status: CampaignStatus.RUNNING, heartbeatAt: IsNull() },
        ],
      }),
    );
  }

  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error: unknown) {
      if (error instanceof InfrastructureError) throw error;
      throw new InfrastructureError(operation, error);
    }
  }
}
