import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BudgetLedgerEntry } from './entities/budget-ledger-entry.entity';
import { Campaign } from './entities/campaign.entity';
import { Checkpoint } from './entities/checkpoint.entity';
import { CoverageUnitRecord } from './entities/coverage-unit.entity';
import { WorkItem } from './entities/work-item.entity';
import { CAMPAIGN_REPOSITORY } from './interfaces/campaign-repository.interface';
import { TypeOrmCampaignRepository } from './typeorm-campaign.repository';

export const STORE_ENTITIES = [
  Campaign,
  CoverageUnitRecord,
  WorkItem,
  Checkpoint,
  BudgetLedgerEntry,
];

@Module({
  imports: [TypeOrmModule.forFeature(STORE_ENTITIES)],
  providers: [
    {
      provide: CAMPAIGN_REPOSITORY,
      useClass: TypeOrmCampaignRepository,
    },
  ],
  exports: [CAMPAIGN_REPOSITORY],
})
export class StoreModule {}
