import { Module } from '@nestjs/common';
import { CoverageModule } from '../coverage/coverage.module';
import { ExecutionModule } from '../execution/execution.module';
import { StoreModule } from '../store/store.module';
import { CampaignsController } from './campaigns.controller';
import { CampaignsService } from './campaigns.service';

@Module({
  imports: [CoverageModule, StoreModule, ExecutionModule],
  controllers: [CampaignsController],
  providers: [CampaignsService],
  exports: [CampaignsService],
})
export class CampaignsModule {}
