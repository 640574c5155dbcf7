import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { PipelineModule } from '../pipeline/pipeline.module';
import { SchedulerModule } from '../scheduler/scheduler.module';
import { StoreModule } from '../store/store.module';
import { CampaignExecutionEngine } from './campaign-execution.engine';
import { CampaignExecutionProcessor } from './campaign-execution.processor';
import { CampaignRunQueue } from './campaign-run.queue';
import { ExecutionControl } from './execution-control';
import { CAMPAIGN_EXECUTION_QUEUE } from './execution.constants';
import { StalledCampaignMonitor } from './stalled-campaign.monitor';

@Module({
  imports: [
    BullModule.registerQueue({ name: CAMPAIGN_EXECUTION_QUEUE }),
    StoreModule,
    SchedulerModule,
    PipelineModule,
  ],
  providers: [
    CampaignExecutionEngine,
    CampaignExecutionProcessor,
    CampaignRunQueue,
    ExecutionControl,
    StalledCampaignMonitor,
  ],
  exports: [CampaignExecutionEngine, CampaignRunQueue, ExecutionControl],
})
export class ExecutionModule {}
