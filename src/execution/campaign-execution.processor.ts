import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job } from 'bullmq';
import { CampaignExecutionEngine, RunOutcome } from './campaign-execution.engine';
import {
  CAMPAIGN_EXECUTION_QUEUE,
  RunCampaignJobData,
} from './execution.constants';

@Processor(CAMPAIGN_EXECUTION_QUEUE)
export class CampaignExecutionProcessor extends WorkerHost {
  private readonly logger = new Logger(CampaignExecutionProcessor.name);

  constructor(private readonly engine: CampaignExecutionEngine) {
    super();
  }

  async process(
    job: Job<RunCampaignJobData, RunOutcome, string>,
  ): Promise<RunOutcome> {
    const { campaignId } = job.data;
    this.logger.log(`Running campaign ${campaignId} (job ${job.id})`);

    const outcome = await this.engine.drive(campaignId);

    this.logger.log(
      `Campaign ${campaignId} run ended: ${outcome.status}${outcome.reason ? ` (${outcome.reason})` : ''}`,
    );
    return outcome;
  }
}
