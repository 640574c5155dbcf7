import { InjectQueue } from '@nestjs/bullmq';
import { Injectable } from '@nestjs/common';
import { Queue } from 'bullmq';
import {
  CAMPAIGN_EXECUTION_QUEUE,
  RUN_CAMPAIGN_JOB,
  RunCampaignJobData,
  runJobId,
} from './execution.constants';

/** Enqueues drive loops. A campaign with a run already queued or active is not enqueued twice. */
@Injectable()
export class CampaignRunQueue {
  constructor(
    @InjectQueue(CAMPAIGN_EXECUTION_QUEUE)
    private readonly queue: Queue<RunCampaignJobData>,
  ) {}

  async enqueue(campaignId: string): Promise<void> {
    await this.queue.add(
      RUN_CAMPAIGN_JOB,
      { campaignId },
      {
        jobId: runJobId(campaignId),
        // Finished jobs must not keep the id, or the next run would be dropped
        removeOnComplete: true,
        removeOnFail: true,
      },
    );
  }
}
