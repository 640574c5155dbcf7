import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { describeError } from '../common/errors';
import {
  EXECUTION_SETTINGS,
  ExecutionSettings,
} from '../config/execution.settings';
import {
  CAMPAIGN_REPOSITORY,
  CampaignRepository,
} from '../store/interfaces/campaign-repository.interface';
import { CampaignRunQueue } from './campaign-run.queue';
import { ExecutionControl } from './execution-control';

/**
 * Re-enqueues running campaigns whose heartbeat has gone quiet, so a crashed
 * drive loop resumes from its checkpoint.
 */
@Injectable()
export class StalledCampaignMonitor implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(StalledCampaignMonitor.name);
  private timer: NodeJS.Timeout | null = null;

  constructor(
    @Inject(CAMPAIGN_REPOSITORY)
    private readonly repository: CampaignRepository,
    @Inject(EXECUTION_SETTINGS)
    private readonly settings: ExecutionSettings,
    private readonly runs: CampaignRunQueue,
    private readonly control: ExecutionControl,
  ) {}

  onModuleInit(): void {
    if (!this.settings.stallMonitorEnabled) {
      this.logger.log('Stalled campaign monitor disabled');
      return;
    }
    this.timer = setInterval(
      () => void this.sweep(),
      this.settings.stallCheckIntervalMs,
    );
    this.timer.unref();
  }

  onModuleDestroy(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  /** Returns the ids of the campaigns re-enqueued. Never rejects. */
  async sweep(now: Date = new Date()): Promise<string[]> {
    const before = new Date(now.getTime() - this.settings.stallThresholdMs);
    const recovered: string[] = [];

    try {
      const stalled = await this.repository.findStalledCampaigns(before);
      for (const campaign of stalled) {
        if (this.control.isRunning(campaign.id)) continue;
        await this.runs.enqueue(campaign.id);
        recovered.push(campaign.id);
        this.logger.warn(
          `Campaign ${campaign.id} stalled (last heartbeat ${campaign.heartbeatAt?.toISOString() ?? 'never'}), re-enqueued`,
        );
      }
    } catch (error: unknown) {
      this.logger.error(`Stalled campaign sweep failed: ${describeError(error)}`);
    }
    return recovered;
  }
}
