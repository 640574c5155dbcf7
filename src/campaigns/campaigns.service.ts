import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { InvalidRegionError } from '../common/errors';
import {
  EXECUTION_SETTINGS,
  ExecutionSettings,
} from '../config/execution.settings';
import { CoveragePlan } from '../coverage/coverage-plan';
import { CoveragePlanner } from '../coverage/coverage-planner.service';
import {
  CoverageProfile,
  DENSITY_TABLE_SOURCE,
  DensityTableSource,
  RegionDescriptor,
} from '../coverage/interfaces/coverage.interface';
import { CampaignRunQueue } from '../execution/campaign-run.queue';
import { ExecutionControl } from '../execution/execution-control';
import { estimateCampaignCost } from '../scheduler/cost-estimator';
import type { Campaign } from '../store/entities/campaign.entity';
import type { WorkItem } from '../store/entities/work-item.entity';
import {
  CAMPAIGN_REPOSITORY,
  CampaignRepository,
} from '../store/interfaces/campaign-repository.interface';
import {
  CampaignStatus,
  ControlRequest,
  StatusReason,
} from '../store/interfaces/campaign-state.interface';
import { CreateCampaignDto } from './dto/create-campaign.dto';
import {
  CampaignResultsPage,
  CampaignResultView,
  CampaignStatusView,
} from './interfaces/campaign-view.interface';

export const DEFAULT_RESULTS_LIMIT = 50;

/**
 * Lifecycle operations offered to the front end. Transitions are validated
 * here; the drive loop itself runs in the execution queue.
 */
@Injectable()
export class CampaignsService {
  private readonly logger = new Logger(CampaignsService.name);

  constructor(
    @Inject(CAMPAIGN_REPOSITORY)
    private readonly repository: CampaignRepository,
    @Inject(DENSITY_TABLE_SOURCE)
    private readonly densityTables: DensityTableSource,
    @Inject(EXECUTION_SETTINGS)
    private readonly settings: ExecutionSettings,
    private readonly planner: CoveragePlanner,
    private readonly runs: CampaignRunQueue,
    private readonly control: ExecutionControl,
  ) {}

  /** Plans and stores a pending campaign. Returns its id. */
  async create(dto: CreateCampaignDto): Promise<string> {
    const region: RegionDescriptor = {
      key: dto.region.trim(),
      label: dto.regionLabel?.trim() || undefined,
    };
    if (!region.key) {
      throw new BadRequestException(new InvalidRegionError(dto.region).message);
    }

    const keywords = [
      ...new Set(dto.keywords.map((keyword) => keyword.trim()).filter(Boolean)),
    ];
    if (keywords.length === 0) {
      throw new BadRequestException('At least one non-blank keyword is required');
    }

    const profile = dto.profile ?? CoverageProfile.AGGRESSIVE;
    const plan = await this.planFor(region, keywords, profile, dto.maxUnits);
    const estimate = estimateCampaignCost(plan.units, this.settings);
    const id = uuidv4();

    await this.repository.upsertCampaign({
      id,
      regionKey: region.key,
      regionLabel: region.label ?? null,
      keywords,
      profile,
      costCeiling: dto.costCeiling,
      estimatedCost: estimate.total,
      status: CampaignStatus.PENDING,
      unitsPlanned: plan.size,
    });
    await this.repository.saveCoveragePlan(id, plan.units);

    this.logger.log(
      `Created campaign ${id} for ${region.key}: ${plan.size} units, estimated cost ${estimate.total}`,
    );
    return id;
  }

  async start(campaignId: string): Promise<CampaignStatusView> {
    const campaign = await this.findOrFail(campaignId);
    if (campaign.status !== CampaignStatus.PENDING) {
      throw new ConflictException(
        `Campaign ${campaignId} is ${campaign.status}; only pending campaigns can start`,
      );
    }

    await this.repository.upsertCampaign({
      id: campaignId,
      status: CampaignStatus.RUNNING,
      startedAt: new Date(),
      controlRequest: null,
    });
    await this.runs.enqueue(campaignId);
    return this.getStatus(campaignId);
  }

  /**
   * Asks the drive loop to stop after the items in flight. The status turns
   * `paused` once the loop has persisted its checkpoint.
   */
  async pause(campaignId: string): Promise<CampaignStatusView> {
    const campaign = await this.findOrFail(campaignId);
    if (campaign.status !== CampaignStatus.RUNNING) {
      throw new ConflictException(
        `Campaign ${campaignId} is ${campaign.status}; only running campaigns can pause`,
      );
    }
    if (campaign.controlRequest === ControlRequest.CANCEL) {
      throw new ConflictException(`Campaign ${campaignId} is being cancelled`);
    }

    await this.repository.upsertCampaign({
      id: campaignId,
      controlRequest: ControlRequest.PAUSE,
    });
    this.control.request(campaignId, ControlRequest.PAUSE);
    return this.getStatus(campaignId);
  }

  /** Restarts a paused campaign, or one halted by a storage failure. */
  async resume(campaignId: string): Promise<CampaignStatusView> {
    const campaign = await this.findOrFail(campaignId);
    const resumable =
      campaign.status === CampaignStatus.PAUSED ||
      (campaign.status === CampaignStatus.FAILED &&
        campaign.statusReason === StatusReason.INFRASTRUCTURE_ERROR);
    if (!resumable) {
      throw new ConflictException(
        `Campaign ${campaignId} is ${campaign.status}${campaign.statusReason ? ` (${campaign.statusReason})` : ''} and cannot resume`,
      );
    }

    await this.repository.upsertCampaign({
      id: campaignId,
      status: CampaignStatus.RUNNING,
      statusReason: null,
      statusDetail: null,
      controlRequest: null,
      completedAt: null,
    });
    await this.runs.enqueue(campaignId);
    return this.getStatus(campaignId);
  }

  /**
   * Terminal stop. A running campaign is cancelled by its drive loop; a
   * pending or paused one has none, so it is failed here.
   */
  async cancel(campaignId: string): Promise<CampaignStatusView> {
    const campaign = await this.findOrFail(campaignId);

    switch (campaign.status) {
      case CampaignStatus.RUNNING:
        await this.repository.upsertCampaign({
          id: campaignId,
          controlRequest: ControlRequest.CANCEL,
        });
        this.control.request(campaignId, ControlRequest.CANCEL);
        break;
      case CampaignStatus.PENDING:
      case CampaignStatus.PAUSED:
        await this.repository.upsertCampaign({
          id: campaignId,
          status: CampaignStatus.FAILED,
          statusReason: StatusReason.CANCELLED,
          controlRequest: null,
          completedAt: new Date(),
        });
        break;
      default:
        throw new ConflictException(
          `Campaign ${campaignId} is already ${campaign.status}`,
        );
    }
    return this.getStatus(campaignId);
  }

  async getStatus(campaignId: string): Promise<CampaignStatusView> {
    const campaign = await this.findOrFail(campaignId);
    const [itemsByStage, failedUnits] = await Promise.all([
      this.repository.countItemsByStage(campaignId),
      this.repository.listUnitFailures(campaignId),
    ]);

    return {
      id: campaign.id,
      status: campaign.status,
      statusReason: campaign.statusReason,
      statusDetail: campaign.statusDetail,
      pendingControl: campaign.controlRequest,
      regionKey: campaign.regionKey,
      regionLabel: campaign.regionLabel,
      keywords: campaign.keywords,
      profile: campaign.profile,
      unitsProcessed: campaign.unitsProcessed,
      unitsPlanned: campaign.unitsPlanned,
      costSpent: campaign.costSpent,
      costCeiling: campaign.costCeiling,
      estimatedCost: campaign.estimatedCost,
      itemsByStage,
      failedUnits,
      createdAt: campaign.createdAt,
      startedAt: campaign.startedAt,
      completedAt: campaign.completedAt,
      heartbeatAt: campaign.heartbeatAt,
    };
  }

  /** Limit is clamped to [1, max] and offset to >= 0; failed items included. */
  async listResults(
    campaignId: string,
    limit: number = DEFAULT_RESULTS_LIMIT,
    offset = 0,
  ): Promise<CampaignResultsPage> {
    await this.findOrFail(campaignId);
    const boundedLimit = clamp(Math.trunc(limit), 1, this.settings.resultsMaxLimit);
    const boundedOffset = Math.max(0, Math.trunc(offset));

    const items = await this.repository.listResults(
      campaignId,
      boundedLimit,
      boundedOffset,
    );
    return {
      campaignId,
      limit: boundedLimit,
      offset: boundedOffset,
      items: items.map(toResultView),
    };
  }

  private async planFor(
    region: RegionDescriptor,
    keywords: readonly string[],
    profile: CoverageProfile,
    maxUnits?: number,
  ): Promise<CoveragePlan> {
    const table = await this.densityTables.lookup(region);
    try {
      return this.planner.plan(region, keywords, table, { profile, maxUnits });
    } catch (error: unknown) {
      if (!(error instanceof InvalidRegionError)) throw error;
      this.logger.warn(
        `No density data for ${region.key}; planning a single unknown-density unit`,
      );
      return this.planner.fallbackPlan(region, this.settings.fallbackExpectedCount);
    }
  }

  private async findOrFail(campaignId: string): Promise<Campaign> {
    const campaign = await this.repository.getCampaign(campaignId);
    if (!campaign) {
      throw new NotFoundException(`Campaign ${campaignId} not found`);
    }
    return campaign;
  }
}

function toResultView(item: WorkItem): CampaignResultView {
  return {
    externalId: item.externalId,
    unitId: item.unitId,
    name: item.name,
    contactChannel: item.contactChannel,
    stage: item.stage,
    failureKind: item.failureKind,
    failureReason: item.failureReason,
    failedStage: item.failedStage,
    payload: item.payload,
  };
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}
