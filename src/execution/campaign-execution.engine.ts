import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import pLimit from 'p-limit';
import { Counter, Histogram } from 'prom-client';
import { describeError, InfrastructureError } from '../common/errors';
import {
  CAMPAIGNS_FINISHED_TOTAL,
  STAGE_DURATION_SECONDS,
  WORK_ITEMS_PROCESSED_TOTAL,
} from '../common/metrics.providers';
import {
  EXECUTION_SETTINGS,
  ExecutionSettings,
} from '../config/execution.settings';
import { CoveragePlan } from '../coverage/coverage-plan';
import type { CoverageUnit } from '../coverage/interfaces/coverage.interface';
import type {
  ItemStage,
  StageContext,
  StageResult,
} from '../pipeline/interfaces/stage.interface';
import { failed } from '../pipeline/stage-helpers';
import { DiscoverStage } from '../pipeline/stages/discover.stage';
import { ResearchStage } from '../pipeline/stages/research.stage';
import { SummarizeStage } from '../pipeline/stages/summarize.stage';
import { VerifyStage } from '../pipeline/stages/verify.stage';
import { itemReservationCost } from '../scheduler/cost-estimator';
import type { DenialReason } from '../scheduler/interfaces/scheduler.interface';
import { RateBudgetSchedulerFactory } from '../scheduler/rate-budget-scheduler.factory';
import type { RateBudgetScheduler } from '../scheduler/rate-budget.scheduler';
import type { Campaign } from '../store/entities/campaign.entity';
import {
  CAMPAIGN_REPOSITORY,
  CampaignRepository,
  CheckpointState,
  WorkItemUpsert,
} from '../store/interfaces/campaign-repository.interface';
import {
  CampaignStatus,
  ControlRequest,
  FailureKind,
  isTerminalStage,
  StatusReason,
} from '../store/interfaces/campaign-state.interface';
import { toWorkItemUpsert } from '../store/work-item-merge';
import { ExecutionControl, RunHandle } from './execution-control';

export interface RunOutcome {
  campaignId: string;
  status: CampaignStatus;
  reason: StatusReason | null;
  detail: string | null;
  unitsProcessed: number;
  costSpent: number;
}

/** Why a drive loop stopped before the plan ran out */
type Stop =
  | { kind: 'budget'; detail: string }
  | { kind: 'control'; request: ControlRequest };

interface ActiveRun {
  campaign: Campaign;
  handle: RunHandle;
  plan: CoveragePlan;
  scheduler: RateBudgetScheduler;
  /** Single writer: every store mutation of the run goes through it */
  write: ReturnType<typeof pLimit>;
  checkpoint: CheckpointState;
}

/** Shared by the workers of one unit */
interface UnitHalt {
  stop: Stop | null;
  failure: InfrastructureError | null;
}

/**
 * Drives a running campaign through its coverage plan.
 *
 * Units are processed one at a time in plan order. Within a unit, work items
 * run through research, summarize and verify on a bounded worker pool, and
 * every stage result is persisted before the checkpoint that counts it.
 */
@Injectable()
export class CampaignExecutionEngine {
  private readonly logger = new Logger(CampaignExecutionEngine.name);
  private readonly stages: readonly ItemStage[];

  constructor(
    @Inject(CAMPAIGN_REPOSITORY)
    private readonly repository: CampaignRepository,
    @Inject(EXECUTION_SETTINGS)
    private readonly settings: ExecutionSettings,
    private readonly schedulers: RateBudgetSchedulerFactory,
    private readonly control: ExecutionControl,
    private readonly discover: DiscoverStage,
    research: ResearchStage,
    summarize: SummarizeStage,
    verify: VerifyStage,
    @Optional()
    @InjectMetric(WORK_ITEMS_PROCESSED_TOTAL)
    private readonly itemsCounter?: Counter<string>,
    @Optional()
    @InjectMetric(CAMPAIGNS_FINISHED_TOTAL)
    private readonly finishedCounter?: Counter<string>,
    @Optional()
    @InjectMetric(STAGE_DURATION_SECONDS)
    private readonly stageDuration?: Histogram<string>,
  ) {
    this.stages = [research, summarize, verify];
  }

  /**
   * Runs the campaign's drive loop until the plan is exhausted, the budget
   * runs out, a pause or cancel is observed, or storage fails. Resolves with
   * the resulting campaign state; a campaign that is not running is left
   * untouched.
   */
  async drive(campaignId: string): Promise<RunOutcome> {
    const campaign = await this.repository.getCampaign(campaignId);
    if (!campaign) {
      throw new Error(`Campaign ${campaignId} not found`);
    }
    if (campaign.status !== CampaignStatus.RUNNING) {
      this.logger.warn(
        `Campaign ${campaignId} is ${campaign.status}, not driving it`,
      );
      return outcomeOf(campaign);
    }
    if (this.control.isRunning(campaignId)) {
      this.logger.warn(`Campaign ${campaignId} is already driven by this process`);
      return outcomeOf(campaign);
    }

    const handle = this.control.register(campaignId);
    let heartbeat: NodeJS.Timeout | undefined;
    try {
      const run = await this.prepare(campaign, handle);
      heartbeat = setInterval(
        () => void this.beat(run),
        this.settings.heartbeatIntervalMs,
      );
      const stop = await this.walk(run);
      return await this.conclude(run, stop);
    } catch (error: unknown) {
      if (!(error instanceof InfrastructureError)) throw error;
      return this.failForInfrastructure(campaign, error);
    } finally {
      if (heartbeat) clearInterval(heartbeat);
      this.control.unregister(handle);
    }
  }

  private async prepare(campaign: Campaign, handle: RunHandle): Promise<ActiveRun> {
    const campaignId = campaign.id;
    const [units, stored, ledger] = await Promise.all([
      this.repository.loadCoveragePlan(campaignId),
      this.repository.readCheckpoint(campaignId),
      this.repository.readLedger(campaignId),
    ]);

    const write = pLimit(1);
    const scheduler = this.schedulers.create({
      campaignId,
      costCeiling: campaign.costCeiling,
      initialSpent: campaign.costSpent,
      initialLedger: ledger,
      sink: (delta) => write(() => this.repository.recordCost(campaignId, delta)),
    });

    const checkpoint: CheckpointState = stored
      ? {
          campaignId,
          lastCompletedUnitId: stored.lastCompletedUnitId,
          currentUnitId: stored.currentUnitId,
          currentUnitDiscovered: stored.currentUnitDiscovered,
          itemsCompletedInUnit: stored.itemsCompletedInUnit,
          unitsCompleted: stored.unitsCompleted,
        }
      : {
          campaignId,
          lastCompletedUnitId: null,
          currentUnitId: null,
          currentUnitDiscovered: false,
          itemsCompletedInUnit: 0,
          unitsCompleted: 0,
        };

    await write(() =>
      this.repository.upsertCampaign({ id: campaignId, heartbeatAt: new Date() }),
    );
    this.logger.log(
      `Driving campaign ${campaignId}: ${units.length} units, ${checkpoint.unitsCompleted} already complete`,
    );

    return {
      campaign,
      handle,
      plan: new CoveragePlan(units),
      scheduler,
      write,
      checkpoint,
    };
  }

  private async walk(run: ActiveRun): Promise<Stop | null> {
    for (const unit of this.remainingUnits(run)) {
      const requested = await this.observeControl(run);
      if (requested) return { kind: 'control', request: requested };

      const stop = await this.processUnit(run, unit);
      if (stop) return stop;
      await this.completeUnit(run, unit);
    }
    return null;
  }

  /** The partially processed unit first, then every unit after it. */
  private *remainingUnits(run: ActiveRun): Generator<CoverageUnit> {
    const { currentUnitId, lastCompletedUnitId } = run.checkpoint;
    const current = currentUnitId === null ? undefined : run.plan.find(currentUnitId);
    if (current) {
      yield current;
      yield* run.plan.after(current.id);
      return;
    }
    yield* run.plan.after(lastCompletedUnitId);
  }

  private async processUnit(run: ActiveRun, unit: CoverageUnit): Promise<Stop | null> {
    const campaignId = run.campaign.id;
    const ctx: StageContext = {
      campaignId,
      keywords: run.campaign.keywords,
      unit,
      scheduler: run.scheduler,
      signal: run.handle.signal,
    };

    let items: WorkItemUpsert[];
    const { checkpoint } = run;
    if (checkpoint.currentUnitId === unit.id && checkpoint.currentUnitDiscovered) {
      const stored = await this.repository.listUnitItems(campaignId, unit.id);
      items = stored.map(toWorkItemUpsert);
    } else {
      const discovered = await this.discover.run(ctx);
      if (discovered.kind === 'halted') {
        return this.stopFor(run, discovered.reason, discovered.detail);
      }
      items = [];
      if (discovered.kind === 'failed') {
        // the unit is skipped, not retried on resume
        const reason = `${discovered.failure.kind}: ${discovered.failure.reason}`;
        this.itemsCounter?.inc({ stage: 'discover', outcome: 'failed' });
        this.logger.warn(
          `Discovery failed for campaign ${campaignId} unit ${unit.id}: ${reason}`,
        );
        await run.write(() =>
          this.repository.recordUnitFailure(campaignId, unit.id, reason),
        );
      } else {
        this.itemsCounter?.inc({ stage: 'discover', outcome: 'advanced' });
        for (const item of discovered.items) {
          const stored = await run.write(() => this.repository.upsertWorkItem(item));
          items.push(toWorkItemUpsert(stored));
        }
      }
      await this.saveCheckpoint(run, {
        currentUnitId: unit.id,
        currentUnitDiscovered: true,
        itemsCompletedInUnit: items.filter((item) => isTerminalStage(item.stage)).length,
      });
    }

    const halt: UnitHalt = { stop: null, failure: null };
    const pool = pLimit(this.settings.workerPoolSize);
    const results = await Promise.allSettled(
      items
        .filter((item) => !isTerminalStage(item.stage))
        .map((item) =>
          pool(async () => {
            try {
              await this.processItem(run, ctx, item, halt);
            } catch (error: unknown) {
              if (error instanceof InfrastructureError) {
                halt.failure = halt.failure ?? error;
              }
              throw error;
            }
          }),
        ),
    );
    if (halt.failure) throw halt.failure;
    for (const result of results) {
      if (result.status === 'rejected') throw result.reason;
    }

    if (halt.stop) return halt.stop;
    const requested = run.handle.requested;
    return requested ? { kind: 'control', request: requested } : null;
  }

  private async processItem(
    run: ActiveRun,
    ctx: StageContext,
    item: WorkItemUpsert,
    halt: UnitHalt,
  ): Promise<void> {
    if (halt.stop || halt.failure || run.handle.requested) return;

    const reserved = run.scheduler.reserve(itemReservationCost(this.settings));
    if (!reserved.granted) {
      halt.stop = halt.stop ?? { kind: 'budget', detail: reserved.detail };
      return;
    }

    const reservation = reserved.reservation;
    const itemCtx: StageContext = { ...ctx, reservation };
    let current = item;
    try {
      for (const stage of this.stages) {
        const result = await this.runStage(stage, current, itemCtx);
        if (result.kind === 'halted') {
          halt.stop = halt.stop ?? this.stopFor(run, result.reason, result.detail);
          return;
        }
        if (result.kind === 'skipped') continue;

        const next = result.item;
        current = toWorkItemUpsert(
          await run.write(() => this.repository.upsertWorkItem(next)),
        );
        this.itemsCounter?.inc({ stage: stage.name, outcome: result.kind });

        if (result.kind === 'failed') {
          this.logger.warn(
            `Item ${item.externalId} failed at ${stage.name} (campaign ${ctx.campaignId}, unit ${ctx.unit.id}): ${result.failure.kind}: ${result.failure.reason}`,
          );
          break;
        }
      }
    } finally {
      run.scheduler.settle(reservation);
    }

    if (isTerminalStage(current.stage)) {
      await this.saveCheckpoint(run, {
        itemsCompletedInUnit: run.checkpoint.itemsCompletedInUnit + 1,
      });
    }
  }

  /** Any error but a storage failure becomes an `Unexpected` item failure. */
  private async runStage(
    stage: ItemStage,
    item: WorkItemUpsert,
    ctx: StageContext,
  ): Promise<StageResult> {
    const endTimer = this.stageDuration?.startTimer({ stage: stage.name });
    try {
      return await stage.run(item, ctx);
    } catch (error: unknown) {
      if (error instanceof InfrastructureError) throw error;
      const reason = describeError(error);
      this.logger.error(
        `Stage ${stage.name} threw for item ${item.externalId} (campaign ${ctx.campaignId}, unit ${ctx.unit.id}): ${reason}`,
      );
      return failed(item, stage.name, FailureKind.UNEXPECTED, reason);
    } finally {
      endTimer?.();
    }
  }

  private async completeUnit(run: ActiveRun, unit: CoverageUnit): Promise<void> {
    const unitsCompleted = run.checkpoint.unitsCompleted + 1;
    await this.saveCheckpoint(run, {
      lastCompletedUnitId: unit.id,
      currentUnitId: null,
      currentUnitDiscovered: false,
      itemsCompletedInUnit: 0,
      unitsCompleted,
    });
    await run.write(() =>
      this.repository.upsertCampaign({
        id: run.campaign.id,
        unitsProcessed: unitsCompleted,
      }),
    );
    this.logger.log(
      `Campaign ${run.campaign.id}: unit ${unit.id} complete (${unitsCompleted}/${run.plan.size})`,
    );
  }

  /** Picks up a pause or cancel persisted by another process. */
  private async observeControl(run: ActiveRun): Promise<ControlRequest | null> {
    const stored = await this.repository.getCampaign(run.campaign.id);
    if (stored?.controlRequest) run.handle.request(stored.controlRequest);
    return run.handle.requested;
  }

  private stopFor(run: ActiveRun, reason: DenialReason, detail: string): Stop {
    if (reason === 'BudgetExceeded') return { kind: 'budget', detail };
    return {
      kind: 'control',
      request: run.handle.requested ?? ControlRequest.CANCEL,
    };
  }

  private async saveCheckpoint(
    run: ActiveRun,
    patch: Partial<Omit<CheckpointState, 'campaignId'>>,
  ): Promise<void> {
    const snapshot: CheckpointState = { ...run.checkpoint, ...patch };
    run.checkpoint = snapshot;
    await run.write(() => this.repository.writeCheckpoint(snapshot));
  }

  private async conclude(run: ActiveRun, stop: Stop | null): Promise<RunOutcome> {
    let status: CampaignStatus;
    let reason: StatusReason | null;
    let detail: string | null = null;

    if (!stop) {
      status = CampaignStatus.COMPLETED;
      reason = StatusReason.PLAN_EXHAUSTED;
    } else if (stop.kind === 'budget') {
      status = CampaignStatus.COMPLETED;
      reason = StatusReason.BUDGET_EXHAUSTED;
      detail = stop.detail;
    } else if (stop.request === ControlRequest.PAUSE) {
      status = CampaignStatus.PAUSED;
      reason = null;
    } else {
      status = CampaignStatus.FAILED;
      reason = StatusReason.CANCELLED;
    }

    const terminal = status !== CampaignStatus.PAUSED;
    const stored = await run.write(() =>
      this.repository.upsertCampaign({
        id: run.campaign.id,
        status,
        statusReason: reason,
        statusDetail: detail,
        controlRequest: null,
        completedAt: terminal ? new Date() : null,
      }),
    );

    this.finishedCounter?.inc({ status, reason: reason ?? 'none' });
    this.logger.log(
      `Campaign ${run.campaign.id} ${status}${reason ? ` (${reason})` : ''}: ${stored.unitsProcessed} units, cost ${stored.costSpent.toFixed(4)}`,
    );
    return outcomeOf(stored);
  }

  /**
   * Marks the campaign failed without touching its checkpoint, so a resume
   * replays from the last durable point. The status write may itself fail.
   */
  private async failForInfrastructure(
    campaign: Campaign,
    error: InfrastructureError,
  ): Promise<RunOutcome> {
    this.logger.error(`Campaign ${campaign.id} halted: ${error.message}`);
    this.finishedCounter?.inc({
      status: CampaignStatus.FAILED,
      reason: StatusReason.INFRASTRUCTURE_ERROR,
    });

    const failedState = {
      status: CampaignStatus.FAILED,
      statusReason: StatusReason.INFRASTRUCTURE_ERROR,
      statusDetail: error.message,
    };
    try {
      const stored = await this.repository.upsertCampaign({
        id: campaign.id,
        ...failedState,
      });
      return outcomeOf(stored);
    } catch (writeError: unknown) {
      this.logger.error(
        `Could not record failure of campaign ${campaign.id}: ${describeError(writeError)}`,
      );
      return outcomeOf({ ...campaign, ...failedState });
    }
  }

  private async beat(run: ActiveRun): Promise<void> {
    try {
      await run.write(() =>
        this.repository.upsertCampaign({ id: run.campaign.id, heartbeatAt: new Date() }),
      );
      await this.observeControl(run);
    } catch (error: unknown) {
      this.logger.warn(
        `Heartbeat failed for campaign ${run.campaign.id}: ${describeError(error)}`,
      );
    }
  }
}

function outcomeOf(campaign: Campaign): RunOutcome {
  return {
    campaignId: campaign.id,
    status: campaign.status,
    reason: campaign.statusReason,
    detail: campaign.statusDetail,
    unitsProcessed: campaign.unitsProcessed,
    costSpent: campaign.costSpent,
  };
}
