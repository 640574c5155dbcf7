import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CapabilityError,
  describeError,
  ProviderThrottledError,
} from '../../common/errors';
import {
  EXECUTION_SETTINGS,
  ExecutionSettings,
} from '../../config/execution.settings';
import {
  DISCOVERY_PROVIDER,
  DiscoveryProvider,
  RawRecord,
} from '../../capabilities/interfaces/capabilities.interface';
import { expectedUnitRecords } from '../../scheduler/cost-estimator';
import { Capability } from '../../scheduler/interfaces/scheduler.interface';
import type { WorkItemUpsert } from '../../store/interfaces/campaign-repository.interface';
import {
  FailureKind,
  ProcessingStage,
} from '../../store/interfaces/campaign-state.interface';
import type { DiscoverResult, StageContext } from '../interfaces/stage.interface';

/**
 * Turns a coverage unit into work items. Records without a contact channel
 * are excluded, as are repeats of an external id within the unit.
 */
@Injectable()
export class DiscoverStage {
  private readonly logger = new Logger(DiscoverStage.name);

  constructor(
    @Inject(DISCOVERY_PROVIDER)
    private readonly provider: DiscoveryProvider,
    @Inject(EXECUTION_SETTINGS)
    private readonly settings: ExecutionSettings,
  ) {}

  async run(ctx: StageContext): Promise<DiscoverResult> {
    const { unit } = ctx;
    const maxResults = this.settings.discoveryMaxResultsPerUnit;
    const perRecord = this.settings.capabilities[Capability.DISCOVERY].estimatedCost;

    let records: RawRecord[];
    try {
      const result = await ctx.scheduler.execute(
        Capability.DISCOVERY,
        expectedUnitRecords(unit, this.settings) * perRecord,
        () => this.provider.search(unit, ctx.keywords, { maxResults }),
        (found) => Math.min(found.length, maxResults) * perRecord,
        { signal: ctx.signal },
      );
      if (!result.granted) {
        return { kind: 'halted', reason: result.reason, detail: result.detail };
      }
      records = result.value.slice(0, maxResults);
    } catch (error: unknown) {
      if (error instanceof ProviderThrottledError) {
        return {
          kind: 'failed',
          failure: { kind: FailureKind.PROVIDER_THROTTLED, reason: error.message },
        };
      }
      if (error instanceof CapabilityError) {
        return {
          kind: 'failed',
          failure: { kind: FailureKind.DISCOVERY_FAILED, reason: describeError(error) },
        };
      }
      throw error;
    }

    const seen = new Set<string>();
    const items: WorkItemUpsert[] = [];
    let excluded = 0;

    for (const record of records) {
      const email = record.email?.trim().toLowerCase();
      if (!email || seen.has(record.externalId)) {
        excluded++;
        continue;
      }
      seen.add(record.externalId);
      items.push({
        campaignId: ctx.campaignId,
        unitId: unit.id,
        unitRank: unit.rank,
        externalId: record.externalId,
        ordinal: items.length,
        stage: ProcessingStage.DISCOVERED,
        name: record.name,
        contactChannel: email,
        payload: { profile: { ...record, email } },
        failureKind: null,
        failureReason: null,
        failedStage: null,
      });
    }

    this.logger.log(
      `Unit ${unit.id}: ${items.length} items discovered, ${excluded} excluded`,
    );
    return { kind: 'discovered', items, excluded };
  }
}
