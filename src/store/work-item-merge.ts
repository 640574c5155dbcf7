import type { WorkItem } from './entities/work-item.entity';
import type { WorkItemUpsert } from './interfaces/campaign-repository.interface';
import { ProcessingStage, stageRank } from './interfaces/campaign-state.interface';

/**
 * Whether an incoming upsert may replace the stored item. Failed items are
 * frozen and stages never move backwards; the same stage may be rewritten.
 */
export function canApplyWorkItem(
  stored: Pick<WorkItem, 'stage'>,
  incoming: Pick<WorkItemUpsert, 'stage'>,
): boolean {
  if (stored.stage === ProcessingStage.FAILED) return false;
  if (incoming.stage === ProcessingStage.FAILED) return true;
  return stageRank(incoming.stage) >= stageRank(stored.stage);
}

/** Strips storage-assigned fields so a stored item can be advanced again. */
export function toWorkItemUpsert(item: WorkItem): WorkItemUpsert {
  return {
    campaignId: item.campaignId,
    unitId: item.unitId,
    unitRank: item.unitRank,
    externalId: item.externalId,
    ordinal: item.ordinal,
    stage: item.stage,
    name: item.name,
    contactChannel: item.contactChannel,
    payload: item.payload,
    failureKind: item.failureKind,
    failureReason: item.failureReason,
    failedStage: item.failedStage,
  };
}
