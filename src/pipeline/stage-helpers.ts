import type { Denial } from '../scheduler/interfaces/scheduler.interface';
import type { WorkItemUpsert } from '../store/interfaces/campaign-repository.interface';
import {
  FailureKind,
  ProcessingStage,
  stageRank,
} from '../store/interfaces/campaign-state.interface';
import type { StageName, StageResult } from './interfaces/stage.interface';

/** True when running the stage again would change nothing. */
export function alreadyAt(item: WorkItemUpsert, stage: ProcessingStage): boolean {
  return (
    item.stage === ProcessingStage.FAILED ||
    stageRank(item.stage) >= stageRank(stage)
  );
}

export function halted(denial: Denial): StageResult {
  return { kind: 'halted', reason: denial.reason, detail: denial.detail };
}

export function failed(
  item: WorkItemUpsert,
  stage: StageName,
  kind: FailureKind,
  reason: string,
): StageResult {
  return {
    kind: 'failed',
    item: {
      ...item,
      stage: ProcessingStage.FAILED,
      failureKind: kind,
      failureReason: reason,
      failedStage: stage,
    },
    failure: { kind, reason },
  };
}
