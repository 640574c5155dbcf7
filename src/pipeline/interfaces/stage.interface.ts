import type { CoverageUnit } from '../../coverage/interfaces/coverage.interface';
import type { RateBudgetScheduler } from '../../scheduler/rate-budget.scheduler';
import type {
  DenialReason,
  Reservation,
} from '../../scheduler/interfaces/scheduler.interface';
import type { WorkItemUpsert } from '../../store/interfaces/campaign-repository.interface';
import type {
  FailureKind,
  ProcessingStage,
} from '../../store/interfaces/campaign-state.interface';

export type StageName = 'discover' | 'research' | 'summarize' | 'verify';

export interface StageContext {
  campaignId: string;
  keywords: readonly string[];
  unit: CoverageUnit;
  scheduler: RateBudgetScheduler;
  /** Aborted when the run is halted; checked before every acquire */
  signal: AbortSignal;
  /** The item's budget reservation, drawn down by its grants */
  reservation?: Reservation;
}

export interface StageFailure {
  kind: FailureKind;
  reason: string;
}

export type StageResult =
  | { kind: 'advanced'; item: WorkItemUpsert }
  /** Item already at or past this stage, or failed */
  | { kind: 'skipped'; item: WorkItemUpsert }
  | { kind: 'failed'; item: WorkItemUpsert; failure: StageFailure }
  | { kind: 'halted'; reason: DenialReason; detail: string };

/** A stage that moves one work item forward */
export interface ItemStage {
  readonly name: Exclude<StageName, 'discover'>;
  /** Stage an item reaches when this stage succeeds */
  readonly produces: ProcessingStage;
  run(item: WorkItemUpsert, ctx: StageContext): Promise<StageResult>;
}

export type DiscoverResult =
  | { kind: 'discovered'; items: WorkItemUpsert[]; excluded: number }
  | { kind: 'failed'; failure: StageFailure }
  | { kind: 'halted'; reason: DenialReason; detail: string };
