import type {
  CampaignStatus,
  FailureKind,
  ProcessingStage,
  StatusReason,
  WorkItemPayload,
} from '../../store/interfaces/campaign-state.interface';
import type {
  StageCounts,
  UnitFailure,
} from '../../store/interfaces/campaign-repository.interface';

export interface CampaignStatusView {
  id: string;
  status: CampaignStatus;
  statusReason: StatusReason | null;
  statusDetail: string | null;
  pendingControl: string | null;
  regionKey: string;
  regionLabel: string | null;
  keywords: string[];
  profile: string;
  unitsProcessed: number;
  unitsPlanned: number;
  costSpent: number;
  costCeiling: number;
  estimatedCost: number;
  itemsByStage: StageCounts;
  /** Units skipped because discovery failed */
  failedUnits: UnitFailure[];
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  heartbeatAt: Date | null;
}

export interface CampaignResultView {
  externalId: string;
  unitId: string;
  name: string;
  contactChannel: string;
  stage: ProcessingStage;
  failureKind: FailureKind | null;
  failureReason: string | null;
  failedStage: string | null;
  payload: WorkItemPayload;
}

export interface CampaignResultsPage {
  campaignId: string;
  limit: number;
  offset: number;
  items: CampaignResultView[];
}
