import type {
  ConfidenceScore,
  RawRecord,
} from '../../capabilities/interfaces/capabilities.interface';

export enum CampaignStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  PAUSED = 'paused',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export const TERMINAL_STATUSES: readonly CampaignStatus[] = [
  CampaignStatus.COMPLETED,
  CampaignStatus.FAILED,
];

export enum StatusReason {
  PLAN_EXHAUSTED = 'PlanExhausted',
  BUDGET_EXHAUSTED = 'BudgetExhausted',
  CANCELLED = 'Cancelled',
  INFRASTRUCTURE_ERROR = 'InfrastructureError',
}

/** Persisted so a drive loop in another worker can observe it */
export enum ControlRequest {
  PAUSE = 'pause',
  CANCEL = 'cancel',
}

export enum ProcessingStage {
  DISCOVERED = 'discovered',
  RESEARCHED = 'researched',
  SUMMARIZED = 'summarized',
  VERIFIED = 'verified',
  FAILED = 'failed',
}

/** Forward order; `failed` sits outside it */
export const STAGE_ORDER: readonly ProcessingStage[] = [
  ProcessingStage.DISCOVERED,
  ProcessingStage.RESEARCHED,
  ProcessingStage.SUMMARIZED,
  ProcessingStage.VERIFIED,
];

export function stageRank(stage: ProcessingStage): number {
  return STAGE_ORDER.indexOf(stage);
}

export function isTerminalStage(stage: ProcessingStage): boolean {
  return stage === ProcessingStage.VERIFIED || stage === ProcessingStage.FAILED;
}

export enum FailureKind {
  PROVIDER_THROTTLED = 'ProviderThrottled',
  SUMMARIZATION_FAILED = 'SummarizationFailed',
  DISCOVERY_FAILED = 'DiscoveryFailed',
  UNEXPECTED = 'Unexpected',
}

export interface ResearchPage {
  url: string;
  title: string | null;
  text: string;
}

export interface ResearchPayload {
  pages: ResearchPage[];
  bytes: number;
  /** Why the research came back empty or partial; null when complete */
  degraded: string | null;
}

export interface SummaryPayload {
  pageSummaries: string[];
  subject: string;
  message: string;
}

export interface VerificationPayload {
  status: ConfidenceScore['status'] | 'error';
  score: number | null;
  safe: boolean;
  reason: string | null;
  checkedAt: string;
}

export interface WorkItemPayload {
  profile: RawRecord;
  research?: ResearchPayload;
  summary?: SummaryPayload;
  verification?: VerificationPayload;
}
