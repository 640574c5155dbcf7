export const CAMPAIGN_EXECUTION_QUEUE = 'campaign-execution';
export const RUN_CAMPAIGN_JOB = 'run-campaign';

/** Data payload for a drive loop job */
export interface RunCampaignJobData {
  campaignId: string;
}

/** One queued run per campaign at a time */
export function runJobId(campaignId: string): string {
  return `run-${campaignId}`;
}
