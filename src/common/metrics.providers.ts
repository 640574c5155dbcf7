import {
  makeCounterProvider,
  makeHistogramProvider,
} from '@willsoto/nestjs-prometheus';

export const WORK_ITEMS_PROCESSED_TOTAL = 'work_items_processed_total';
export const EXTERNAL_CALL_COST_TOTAL = 'external_call_cost_total';
export const SCHEDULER_DENIALS_TOTAL = 'scheduler_denials_total';
export const CAMPAIGNS_FINISHED_TOTAL = 'campaigns_finished_total';
export const STAGE_DURATION_SECONDS = 'stage_duration_seconds';

export const metricsProviders = [
  makeCounterProvider({
    name: WORK_ITEMS_PROCESSED_TOTAL,
    help: 'Work item stage executions by outcome',
    labelNames: ['stage', 'outcome'],
  }),
  makeCounterProvider({
    name: EXTERNAL_CALL_COST_TOTAL,
    help: 'Accumulated external provider cost in USD',
    labelNames: ['capability'],
  }),
  makeCounterProvider({
    name: SCHEDULER_DENIALS_TOTAL,
    help: 'Grants refused by the rate budget scheduler',
    labelNames: ['reason'],
  }),
  makeCounterProvider({
    name: CAMPAIGNS_FINISHED_TOTAL,
    help: 'Drive loops that ended, by resulting status',
    labelNames: ['status', 'reason'],
  }),
  makeHistogramProvider({
    name: STAGE_DURATION_SECONDS,
    help: 'Duration of a single pipeline stage execution in seconds',
    labelNames: ['stage'],
    buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  }),
];
