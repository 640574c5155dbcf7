import { Inject, Injectable, Optional } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import {
  EXTERNAL_CALL_COST_TOTAL,
  SCHEDULER_DENIALS_TOTAL,
} from '../common/metrics.providers';
import {
  EXECUTION_SETTINGS,
  ExecutionSettings,
} from '../config/execution.settings';
import {
  RateBudgetScheduler,
  RateBudgetSchedulerOptions,
} from './rate-budget.scheduler';

export type SchedulerRunOptions = Omit<
  RateBudgetSchedulerOptions,
  'limits' | 'backoff' | 'onDenied' | 'onCost'
>;

/**
 * Builds one scheduler per campaign run so budgets never leak across
 * campaigns. Limits and backoff come from execution settings.
 */
@Injectable()
export class RateBudgetSchedulerFactory {
  constructor(
    @Inject(EXECUTION_SETTINGS)
    private readonly settings: ExecutionSettings,
    @Optional()
    @InjectMetric(SCHEDULER_DENIALS_TOTAL)
    private readonly denialsCounter?: Counter<string>,
    @Optional()
    @InjectMetric(EXTERNAL_CALL_COST_TOTAL)
    private readonly costCounter?: Counter<string>,
  ) {}

  create(options: SchedulerRunOptions): RateBudgetScheduler {
    return new RateBudgetScheduler({
      ...options,
      limits: this.settings.capabilities,
      backoff: this.settings.backoff,
      onDenied: (reason) => this.denialsCounter?.inc({ reason }),
      onCost: (capability, cost) =>
        this.costCounter?.inc({ capability }, cost),
    });
  }
}
