import { Module } from '@nestjs/common';
import { RateBudgetSchedulerFactory } from './rate-budget-scheduler.factory';

@Module({
  providers: [RateBudgetSchedulerFactory],
  exports: [RateBudgetSchedulerFactory],
})
export class SchedulerModule {}
