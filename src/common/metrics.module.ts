import { Global, Module } from '@nestjs/common';
import { metricsProviders } from './metrics.providers';

/** Registers each metric once for the whole application. */
@Global()
@Module({
  providers: [...metricsProviders],
  exports: [...metricsProviders],
})
export class MetricsModule {}
