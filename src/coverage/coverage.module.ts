import { Module } from '@nestjs/common';
import { CoveragePlanner } from './coverage-planner.service';
import { JsonDensityTableSource } from './json-density-table.source';
import { DENSITY_TABLE_SOURCE } from './interfaces/coverage.interface';

@Module({
  providers: [
    CoveragePlanner,
    {
      provide: DENSITY_TABLE_SOURCE,
      useFactory: () => new JsonDensityTableSource(),
    },
  ],
  exports: [CoveragePlanner, DENSITY_TABLE_SOURCE],
})
export class CoverageModule {}
