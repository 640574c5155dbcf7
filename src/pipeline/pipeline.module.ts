import { Module } from '@nestjs/common';
import { CapabilitiesModule } from '../capabilities/capabilities.module';
import { DiscoverStage } from './stages/discover.stage';
import { ResearchStage } from './stages/research.stage';
import { SummarizeStage } from './stages/summarize.stage';
import { VerifyStage } from './stages/verify.stage';

@Module({
  imports: [CapabilitiesModule],
  providers: [DiscoverStage, ResearchStage, SummarizeStage, VerifyStage],
  exports: [DiscoverStage, ResearchStage, SummarizeStage, VerifyStage],
})
export class PipelineModule {}
