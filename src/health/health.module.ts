import { Module } from '@nestjs/common';
import { CapabilitiesModule } from '../capabilities/capabilities.module';
import { HealthController } from './health.controller';

@Module({
  imports: [CapabilitiesModule],
  controllers: [HealthController],
})
export class HealthModule {}
