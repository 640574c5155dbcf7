import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  EXECUTION_SETTINGS,
  parseExecutionSettings,
} from './execution.settings';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: EXECUTION_SETTINGS,
      useFactory: (configService: ConfigService) =>
        parseExecutionSettings((key) => configService.get<string>(key)),
      inject: [ConfigService],
    },
  ],
  exports: [EXECUTION_SETTINGS],
})
export class ExecutionSettingsModule {}
