import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { BullModule } from '@nestjs/bullmq';
import { CampaignsModule } from './campaigns/campaigns.module';
import { MetricsModule } from './common/metrics.module';
import { ExecutionSettingsModule } from './config/execution-settings.module';
import { HealthModule } from './health/health.module';

function databaseOptions(configService: ConfigService): TypeOrmModuleOptions {
  const common = {
    autoLoadEntities: true,
    synchronize: configService.get<string>('DB_SYNCHRONIZE', 'true') === 'true',
  };
  if (configService.get<string>('DB_TYPE', 'postgres') === 'better-sqlite3') {
    return {
      ...common,
      type: 'better-sqlite3',
      database: configService.get<string>('DATABASE_PATH', 'campaigns.sqlite'),
    };
  }
  return {
    ...common,
    type: 'postgres',
    url: configService.get<string>('DATABASE_URL'),
  };
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    LoggerModule.forRoot({
      pinoHttp: {
        transport:
          process.env.NODE_ENV !== 'production'
            ? { target: 'pino-pretty', options: { colorize: true } }
            : undefined,
        redact: [
          '[*].email',
          '[*].phone',
          '[*].contactChannel',
          '[*].profile.email',
          '[*].profile.phone',
        ],
      },
    }),
    PrometheusModule.register({
      path: '/metrics',
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: databaseOptions,
      inject: [ConfigService],
    }),
    BullModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        connection: {
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: Number(configService.get<string>('REDIS_PORT', '6379')),
        },
      }),
      inject: [ConfigService],
    }),
    ExecutionSettingsModule,
    MetricsModule,
    CampaignsModule,
    HealthModule,
  ],
})
export class AppModule {}
