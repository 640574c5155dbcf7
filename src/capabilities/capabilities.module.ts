import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  EXECUTION_SETTINGS,
  ExecutionSettings,
} from '../config/execution.settings';
import {
  CONTENT_FETCHER,
  ContentFetcher,
  DISCOVERY_PROVIDER,
  DiscoveryProvider,
  SUMMARIZER,
  Summarizer,
  VERIFIER,
  Verifier,
} from './interfaces/capabilities.interface';
import { CircuitBreakerFactory } from './utils/circuit-breaker.factory';
import { ApifyDiscoveryProvider } from './providers/apify-discovery.provider';
import { MockDiscoveryProvider } from './providers/mock-discovery.provider';
import { HttpContentFetcher } from './providers/http-content.fetcher';
import { MockContentFetcher } from './providers/mock-content.fetcher';
import { GeminiSummarizer } from './providers/gemini.summarizer';
import { MockSummarizer } from './providers/mock.summarizer';
import { BouncerVerifier } from './providers/bouncer.verifier';
import { MockVerifier } from './providers/mock.verifier';

const selected = (configService: ConfigService, key: string): string =>
  configService.get<string>(key, 'MOCK').toUpperCase();

@Module({
  imports: [ConfigModule],
  providers: [
    CircuitBreakerFactory,
    {
      provide: DISCOVERY_PROVIDER,
      useFactory: (
        configService: ConfigService,
        breakers: CircuitBreakerFactory,
      ): DiscoveryProvider => {
        switch (selected(configService, 'DISCOVERY_PROVIDER')) {
          case 'APIFY':
            return new ApifyDiscoveryProvider(configService, breakers);
          case 'MOCK':
          default:
            return new MockDiscoveryProvider();
        }
      },
      inject: [ConfigService, CircuitBreakerFactory],
    },
    {
      provide: CONTENT_FETCHER,
      useFactory: (
        configService: ConfigService,
        settings: ExecutionSettings,
        breakers: CircuitBreakerFactory,
      ): ContentFetcher => {
        switch (selected(configService, 'CONTENT_FETCHER')) {
          case 'HTTP':
            return new HttpContentFetcher(settings, breakers);
          case 'MOCK':
          default:
            return new MockContentFetcher();
        }
      },
      inject: [ConfigService, EXECUTION_SETTINGS, CircuitBreakerFactory],
    },
    {
      provide: SUMMARIZER,
      useFactory: (
        configService: ConfigService,
        settings: ExecutionSettings,
      ): Summarizer => {
        switch (selected(configService, 'SUMMARIZER_PROVIDER')) {
          case 'GEMINI':
            return new GeminiSummarizer(configService, settings);
          case 'MOCK':
          default:
            return new MockSummarizer();
        }
      },
      inject: [ConfigService, EXECUTION_SETTINGS],
    },
    {
      provide: VERIFIER,
      useFactory: (
        configService: ConfigService,
        breakers: CircuitBreakerFactory,
      ): Verifier => {
        switch (selected(configService, 'VERIFIER_PROVIDER')) {
          case 'BOUNCER':
            return new BouncerVerifier(configService, breakers);
          case 'MOCK':
          default:
            return new MockVerifier();
        }
      },
      inject: [ConfigService, CircuitBreakerFactory],
    },
  ],
  exports: [
    CircuitBreakerFactory,
    DISCOVERY_PROVIDER,
    CONTENT_FETCHER,
    SUMMARIZER,
    VERIFIER,
  ],
})
export class CapabilitiesModule {}
