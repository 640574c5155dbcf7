import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import { z } from 'zod';
import { CapabilityError } from '../../common/errors';
import { ConfidenceScore, Verifier } from '../interfaces/capabilities.interface';
import { CircuitBreakerFactory, fireBreaker } from '../utils/circuit-breaker.factory';
import { raiseForStatus } from '../utils/http';

const PROVIDER = 'bouncer';
const BOUNCER_BASE = 'https://api.usebouncer.com/v1.1';

const VerifyResponseSchema = z.object({
  status: z.string(),
  score: z.number().optional(),
  reason: z.string().nullish(),
});

@Injectable()
export class BouncerVerifier implements Verifier {
  private readonly logger = new Logger(BouncerVerifier.name);
  private readonly apiKey: string;
  private readonly breaker: CircuitBreaker<[string], unknown>;

  constructor(configService: ConfigService, breakerFactory: CircuitBreakerFactory) {
    this.apiKey = configService.get<string>('BOUNCER_API_KEY') || '';
    this.breaker = breakerFactory.createBreaker(
      'bouncer-verify',
      (email: string) => this.request(email),
      { timeout: 30000 },
    );
  }

  async verify(contactChannel: string): Promise<ConfidenceScore> {
    if (!this.apiKey) {
      throw new CapabilityError(PROVIDER, 'BOUNCER_API_KEY is not set');
    }

    const payload = await fireBreaker(PROVIDER, this.breaker, contactChannel);
    const parsed = VerifyResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new CapabilityError(PROVIDER, 'unexpected verification payload');
    }

    const status = toStatus(parsed.data.status);
    this.logger.debug(`Verification status ${status}`);
    return {
      status,
      score: clampScore(parsed.data.score ?? 0),
      reason: parsed.data.reason ?? null,
    };
  }

  private async request(email: string): Promise<unknown> {
    const url = `${BOUNCER_BASE}/email/verify?email=${encodeURIComponent(email)}`;
    const res = await fetch(url, {
      headers: { 'x-api-key': this.apiKey, Accept: 'application/json' },
    });
    await raiseForStatus(PROVIDER, res);
    return res.json();
  }
}

function toStatus(value: string): ConfidenceScore['status'] {
  switch (value) {
    case 'deliverable':
    case 'undeliverable':
    case 'risky':
      return value;
    default:
      return 'unknown';
  }
}

function clampScore(score: number): number {
  return Math.min(100, Math.max(0, Math.round(score)));
}
