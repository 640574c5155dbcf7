import { Injectable, Logger } from '@nestjs/common';
import CircuitBreaker from 'opossum';
import { describeError, ThrottledError } from '../../common/errors';
import type { ExecutionSettings } from '../../config/execution.settings';
import {
  ContentFetcher,
  FetchOptions,
  FetchResult,
} from '../interfaces/capabilities.interface';
import { CircuitBreakerFactory, fireBreaker } from '../utils/circuit-breaker.factory';
import { DomainThrottler } from '../utils/domain-throttler';
import { hostOf } from '../utils/link-filter';
import { LimitedBody, raiseForStatus, readLimited } from '../utils/http';

const PROVIDER = 'http';
const USER_AGENT =
  'Mozilla/5.0 (compatible; CampaignResearchBot/1.0; +https://example.com/bot)';

/**
 * Fetches web pages for research. Each domain is paced and blocked after
 * repeated failures; a missing or unreachable page is a `found: false`
 * result. A 429 is rethrown as a ThrottledError so the scheduler backs off.
 */
@Injectable()
export class HttpContentFetcher implements ContentFetcher {
  private readonly logger = new Logger(HttpContentFetcher.name);
  private readonly throttler: DomainThrottler;
  private readonly timeoutMs: number;
  private readonly breaker: CircuitBreaker<[string, number], LimitedBody>;

  constructor(settings: ExecutionSettings, breakerFactory: CircuitBreakerFactory) {
    this.timeoutMs = settings.research.timeoutMs;
    this.throttler = new DomainThrottler({
      minDelayMs: settings.research.domainDelayMs,
      failureThreshold: settings.research.domainFailureThreshold,
    });
    this.breaker = breakerFactory.createBreaker(
      'http-content',
      (url: string, maxBytes: number) => this.download(url, maxBytes),
      { timeout: this.timeoutMs + 1000, volumeThreshold: 20 },
    );
  }

  async fetch(url: string, options: FetchOptions): Promise<FetchResult> {
    const domain = hostOf(url);
    if (!domain) {
      return { found: false, url, reason: 'invalid url' };
    }
    if (this.throttler.isBlocked(domain)) {
      return { found: false, url, reason: `domain ${domain} is blocked` };
    }

    await this.throttler.wait(domain, options.signal);

    try {
      const page = await fireBreaker(PROVIDER, this.breaker, url, options.maxBytes);
      this.throttler.recordSuccess(domain);
      if (!page.body.trim()) {
        return { found: false, url, reason: 'empty body' };
      }
      return {
        found: true,
        url,
        html: page.body,
        bytes: page.bytes,
        truncated: page.truncated,
      };
    } catch (error: unknown) {
      if (error instanceof ThrottledError) throw error;
      this.throttler.recordFailure(domain);
      const reason = describeError(error);
      this.logger.warn(`Fetch failed for ${url}: ${reason}`);
      return { found: false, url, reason };
    }
  }

  private async download(url: string, maxBytes: number): Promise<LimitedBody> {
    const res = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT, Accept: 'text/html,application/xhtml+xml' },
      redirect: 'follow',
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    await raiseForStatus(PROVIDER, res);
    return readLimited(res, maxBytes);
  }
}
