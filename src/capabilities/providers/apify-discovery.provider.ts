import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import { z } from 'zod';
import { CapabilityError } from '../../common/errors';
import type { CoverageUnit } from '../../coverage/interfaces/coverage.interface';
import {
  DiscoveryProvider,
  DiscoverySearchOptions,
  RawRecord,
} from '../interfaces/capabilities.interface';
import { CircuitBreakerFactory, fireBreaker } from '../utils/circuit-breaker.factory';
import { raiseForStatus } from '../utils/http';

const PROVIDER = 'apify';
const APIFY_BASE = 'https://api.apify.com/v2';
const DEFAULT_ACTOR = 'compass~crawler-google-places';

const PlaceSchema = z
  .object({
    placeId: z.string().nullish(),
    cid: z.string().nullish(),
    title: z.string().nullish(),
    website: z.string().nullish(),
    phone: z.string().nullish(),
    emails: z.array(z.string()).nullish(),
    directEmails: z.array(z.string()).nullish(),
    categoryName: z.string().nullish(),
    address: z.string().nullish(),
    totalScore: z.number().nullish(),
    reviewsCount: z.number().nullish(),
  })
  .passthrough();

type Place = z.infer<typeof PlaceSchema>;

/**
 * Google Maps discovery through an Apify actor, run synchronously so the
 * dataset comes back in the same response.
 */
@Injectable()
export class ApifyDiscoveryProvider implements DiscoveryProvider {
  private readonly logger = new Logger(ApifyDiscoveryProvider.name);
  private readonly token: string;
  private readonly actorId: string;
  private readonly breaker: CircuitBreaker<[string, unknown], unknown>;

  constructor(
    private readonly configService: ConfigService,
    breakerFactory: CircuitBreakerFactory,
  ) {
    this.token = this.configService.get<string>('APIFY_API_TOKEN') || '';
    this.actorId = this.configService.get<string>('APIFY_ACTOR_ID') || DEFAULT_ACTOR;
    this.breaker = breakerFactory.createBreaker(
      'apify-discovery',
      (url: string, input: unknown) => this.runActor(url, input),
      // Synchronous actor runs routinely take minutes
      { timeout: 300000, volumeThreshold: 3 },
    );
  }

  async search(
    unit: CoverageUnit,
    keywords: readonly string[],
    options: DiscoverySearchOptions,
  ): Promise<RawRecord[]> {
    if (!this.token) {
      throw new CapabilityError(PROVIDER, 'APIFY_API_TOKEN is not set');
    }

    const searchStrings = keywords.map((keyword) => `${keyword} ${unit.id}`);
    const input = {
      searchStringsArray: searchStrings,
      maxCrawledPlacesPerSearch: Math.max(
        1,
        Math.ceil(options.maxResults / Math.max(1, searchStrings.length)),
      ),
      language: 'en',
      scrapeDirectEmails: true,
      scrapeWebsiteDetails: false,
    };
    const url = `${APIFY_BASE}/acts/${this.actorId}/run-sync-get-dataset-items?token=${encodeURIComponent(this.token)}`;

    this.logger.log(`Searching ${searchStrings.length} queries for unit ${unit.id}`);
    const payload = await fireBreaker(PROVIDER, this.breaker, url, input);

    const parsed = z.array(z.unknown()).safeParse(payload);
    if (!parsed.success) {
      throw new CapabilityError(PROVIDER, 'dataset response is not an array');
    }

    const records: RawRecord[] = [];
    for (const item of parsed.data) {
      const place = PlaceSchema.safeParse(item);
      if (!place.success) continue;
      const record = toRecord(place.data);
      if (record) records.push(record);
    }
    return records.slice(0, options.maxResults);
  }

  private async runActor(url: string, input: unknown): Promise<unknown> {
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(input),
    });
    await raiseForStatus(PROVIDER, res);
    return res.json();
  }
}

function toRecord(place: Place): RawRecord | null {
  const externalId = place.placeId ?? place.cid;
  const name = place.title?.trim();
  if (!externalId || !name) return null;

  const email = [...(place.directEmails ?? []), ...(place.emails ?? [])]
    .map((value) => value.trim().toLowerCase())
    .find((value) => value.includes('@'));

  return {
    externalId,
    name,
    email: email ?? null,
    phone: place.phone ?? null,
    website: place.website ?? null,
    category: place.categoryName ?? null,
    address: place.address ?? null,
    rating: place.totalScore ?? null,
    reviewCount: place.reviewsCount ?? null,
  };
}
