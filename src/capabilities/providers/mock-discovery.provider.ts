import { Injectable } from '@nestjs/common';
import type { CoverageUnit } from '../../coverage/interfaces/coverage.interface';
import {
  DiscoveryProvider,
  DiscoverySearchOptions,
  RawRecord,
} from '../interfaces/capabilities.interface';

const RECORDS_PER_UNIT = 5;

/**
 * Deterministic records per unit for local runs. Every fifth record has no
 * email so the discovery filter is exercised.
 */
@Injectable()
export class MockDiscoveryProvider implements DiscoveryProvider {
  search(
    unit: CoverageUnit,
    keywords: readonly string[],
    options: DiscoverySearchOptions,
  ): Promise<RawRecord[]> {
    const keyword = keywords[0] ?? 'business';
    const count = Math.min(RECORDS_PER_UNIT, options.maxResults);
    const slug = unit.id.toLowerCase().replace(/[^a-z0-9]+/g, '-');

    const records = Array.from({ length: count }, (_, i): RawRecord => {
      const host = `${slug}-${i + 1}.example.com`;
      return {
        externalId: `mock-${slug}-${i + 1}`,
        name: `${capitalize(keyword)} ${unit.label ?? unit.id} #${i + 1}`,
        email: i === RECORDS_PER_UNIT - 1 ? null : `owner@${host}`,
        phone: `+1-555-01${String(i).padStart(2, '0')}`,
        website: `https://${host}`,
        category: keyword,
        address: `${100 + i} Main St, ${unit.id}`,
        rating: 4.5,
        reviewCount: 10 * (i + 1),
      };
    });
    return Promise.resolve(records);
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
