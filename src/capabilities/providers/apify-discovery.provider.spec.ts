import { ConfigService } from '@nestjs/config';
import { CapabilityError, ThrottledError } from '../../common/errors';
import { DensityClass } from '../../coverage/interfaces/coverage.interface';
import { CircuitBreakerFactory } from '../utils/circuit-breaker.factory';
import { ApifyDiscoveryProvider } from './apify-discovery.provider';

describe('ApifyDiscoveryProvider', () => {
  let fetchSpy: jest.SpyInstance;

  const unit = {
    id: '90012',
    regionKey: 'los-angeles-ca',
    label: 'Downtown LA',
    densityClass: DensityClass.VERY_HIGH,
    expectedCount: 450,
    weight: 1,
    rank: 1,
  };

  const createProvider = (env: Record<string, string> = { APIFY_API_TOKEN: 'test-token' }) =>
    new ApifyDiscoveryProvider(new ConfigService(env), new CircuitBreakerFactory());

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should send one search string per keyword for the unit', async () => {
    fetchSpy.mockResolvedValue(new Response('[]'));

    await createProvider().search(unit, ['dentist', 'orthodontist'], { maxResults: 100 });

    const [url, init] = fetchSpy.mock.calls[0];
    expect(String(url)).toContain('/run-sync-get-dataset-items?token=test-token');
    expect(JSON.parse(String(init.body))).toMatchObject({
      searchStringsArray: ['dentist 90012', 'orthodontist 90012'],
      maxCrawledPlacesPerSearch: 50,
    });
  });

  it('should map places to records and skip unusable entries', async () => {
    fetchSpy.mockResolvedValue(
      new Response(
        JSON.stringify([
          {
            placeId: 'p-1',
            title: 'Smile Studio',
            website: 'https://smile.example.com',
            phone: '+1 555 0100',
            emails: ['Hello@Smile.example.com'],
            categoryName: 'Dentist',
            address: '1 Main St',
            totalScore: 4.8,
            reviewsCount: 120,
          },
          { placeId: 'p-2', title: 'No Email Dental' },
          { title: 'Missing id' },
          'garbage',
        ]),
      ),
    );

    const records = await createProvider().search(unit, ['dentist'], { maxResults: 10 });

    expect(records).toEqual([
      {
        externalId: 'p-1',
        name: 'Smile Studio',
        email: 'hello@smile.example.com',
        phone: '+1 555 0100',
        website: 'https://smile.example.com',
        category: 'Dentist',
        address: '1 Main St',
        rating: 4.8,
        reviewCount: 120,
      },
      {
        externalId: 'p-2',
        name: 'No Email Dental',
        email: null,
        phone: null,
        website: null,
        category: null,
        address: null,
        rating: null,
        reviewCount: null,
      },
    ]);
  });

  it('should raise ThrottledError on 429', async () => {
    fetchSpy.mockResolvedValue(new Response('', { status: 429 }));

    await expect(
      createProvider().search(unit, ['dentist'], { maxResults: 10 }),
    ).rejects.toBeInstanceOf(ThrottledError);
  });

  it('should refuse to run without a token', async () => {
    await expect(
      createProvider({}).search(unit, ['dentist'], { maxResults: 10 }),
    ).rejects.toBeInstanceOf(CapabilityError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
