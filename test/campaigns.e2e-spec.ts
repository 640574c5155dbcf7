import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import request from 'supertest';
import { CampaignsController } from './../src/campaigns/campaigns.controller';
import { CampaignsService } from './../src/campaigns/campaigns.service';
import { CoveragePlanner } from './../src/coverage/coverage-planner.service';
import {
  DENSITY_TABLE_SOURCE,
  DensityClass,
} from './../src/coverage/interfaces/coverage.interface';
import { CampaignRunQueue } from './../src/execution/campaign-run.queue';
import { ExecutionControl } from './../src/execution/execution-control';
import { EXECUTION_SETTINGS } from './../src/config/execution.settings';
import { CAMPAIGN_REPOSITORY } from './../src/store/interfaces/campaign-repository.interface';
import { InMemoryCampaignRepository } from './support/in-memory-campaign.repository';
import { testItem, testSettings } from './support/fixtures';

describe('CampaignsController (e2e)', () => {
  let app: INestApplication;
  let repository: InMemoryCampaignRepository;

  const mockRunQueue = {
    enqueue: jest.fn().mockResolvedValue(undefined),
  };

  const mockDensityTables = {
    lookup: jest.fn().mockResolvedValue([
      { subRegionId: '90012', densityClass: DensityClass.HIGH, expectedCount: 400 },
      { subRegionId: '90013', densityClass: DensityClass.MEDIUM, expectedCount: 100 },
    ]),
  };

  const payload = {
    region: 'los-angeles-ca',
    keywords: ['bakery'],
    costCeiling: 50,
  };

  beforeAll(async () => {
    repository = new InMemoryCampaignRepository();

    const moduleFixture: TestingModule = await Test.createTestingModule({
      controllers: [CampaignsController],
      providers: [
        CampaignsService,
        CoveragePlanner,
        ExecutionControl,
        { provide: CAMPAIGN_REPOSITORY, useValue: repository },
        { provide: DENSITY_TABLE_SOURCE, useValue: mockDensityTables },
        { provide: EXECUTION_SETTINGS, useValue: testSettings({ RESULTS_MAX_LIMIT: '2' }) },
        { provide: CampaignRunQueue, useValue: mockRunQueue },
      ],
    }).compile();

    app = moduleFixture.createNestApplication();
    app.useGlobalPipes(new ValidationPipe());
    await app.init();
  });

  afterAll(async () => {
    if (app) {
      await app.close();
    }
  });

  it('/campaigns (POST) - Success', async () => {
    const response = await request(app.getHttpServer())
      .post('/campaigns')
      .send(payload)
      .expect(201);

    expect(response.body).toHaveProperty('id');
    expect(response.body.status).toBe('pending');
    expect(response.body.unitsPlanned).toBe(2);
    expect(response.body.costCeiling).toBe(50);
    expect(response.body.estimatedCost).toBe(5);
  });

  it('/campaigns (POST) - Validation Error', async () => {
    await request(app.getHttpServer())
      .post('/campaigns')
      .send({ region: 'los-angeles-ca', keywords: [], costCeiling: -1 })
      .expect(400);
  });

  it('/campaigns (POST) - Unknown profile', async () => {
    await request(app.getHttpServer())
      .post('/campaigns')
      .send({ ...payload, profile: 'everything' })
      .expect(400);
  });

  it('/campaigns/:id (GET) - Not Found', async () => {
    await request(app.getHttpServer()).get('/campaigns/missing').expect(404);
  });

  it('/campaigns/:id/start (POST) - Lifecycle', async () => {
    const created = await request(app.getHttpServer())
      .post('/campaigns')
      .send(payload)
      .expect(201);
    const id: string = created.body.id;

    const started = await request(app.getHttpServer())
      .post(`/campaigns/${id}/start`)
      .expect(200);
    expect(started.body.status).toBe('running');
    expect(mockRunQueue.enqueue).toHaveBeenCalledWith(id);

    await request(app.getHttpServer()).post(`/campaigns/${id}/start`).expect(409);

    const paused = await request(app.getHttpServer())
      .post(`/campaigns/${id}/pause`)
      .expect(200);
    expect(paused.body.pendingControl).toBe('pause');

    const cancelled = await request(app.getHttpServer())
      .post(`/campaigns/${id}/cancel`)
      .expect(200);
    expect(cancelled.body.pendingControl).toBe('cancel');

    await request(app.getHttpServer()).post(`/campaigns/${id}/pause`).expect(409);
  });

  it('/campaigns/:id/results (GET) - Paging', async () => {
    const created = await request(app.getHttpServer())
      .post('/campaigns')
      .send(payload)
      .expect(201);
    const id: string = created.body.id;
    for (let i = 0; i < 3; i++) {
      await repository.upsertWorkItem(
        testItem({ campaignId: id, externalId: `place-${i}`, ordinal: i }),
      );
    }

    const response = await request(app.getHttpServer())
      .get(`/campaigns/${id}/results?limit=10&offset=1`)
      .expect(200);

    expect(response.body.limit).toBe(2);
    expect(response.body.offset).toBe(1);
    expect(
      response.body.items.map((item: { externalId: string }) => item.externalId),
    ).toEqual(['place-1', 'place-2']);
  });

  it('/campaigns/:id/results (GET) - Invalid limit', async () => {
    await request(app.getHttpServer())
      .get('/campaigns/missing/results?limit=ten')
      .expect(400);
  });
});
