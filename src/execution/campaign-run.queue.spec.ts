import { Test, TestingModule } from '@nestjs/testing';
import { getQueueToken } from '@nestjs/bullmq';
import { CampaignRunQueue } from './campaign-run.queue';
import { CAMPAIGN_EXECUTION_QUEUE } from './execution.constants';

describe('CampaignRunQueue', () => {
  let runs: CampaignRunQueue;

  const mockQueue = {
    add: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CampaignRunQueue,
        { provide: getQueueToken(CAMPAIGN_EXECUTION_QUEUE), useValue: mockQueue },
      ],
    }).compile();

    runs = module.get<CampaignRunQueue>(CampaignRunQueue);
  });

  it('should add one run job keyed by the campaign id', async () => {
    await runs.enqueue('campaign-1');

    expect(mockQueue.add).toHaveBeenCalledWith(
      'run-campaign',
      { campaignId: 'campaign-1' },
      { jobId: 'run-campaign-1', removeOnComplete: true, removeOnFail: true },
    );
  });
});
