import { VerifyStage } from './verify.stage';
import { CapabilityError, InfrastructureError } from '../../common/errors';
import { ProcessingStage } from '../../store/interfaces/campaign-state.interface';
import type { StageContext } from '../interfaces/stage.interface';
import {
  testItem,
  testScheduler,
  testSettings,
  testUnit,
} from '../../../test/support/fixtures';

describe('VerifyStage', () => {
  const settings = testSettings({ VERIFICATION_SAFE_SCORE: '80' });
  let stage: VerifyStage;

  const mockVerifier = {
    verify: jest.fn(),
  };

  const summarized = testItem({ stage: ProcessingStage.SUMMARIZED });

  const context = (overrides: Partial<StageContext> = {}): StageContext => ({
    campaignId: 'campaign-1',
    keywords: ['bakery'],
    unit: testUnit(),
    scheduler: testScheduler(settings),
    signal: new AbortController().signal,
    ...overrides,
  });

  beforeEach(() => {
    jest.clearAllMocks();
    stage = new VerifyStage(mockVerifier, settings);
  });

  it('should mark a deliverable, high-scoring channel as safe', async () => {
    mockVerifier.verify.mockResolvedValue({ status: 'deliverable', score: 95, reason: null });
    const ctx = context();

    const result = await stage.run(summarized, ctx);

    if (result.kind !== 'advanced') throw new Error(result.kind);
    expect(result.item.stage).toBe(ProcessingStage.VERIFIED);
    expect(result.item.payload.verification).toEqual({
      status: 'deliverable',
      score: 95,
      safe: true,
      reason: null,
      checkedAt: expect.any(String),
    });
    expect(mockVerifier.verify).toHaveBeenCalledWith('hello@sunset-bakery.test');
    expect(ctx.scheduler.spent).toBeCloseTo(0.002);
  });

  it('should not mark a deliverable channel safe below the threshold', async () => {
    mockVerifier.verify.mockResolvedValue({ status: 'deliverable', score: 75, reason: null });

    const result = await stage.run(summarized, context());

    if (result.kind !== 'advanced') throw new Error(result.kind);
    expect(result.item.payload.verification?.safe).toBe(false);
  });

  it('should not charge for unknown results', async () => {
    mockVerifier.verify.mockResolvedValue({ status: 'unknown', score: 0, reason: 'timeout' });
    const ctx = context();

    await stage.run(summarized, ctx);

    expect(ctx.scheduler.spent).toBe(0);
  });

  it('should record a verifier error and still complete the item', async () => {
    mockVerifier.verify.mockRejectedValue(new CapabilityError('bouncer', 'HTTP 500: down'));

    const result = await stage.run(summarized, context());

    if (result.kind !== 'advanced') throw new Error(result.kind);
    expect(result.item.stage).toBe(ProcessingStage.VERIFIED);
    expect(result.item.payload.verification).toEqual({
      status: 'error',
      score: null,
      safe: false,
      reason: 'bouncer: HTTP 500: down',
      checkedAt: expect.any(String),
    });
  });

  it('should halt when the run signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await stage.run(summarized, context({ signal: controller.signal }));

    expect(result.kind).toBe('halted');
    expect(mockVerifier.verify).not.toHaveBeenCalled();
  });

  it('should skip verified items', async () => {
    const result = await stage.run(
      testItem({ stage: ProcessingStage.VERIFIED }),
      context(),
    );

    expect(result.kind).toBe('skipped');
  });

  it('should propagate infrastructure errors', async () => {
    mockVerifier.verify.mockRejectedValue(new InfrastructureError('recordCost'));

    await expect(stage.run(summarized, context())).rejects.toBeInstanceOf(
      InfrastructureError,
    );
  });
});
