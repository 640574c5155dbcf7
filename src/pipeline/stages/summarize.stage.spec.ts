import { SummarizeStage } from './summarize.stage';
import { CapabilityError, ThrottledError } from '../../common/errors';
import {
  FailureKind,
  ProcessingStage,
} from '../../store/interfaces/campaign-state.interface';
import type { StageContext } from '../interfaces/stage.interface';
import {
  testItem,
  testRecord,
  testScheduler,
  testSettings,
  testUnit,
} from '../../../test/support/fixtures';

describe('SummarizeStage', () => {
  const settings = testSettings();
  let stage: SummarizeStage;

  const mockSummarizer = {
    summarize: jest.fn(),
    compose: jest.fn(),
  };

  const researched = testItem({
    stage: ProcessingStage.RESEARCHED,
    payload: {
      profile: testRecord(),
      research: {
        pages: [
          { url: 'https://sunset-bakery.test', title: 'Home', text: 'Fresh bread daily.' },
          { url: 'https://sunset-bakery.test/blank', title: null, text: '   ' },
          { url: 'https://sunset-bakery.test/about', title: 'About', text: 'Family owned.' },
        ],
        bytes: 900,
        degraded: null,
      },
    },
  });

  const context = (overrides: Partial<StageContext> = {}): StageContext => ({
    campaignId: 'campaign-1',
    keywords: ['bakery', 'cafe'],
    unit: testUnit(),
    scheduler: testScheduler(settings),
    signal: new AbortController().signal,
    ...overrides,
  });

  beforeEach(() => {
    jest.clearAllMocks();
    stage = new SummarizeStage(mockSummarizer, settings);
    mockSummarizer.summarize.mockImplementation(async (page: { text: string }) => ({
      abstract: `About: ${page.text}`,
      usage: { inputTokens: 1000, outputTokens: 500 },
    }));
    mockSummarizer.compose.mockResolvedValue({
      subject: ' Hello ',
      body: ' Loved your bread. ',
      usage: { inputTokens: 0, outputTokens: 0 },
    });
  });

  it('should summarize each non-empty page and compose a message', async () => {
    const result = await stage.run(researched, context());

    if (result.kind !== 'advanced') throw new Error(result.kind);
    expect(result.item.stage).toBe(ProcessingStage.SUMMARIZED);
    expect(result.item.payload.summary).toEqual({
      pageSummaries: ['About: Fresh bread daily.', 'About: Family owned.'],
      subject: 'Hello',
      message: 'Loved your bread.',
    });
    expect(mockSummarizer.summarize).toHaveBeenCalledTimes(2);
    expect(mockSummarizer.compose).toHaveBeenCalledWith(
      {
        name: 'Sunset Bakery',
        category: 'bakery',
        address: '1 Main St',
        website: 'https://sunset-bakery.test',
        keywords: ['bakery', 'cafe'],
      },
      ['About: Fresh bread daily.', 'About: Family owned.'],
    );
  });

  it('should price calls by token usage, falling back to the flat estimate', async () => {
    const ctx = context();

    await stage.run(researched, ctx);

    // two pages at 1000 in / 500 out, plus a compose call reporting no usage
    expect(ctx.scheduler.spent).toBeCloseTo(2 * (0.0001 + 0.0002) + 0.002, 10);
  });

  it('should compose from the profile alone when research found nothing', async () => {
    const result = await stage.run(
      testItem({ stage: ProcessingStage.RESEARCHED }),
      context(),
    );

    expect(result.kind).toBe('advanced');
    expect(mockSummarizer.summarize).not.toHaveBeenCalled();
    expect(mockSummarizer.compose).toHaveBeenCalledWith(expect.any(Object), []);
  });

  it('should fail the item when the message comes back empty', async () => {
    mockSummarizer.compose.mockResolvedValue({
      subject: 'Hello',
      body: '  ',
      usage: { inputTokens: 10, outputTokens: 0 },
    });

    const result = await stage.run(researched, context());

    if (result.kind !== 'failed') throw new Error(result.kind);
    expect(result.item.stage).toBe(ProcessingStage.FAILED);
    expect(result.item.failureKind).toBe(FailureKind.SUMMARIZATION_FAILED);
    expect(result.item.failedStage).toBe('summarize');
    expect(result.item.failureReason).toBe('Summarizer returned an empty message');
  });

  it('should fail the item with SummarizationFailed on a provider error', async () => {
    mockSummarizer.summarize.mockRejectedValue(
      new CapabilityError('gemini', 'malformed response'),
    );

    const result = await stage.run(researched, context());

    if (result.kind !== 'failed') throw new Error(result.kind);
    expect(result.failure).toEqual({
      kind: FailureKind.SUMMARIZATION_FAILED,
      reason: 'gemini: malformed response',
    });
  });

  it('should fail the item with ProviderThrottled once retries run out', async () => {
    mockSummarizer.compose.mockRejectedValue(new ThrottledError('gemini'));

    const result = await stage.run(researched, context());

    if (result.kind !== 'failed') throw new Error(result.kind);
    expect(result.item.failureKind).toBe(FailureKind.PROVIDER_THROTTLED);
    expect(mockSummarizer.compose).toHaveBeenCalledTimes(4);
  });

  it('should recover when throttling clears before retries run out', async () => {
    mockSummarizer.compose
      .mockRejectedValueOnce(new ThrottledError('gemini'))
      .mockResolvedValueOnce({
        subject: 'Hi',
        body: 'Second try.',
        usage: { inputTokens: 0, outputTokens: 0 },
      });

    const result = await stage.run(researched, context());

    if (result.kind !== 'advanced') throw new Error(result.kind);
    expect(result.item.payload.summary?.message).toBe('Second try.');
  });

  it('should halt when the budget cannot cover a call', async () => {
    const result = await stage.run(
      researched,
      context({ scheduler: testScheduler(settings, { costCeiling: 0.001 }) }),
    );

    expect(result.kind).toBe('halted');
    if (result.kind === 'halted') expect(result.reason).toBe('BudgetExceeded');
    expect(mockSummarizer.summarize).not.toHaveBeenCalled();
  });

  it('should size each call by the token bounds when the flat estimate is lower', async () => {
    const bounded = testSettings({
      SUMMARIZER_ESTIMATED_COST: '0',
      SUMMARIZER_MAX_INPUT_TOKENS: '2000',
      SUMMARIZER_MAX_OUTPUT_TOKENS: '1000',
    });
    const boundedStage = new SummarizeStage(mockSummarizer, bounded);

    const result = await boundedStage.run(
      researched,
      context({ scheduler: testScheduler(bounded, { costCeiling: 0.0005 }) }),
    );

    expect(result.kind).toBe('halted');
    if (result.kind === 'halted') expect(result.reason).toBe('BudgetExceeded');
    expect(mockSummarizer.summarize).not.toHaveBeenCalled();
  });

  it('should skip failed items', async () => {
    const result = await stage.run(
      testItem({ stage: ProcessingStage.FAILED }),
      context(),
    );

    expect(result.kind).toBe('skipped');
  });

  it('should propagate unexpected errors', async () => {
    mockSummarizer.compose.mockRejectedValue(new TypeError('boom'));

    await expect(stage.run(researched, context())).rejects.toThrow('boom');
  });
});
