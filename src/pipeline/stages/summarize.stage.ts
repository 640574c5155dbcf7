import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CapabilityError,
  describeError,
  ProviderThrottledError,
} from '../../common/errors';
import {
  EXECUTION_SETTINGS,
  ExecutionSettings,
} from '../../config/execution.settings';
import {
  ContactProfile,
  SUMMARIZER,
  Summarizer,
  TokenUsage,
} from '../../capabilities/interfaces/capabilities.interface';
import { summarizerCallEstimate } from '../../scheduler/cost-estimator';
import { Capability } from '../../scheduler/interfaces/scheduler.interface';
import type { WorkItemUpsert } from '../../store/interfaces/campaign-repository.interface';
import {
  FailureKind,
  ProcessingStage,
} from '../../store/interfaces/campaign-state.interface';
import type {
  ItemStage,
  StageContext,
  StageResult,
} from '../interfaces/stage.interface';
import { alreadyAt, failed, halted } from '../stage-helpers';

/**
 * Condenses each researched page, then composes the outreach message from
 * the profile and those condensed notes.
 */
@Injectable()
export class SummarizeStage implements ItemStage {
  readonly name = 'summarize' as const;
  readonly produces = ProcessingStage.SUMMARIZED;
  private readonly logger = new Logger(SummarizeStage.name);

  constructor(
    @Inject(SUMMARIZER)
    private readonly summarizer: Summarizer,
    @Inject(EXECUTION_SETTINGS)
    private readonly settings: ExecutionSettings,
  ) {}

  async run(item: WorkItemUpsert, ctx: StageContext): Promise<StageResult> {
    if (alreadyAt(item, this.produces)) return { kind: 'skipped', item };

    const estimate = summarizerCallEstimate(this.settings);
    const acquireOptions = { signal: ctx.signal, reservation: ctx.reservation };
    const pageSummaries: string[] = [];

    try {
      for (const page of item.payload.research?.pages ?? []) {
        if (!page.text.trim()) continue;
        const result = await ctx.scheduler.execute(
          Capability.SUMMARIZER,
          estimate,
          () => this.summarizer.summarize({ url: page.url, text: page.text }),
          (summary) => this.costOf(summary.usage),
          acquireOptions,
        );
        if (!result.granted) return halted(result);
        const abstract = result.value.abstract.trim();
        if (abstract) pageSummaries.push(abstract);
      }

      const { profile } = item.payload;
      const contact: ContactProfile = {
        name: profile.name,
        category: profile.category,
        address: profile.address,
        website: profile.website,
        keywords: ctx.keywords,
      };
      const composed = await ctx.scheduler.execute(
        Capability.SUMMARIZER,
        estimate,
        () => this.summarizer.compose(contact, pageSummaries),
        (message) => this.costOf(message.usage),
        acquireOptions,
      );
      if (!composed.granted) return halted(composed);

      const subject = composed.value.subject.trim();
      const message = composed.value.body.trim();
      if (!message) {
        return failed(
          item,
          this.name,
          FailureKind.SUMMARIZATION_FAILED,
          'Summarizer returned an empty message',
        );
      }

      return {
        kind: 'advanced',
        item: {
          ...item,
          stage: ProcessingStage.SUMMARIZED,
          payload: {
            ...item.payload,
            summary: { pageSummaries, subject, message },
          },
        },
      };
    } catch (error: unknown) {
      if (error instanceof ProviderThrottledError) {
        return failed(item, this.name, FailureKind.PROVIDER_THROTTLED, error.message);
      }
      if (error instanceof CapabilityError) {
        this.logger.warn(
          `Summarization failed for ${item.externalId}: ${describeError(error)}`,
        );
        return failed(
          item,
          this.name,
          FailureKind.SUMMARIZATION_FAILED,
          describeError(error),
        );
      }
      throw error;
    }
  }

  /** Token-priced when the provider reports usage, the flat estimate otherwise. */
  private costOf(usage: TokenUsage): number {
    const { inputTokens, outputTokens } = usage;
    if (inputTokens <= 0 && outputTokens <= 0) {
      return this.settings.capabilities[Capability.SUMMARIZER].estimatedCost;
    }
    const pricing = this.settings.summarizerPricing;
    return (
      (inputTokens / 1000) * pricing.inputPer1kTokens +
      (outputTokens / 1000) * pricing.outputPer1kTokens
    );
  }
}
