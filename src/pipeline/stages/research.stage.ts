import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  describeError,
  InfrastructureError,
  ProviderThrottledError,
} from '../../common/errors';
import {
  EXECUTION_SETTINGS,
  ExecutionSettings,
} from '../../config/execution.settings';
import {
  CONTENT_FETCHER,
  ContentFetcher,
  FetchResult,
} from '../../capabilities/interfaces/capabilities.interface';
import { extractPage } from '../../capabilities/utils/html-extractor';
import { Capability, Denial } from '../../scheduler/interfaces/scheduler.interface';
import type { WorkItemUpsert } from '../../store/interfaces/campaign-repository.interface';
import {
  FailureKind,
  ProcessingStage,
  ResearchPage,
  ResearchPayload,
} from '../../store/interfaces/campaign-state.interface';
import type {
  ItemStage,
  StageContext,
  StageResult,
} from '../interfaces/stage.interface';
import { alreadyAt, failed, halted } from '../stage-helpers';

/**
 * Reads the item's website: the home page plus a bounded number of linked
 * pages within a byte budget. A page that cannot be read degrades the
 * payload; a site that keeps throttling past the retries fails the item.
 */
@Injectable()
export class ResearchStage implements ItemStage {
  readonly name = 'research' as const;
  readonly produces = ProcessingStage.RESEARCHED;
  private readonly logger = new Logger(ResearchStage.name);

  constructor(
    @Inject(CONTENT_FETCHER)
    private readonly fetcher: ContentFetcher,
    @Inject(EXECUTION_SETTINGS)
    private readonly settings: ExecutionSettings,
  ) {}

  async run(item: WorkItemUpsert, ctx: StageContext): Promise<StageResult> {
    if (alreadyAt(item, this.produces)) return { kind: 'skipped', item };

    const website = item.payload.profile.website;
    if (!website) {
      return this.advance(item, { pages: [], bytes: 0, degraded: 'no website' });
    }

    try {
      return await this.readSite(item, website, ctx);
    } catch (error: unknown) {
      if (error instanceof ProviderThrottledError) {
        return failed(item, this.name, FailureKind.PROVIDER_THROTTLED, error.message);
      }
      throw error;
    }
  }

  private async readSite(
    item: WorkItemUpsert,
    website: string,
    ctx: StageContext,
  ): Promise<StageResult> {
    const { maxLinks, maxBytes, pageCharLimit } = this.settings.research;
    const pages: ResearchPage[] = [];
    let bytes = 0;
    let degraded: string | null = null;

    const home = await this.fetchPage(website, maxBytes, ctx, item);
    if ('granted' in home) return halted(home);
    if (!home.found) {
      return this.advance(item, { pages: [], bytes: 0, degraded: home.reason });
    }

    const homePage = extractPage(home.html, home.url, pageCharLimit);
    pages.push({ url: home.url, title: homePage.title, text: homePage.text });
    bytes += home.bytes;

    for (const link of homePage.links.slice(0, maxLinks)) {
      const remaining = maxBytes - bytes;
      if (remaining <= 0) {
        degraded = 'byte budget exhausted';
        break;
      }
      const sub = await this.fetchPage(link, remaining, ctx, item);
      if ('granted' in sub) return halted(sub);
      if (!sub.found) {
        degraded = degraded ?? `partial: ${sub.reason}`;
        continue;
      }
      const page = extractPage(sub.html, sub.url, pageCharLimit);
      pages.push({ url: sub.url, title: page.title, text: page.text });
      bytes += sub.bytes;
    }

    return this.advance(item, { pages, bytes, degraded });
  }

  private advance(item: WorkItemUpsert, research: ResearchPayload): StageResult {
    return {
      kind: 'advanced',
      item: {
        ...item,
        stage: ProcessingStage.RESEARCHED,
        payload: { ...item.payload, research },
      },
    };
  }

  private async fetchPage(
    url: string,
    maxBytes: number,
    ctx: StageContext,
    item: WorkItemUpsert,
  ): Promise<FetchResult | Denial> {
    const estimate = this.settings.capabilities[Capability.RESEARCH].estimatedCost;
    try {
      const result = await ctx.scheduler.execute(
        Capability.RESEARCH,
        estimate,
        () => this.fetcher.fetch(url, { maxBytes, signal: ctx.signal }),
        () => estimate,
        { signal: ctx.signal, reservation: ctx.reservation },
      );
      return result.granted ? result.value : result;
    } catch (error: unknown) {
      if (
        error instanceof InfrastructureError ||
        error instanceof ProviderThrottledError
      ) {
        throw error;
      }
      const reason = describeError(error);
      this.logger.warn(
        `Research fetch failed for ${item.externalId} (${url}): ${reason}`,
      );
      return { found: false, url, reason };
    }
  }
}
