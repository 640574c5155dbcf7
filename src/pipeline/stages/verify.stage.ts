import { Inject, Injectable, Logger } from '@nestjs/common';
import { describeError, InfrastructureError } from '../../common/errors';
import {
  EXECUTION_SETTINGS,
  ExecutionSettings,
} from '../../config/execution.settings';
import {
  VERIFIER,
  Verifier,
} from '../../capabilities/interfaces/capabilities.interface';
import { Capability } from '../../scheduler/interfaces/scheduler.interface';
import type { WorkItemUpsert } from '../../store/interfaces/campaign-repository.interface';
import {
  ProcessingStage,
  VerificationPayload,
} from '../../store/interfaces/campaign-state.interface';
import type {
  ItemStage,
  StageContext,
  StageResult,
} from '../interfaces/stage.interface';
import { alreadyAt, halted } from '../stage-helpers';

/**
 * Scores the contact channel. A verifier failure never fails the item; the
 * payload records status `error` and the item still completes.
 */
@Injectable()
export class VerifyStage implements ItemStage {
  readonly name = 'verify' as const;
  readonly produces = ProcessingStage.VERIFIED;
  private readonly logger = new Logger(VerifyStage.name);

  constructor(
    @Inject(VERIFIER)
    private readonly verifier: Verifier,
    @Inject(EXECUTION_SETTINGS)
    private readonly settings: ExecutionSettings,
  ) {}

  async run(item: WorkItemUpsert, ctx: StageContext): Promise<StageResult> {
    if (alreadyAt(item, this.produces)) return { kind: 'skipped', item };

    const estimate = this.settings.capabilities[Capability.VERIFIER].estimatedCost;
    const checkedAt = new Date().toISOString();
    let verification: VerificationPayload;

    try {
      const result = await ctx.scheduler.execute(
        Capability.VERIFIER,
        estimate,
        () => this.verifier.verify(item.contactChannel),
        // Providers do not bill unknown results
        (score) => (score.status === 'unknown' ? 0 : estimate),
        { signal: ctx.signal, reservation: ctx.reservation },
      );
      if (!result.granted) return halted(result);

      const { status, score, reason } = result.value;
      verification = {
        status,
        score,
        safe:
          status === 'deliverable' &&
          score >= this.settings.verificationSafeScore,
        reason,
        checkedAt,
      };
    } catch (error: unknown) {
      if (error instanceof InfrastructureError) throw error;
      const reason = describeError(error);
      this.logger.warn(`Verification failed for ${item.externalId}: ${reason}`);
      verification = { status: 'error', score: null, safe: false, reason, checkedAt };
    }

    return {
      kind: 'advanced',
      item: {
        ...item,
        stage: ProcessingStage.VERIFIED,
        payload: { ...item.payload, verification },
      },
    };
  }
}
