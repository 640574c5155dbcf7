import { Logger } from '@nestjs/common';
import { ProviderThrottledError, ThrottledError } from '../common/errors';
import { backoffDelay, sleep } from './backoff';
import {
  AcquireOptions,
  AcquireResult,
  BackoffPolicy,
  CallOutcome,
  Capability,
  CAPABILITIES,
  CapabilityLimits,
  Denial,
  DenialReason,
  Grant,
  LedgerEntry,
  LedgerSink,
  ReserveResult,
  Reservation,
} from './interfaces/scheduler.interface';

export interface RateBudgetSchedulerOptions {
  campaignId: string;
  /** Campaign-wide cost ceiling */
  costCeiling: number;
  /** Cost already durable from earlier runs of the same campaign */
  initialSpent?: number;
  initialLedger?: readonly LedgerEntry[];
  limits: Record<Capability, CapabilityLimits>;
  backoff: BackoffPolicy;
  sink: LedgerSink;
  clock?: () => number;
  onDenied?: (reason: DenialReason) => void;
  onCost?: (capability: Capability, cost: number) => void;
}

export type ExecuteResult<T> = { granted: true; value: T } | Denial;

interface CapabilityState {
  inFlight: number;
  lastGrantAt: number | null;
  /** Estimates of grants issued and not yet released */
  outstanding: number;
  ledger: LedgerEntry;
}

/**
 * Paces and meters calls to external capabilities for one campaign run.
 *
 * Budget accounting keeps three figures: `spent` (released actual cost),
 * outstanding grant estimates, and unsettled item reservations. A grant or
 * reservation is refused when the three together would pass the ceiling.
 */
export class RateBudgetScheduler {
  private readonly logger = new Logger(RateBudgetScheduler.name);
  private readonly states = new Map<Capability, CapabilityState>();
  private readonly active = new Map<number, Grant>();
  private readonly waiters = new Set<() => void>();
  private readonly clock: () => number;
  private nextId = 1;
  private spentTotal: number;
  private outstanding = 0;
  private reserved = 0;

  constructor(private readonly options: RateBudgetSchedulerOptions) {
    this.clock = options.clock ?? Date.now;
    this.spentTotal = Math.max(0, options.initialSpent ?? 0);

    for (const capability of CAPABILITIES) {
      const previous = options.initialLedger?.find(
        (entry) => entry.capability === capability,
      );
      this.states.set(capability, {
        inFlight: 0,
        lastGrantAt: null,
        outstanding: 0,
        ledger: previous
          ? { ...previous }
          : {
              capability,
              callsMade: 0,
              failures: 0,
              costAccrued: 0,
              lastCallAt: null,
            },
      });
    }
  }

  get spent(): number {
    return this.spentTotal;
  }

  get costCeiling(): number {
    return this.options.costCeiling;
  }

  inFlight(capability: Capability): number {
    return this.state(capability).inFlight;
  }

  ledger(): LedgerEntry[] {
    return CAPABILITIES.map((capability) => ({
      ...this.state(capability).ledger,
    }));
  }

  /**
   * Sets aside an item's projected cycle cost. Denied when the reservation
   * would pass the ceiling on top of what is spent, in flight and reserved.
   */
  reserve(projectedCost: number): ReserveResult {
    const projected = Math.max(0, projectedCost);
    if (this.committed() + projected > this.options.costCeiling) {
      return this.deny(
        'BudgetExceeded',
        `reserving ${format(projected)} would exceed ceiling ${format(this.options.costCeiling)} (committed ${format(this.committed())})`,
      );
    }
    this.reserved += projected;
    return {
      granted: true,
      reservation: {
        id: this.nextId++,
        projectedCost: projected,
        remaining: projected,
        settled: false,
      },
    };
  }

  /** Returns whatever the item did not draw from its reservation. */
  settle(reservation: Reservation): void {
    if (reservation.settled) return;
    this.reserved = Math.max(0, this.reserved - reservation.remaining);
    reservation.remaining = 0;
    reservation.settled = true;
  }

  /**
   * Waits for a concurrency slot and the capability's minimum interval, then
   * issues a grant. Budget denials return immediately without waiting.
   */
  async acquire(
    capability: Capability,
    estimatedCost: number,
    options: AcquireOptions = {},
  ): Promise<AcquireResult> {
    const { signal, reservation } = options;
    const estimate = Math.max(0, estimatedCost);
    const limits = this.options.limits[capability];
    const state = this.state(capability);

    if (signal?.aborted) {
      return this.deny('Halted', `${capability} acquire after halt`);
    }
    const early = this.checkBudget(capability, estimate, reservation);
    if (early) return early;

    for (;;) {
      if (signal?.aborted) {
        return this.deny('Halted', `${capability} acquire interrupted by halt`);
      }
      if (state.inFlight >= limits.maxConcurrent) {
        await this.waitForRelease(signal);
        continue;
      }
      const wait =
        state.lastGrantAt === null
          ? 0
          : state.lastGrantAt + limits.minIntervalMs - this.clock();
      if (wait > 0) {
        await sleep(wait, signal);
        continue;
      }
      break;
    }

    // Spend may have moved while this call was waiting
    const late = this.checkBudget(capability, estimate, reservation);
    if (late) return late;

    if (reservation && !reservation.settled) {
      const draw = Math.min(estimate, reservation.remaining);
      reservation.remaining -= draw;
      this.reserved = Math.max(0, this.reserved - draw);
    }

    const grant: Grant = {
      id: this.nextId++,
      capability,
      estimatedCost: estimate,
      issuedAt: this.clock(),
    };
    state.inFlight += 1;
    state.lastGrantAt = grant.issuedAt;
    state.outstanding += estimate;
    this.outstanding += estimate;
    this.active.set(grant.id, grant);
    return { granted: true, grant };
  }

  /**
   * Records the actual cost of a granted call and frees its slot. Releasing
   * the same grant twice is a no-op. Rejects when the ledger sink fails.
   */
  async release(
    grant: Grant,
    actualCost: number,
    outcome: CallOutcome = 'success',
  ): Promise<void> {
    if (!this.active.delete(grant.id)) return;

    const state = this.state(grant.capability);
    const cost = Number.isFinite(actualCost) ? Math.max(0, actualCost) : 0;
    const at = new Date(this.clock());

    state.inFlight -= 1;
    state.outstanding = Math.max(0, state.outstanding - grant.estimatedCost);
    this.outstanding = Math.max(0, this.outstanding - grant.estimatedCost);
    this.spentTotal += cost;
    if (cost > grant.estimatedCost) {
      this.logger.warn(
        `${grant.capability} cost ${format(cost)} exceeded its estimate ${format(grant.estimatedCost)} for campaign ${this.options.campaignId}`,
      );
    }

    const failures = outcome === 'failure' ? 1 : 0;
    state.ledger.callsMade += 1;
    state.ledger.failures += failures;
    state.ledger.costAccrued += cost;
    state.ledger.lastCallAt = at;

    this.wake();
    if (cost > 0) this.options.onCost?.(grant.capability, cost);

    await this.options.sink({
      capability: grant.capability,
      calls: 1,
      failures,
      cost,
      at,
    });
  }

  /**
   * Acquire, call, release, with exponential backoff on provider throttling.
   * Each attempt takes its own grant so retries stay paced and metered. Any
   * other error releases the grant with zero cost and propagates.
   */
  async execute<T>(
    capability: Capability,
    estimatedCost: number,
    call: () => Promise<T>,
    costOf: (value: T) => number,
    options: AcquireOptions = {},
  ): Promise<ExecuteResult<T>> {
    const policy = this.options.backoff;

    for (let attempt = 0; ; attempt++) {
      const acquired = await this.acquire(capability, estimatedCost, options);
      if (!acquired.granted) return acquired;

      let value: T;
      try {
        value = await call();
      } catch (error: unknown) {
        await this.release(acquired.grant, 0, 'failure');
        if (!(error instanceof ThrottledError)) throw error;
        if (attempt >= policy.maxRetries) {
          throw new ProviderThrottledError(error.provider, attempt + 1);
        }
        const delay = backoffDelay(policy, attempt, error.retryAfterMs);
        this.logger.warn(
          `${capability} throttled (attempt ${attempt + 1}), retrying in ${delay}ms`,
        );
        await sleep(delay, options.signal);
        continue;
      }

      await this.release(acquired.grant, costOf(value), 'success');
      return { granted: true, value };
    }
  }

  private committed(): number {
    return this.spentTotal + this.outstanding + this.reserved;
  }

  private checkBudget(
    capability: Capability,
    estimate: number,
    reservation?: Reservation,
  ): Denial | null {
    const draw =
      reservation && !reservation.settled
        ? Math.min(estimate, reservation.remaining)
        : 0;
    const projected = this.committed() - draw + estimate;
    // A draw the reservation covers in full was already admitted by reserve().
    if (draw < estimate && projected > this.options.costCeiling) {
      return this.deny(
        'BudgetExceeded',
        `${capability} call of ${format(estimate)} would exceed ceiling ${format(this.options.costCeiling)}`,
      );
    }

    const state = this.state(capability);
    const ceiling = this.options.limits[capability].costCeiling;
    if (state.ledger.costAccrued + state.outstanding + estimate > ceiling) {
      return this.deny(
        'BudgetExceeded',
        `${capability} would exceed its own ceiling ${format(ceiling)}`,
      );
    }
    return null;
  }

  private deny(reason: DenialReason, detail: string): Denial {
    this.options.onDenied?.(reason);
    this.logger.debug(
      `Denied for campaign ${this.options.campaignId}: ${reason} (${detail})`,
    );
    return { granted: false, reason, detail };
  }

  private waitForRelease(signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        this.waiters.delete(done);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      this.waiters.add(done);
      signal?.addEventListener('abort', done, { once: true });
    });
  }

  private wake(): void {
    for (const waiter of [...this.waiters]) waiter();
  }

  private state(capability: Capability): CapabilityState {
    const state = this.states.get(capability);
    if (!state) {
      throw new Error(`Unknown capability: ${capability}`);
    }
    return state;
  }
}

function format(amount: number): string {
  return Number.isFinite(amount) ? amount.toFixed(4) : String(amount);
}
