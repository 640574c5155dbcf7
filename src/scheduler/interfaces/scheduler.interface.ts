export enum Capability {
  DISCOVERY = 'discovery',
  RESEARCH = 'research',
  SUMMARIZER = 'summarizer',
  VERIFIER = 'verifier',
}

export const CAPABILITIES: readonly Capability[] = Object.values(Capability);

export interface CapabilityLimits {
  /** Minimum spacing between two grants for the capability */
  minIntervalMs: number;
  maxConcurrent: number;
  /** Cumulative spend allowed for this capability within one campaign */
  costCeiling: number;
  /**
   * Cost of one unit of work at this capability. For discovery the unit is a
   * returned record; for every other capability it is one call.
   */
  estimatedCost: number;
}

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  maxRetries: number;
}

export type DenialReason = 'BudgetExceeded' | 'Halted';

export interface Grant {
  readonly id: number;
  readonly capability: Capability;
  readonly estimatedCost: number;
  readonly issuedAt: number;
}

export interface Reservation {
  readonly id: number;
  readonly projectedCost: number;
  remaining: number;
  settled: boolean;
}

export interface Denial {
  granted: false;
  reason: DenialReason;
  detail: string;
}

export type AcquireResult = { granted: true; grant: Grant } | Denial;

export type ReserveResult =
  | { granted: true; reservation: Reservation }
  | Denial;

export interface AcquireOptions {
  /** Halting this signal turns a pending acquire into a `Halted` denial */
  signal?: AbortSignal;
  /** Draw the grant's estimate from an item reservation first */
  reservation?: Reservation;
}

export interface LedgerEntry {
  capability: Capability;
  callsMade: number;
  failures: number;
  costAccrued: number;
  lastCallAt: Date | null;
}

/** Change produced by one released grant */
export interface LedgerDelta {
  capability: Capability;
  calls: number;
  failures: number;
  cost: number;
  at: Date;
}

/** Persists ledger deltas; awaited by `release` */
export type LedgerSink = (delta: LedgerDelta) => Promise<void>;

export type CallOutcome = 'success' | 'failure';
