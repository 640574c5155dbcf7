import type { ExecutionSettings } from '../config/execution.settings';
import type { CoverageUnit } from '../coverage/interfaces/coverage.interface';
import { Capability } from './interfaces/scheduler.interface';

export interface CampaignCostEstimate {
  expectedRecords: number;
  discovery: number;
  enrichment: number;
  total: number;
}

/**
 * Estimate for one summarizer call: the flat estimate, or the price of a
 * call at the configured token bounds when that is higher.
 */
export function summarizerCallEstimate(settings: ExecutionSettings): number {
  const { maxInputTokens, maxOutputTokens } = settings.summarizer;
  const pricing = settings.summarizerPricing;
  const bounded =
    (maxInputTokens / 1000) * pricing.inputPer1kTokens +
    (maxOutputTokens / 1000) * pricing.outputPer1kTokens;
  return Math.max(
    settings.capabilities[Capability.SUMMARIZER].estimatedCost,
    bounded,
  );
}

/**
 * Expected cost of one item's cycle after discovery: one page fetch, one
 * summary, one composed message and one verification.
 */
export function projectedItemCost(settings: ExecutionSettings): number {
  const limits = settings.capabilities;
  return (
    limits[Capability.RESEARCH].estimatedCost +
    2 * summarizerCallEstimate(settings) +
    limits[Capability.VERIFIER].estimatedCost
  );
}

/**
 * Most an item's cycle can draw: the home page plus every followed link
 * fetched and summarized, the composed message and one verification.
 */
export function itemReservationCost(settings: ExecutionSettings): number {
  const pages = 1 + settings.research.maxLinks;
  const limits = settings.capabilities;
  return (
    pages * limits[Capability.RESEARCH].estimatedCost +
    (pages + 1) * summarizerCallEstimate(settings) +
    limits[Capability.VERIFIER].estimatedCost
  );
}

/** Records a discovery call for the unit is expected to return. */
export function expectedUnitRecords(
  unit: Pick<CoverageUnit, 'expectedCount'>,
  settings: ExecutionSettings,
): number {
  return Math.min(
    Math.max(0, unit.expectedCount),
    settings.discoveryMaxResultsPerUnit,
  );
}

export function estimateCampaignCost(
  units: readonly Pick<CoverageUnit, 'expectedCount'>[],
  settings: ExecutionSettings,
): CampaignCostEstimate {
  const expectedRecords = units.reduce(
    (sum, unit) => sum + expectedUnitRecords(unit, settings),
    0,
  );
  const discovery =
    expectedRecords * settings.capabilities[Capability.DISCOVERY].estimatedCost;
  const enrichment = expectedRecords * projectedItemCost(settings);

  return {
    expectedRecords,
    discovery: round(discovery),
    enrichment: round(enrichment),
    total: round(discovery + enrichment),
  };
}

function round(amount: number): number {
  return Math.round(amount * 10_000) / 10_000;
}
