import { z } from 'zod';
import {
  BackoffPolicy,
  Capability,
  CapabilityLimits,
} from '../scheduler/interfaces/scheduler.interface';

export const EXECUTION_SETTINGS = 'EXECUTION_SETTINGS';

export interface ResearchLimits {
  maxLinks: number;
  maxBytes: number;
  pageCharLimit: number;
  timeoutMs: number;
  domainDelayMs: number;
  domainFailureThreshold: number;
}

export interface SummarizerLimits {
  maxInputTokens: number;
  maxOutputTokens: number;
}

export interface SummarizerPricing {
  inputPer1kTokens: number;
  outputPer1kTokens: number;
}

export interface ExecutionSettings {
  workerPoolSize: number;
  heartbeatIntervalMs: number;
  stallMonitorEnabled: boolean;
  stallThresholdMs: number;
  stallCheckIntervalMs: number;
  discoveryMaxResultsPerUnit: number;
  fallbackExpectedCount: number;
  verificationSafeScore: number;
  resultsMaxLimit: number;
  research: ResearchLimits;
  backoff: BackoffPolicy;
  capabilities: Record<Capability, CapabilityLimits>;
  summarizer: SummarizerLimits;
  summarizerPricing: SummarizerPricing;
}

// Per-capability defaults; discovery's estimatedCost is per returned record
const CAPABILITY_DEFAULTS: Record<Capability, CapabilityLimits> = {
  [Capability.DISCOVERY]: {
    minIntervalMs: 1000,
    maxConcurrent: 2,
    costCeiling: Infinity,
    estimatedCost: 0.004,
  },
  [Capability.RESEARCH]: {
    minIntervalMs: 0,
    maxConcurrent: 6,
    costCeiling: Infinity,
    estimatedCost: 0,
  },
  [Capability.SUMMARIZER]: {
    minIntervalMs: 100,
    maxConcurrent: 10,
    costCeiling: Infinity,
    estimatedCost: 0.002,
  },
  [Capability.VERIFIER]: {
    minIntervalMs: 200,
    maxConcurrent: 5,
    costCeiling: Infinity,
    estimatedCost: 0.002,
  },
};

const integer = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);
const amount = (fallback: number) =>
  z.coerce.number().nonnegative().default(fallback);
const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true');

const capabilitySchema = (defaults: CapabilityLimits) =>
  z.object({
    minIntervalMs: integer(defaults.minIntervalMs),
    maxConcurrent: integer(defaults.maxConcurrent, 1),
    costCeiling: z.coerce.number().positive().default(defaults.costCeiling),
    estimatedCost: amount(defaults.estimatedCost),
  });

export const ExecutionSettingsSchema = z
  .object({
    workerPoolSize: integer(3, 1),
    heartbeatIntervalMs: integer(30_000, 10),
    stallMonitorEnabled: flag(true),
    stallThresholdMs: integer(5 * 60_000, 1),
    stallCheckIntervalMs: integer(60_000, 10),
    discoveryMaxResultsPerUnit: integer(1000, 1),
    fallbackExpectedCount: integer(250, 1),
    verificationSafeScore: z.coerce.number().min(0).max(100).default(70),
    resultsMaxLimit: integer(100, 1),
    research: z.object({
      maxLinks: integer(3),
      maxBytes: integer(200_000, 1),
      pageCharLimit: integer(5000, 1),
      timeoutMs: integer(15_000, 1),
      domainDelayMs: integer(2000),
      domainFailureThreshold: integer(3, 1),
    }),
    backoff: z.object({
      baseDelayMs: integer(1000),
      maxDelayMs: integer(30_000),
      maxRetries: integer(3),
    }),
    capabilities: z.object({
      [Capability.DISCOVERY]: capabilitySchema(
        CAPABILITY_DEFAULTS[Capability.DISCOVERY],
      ),
      [Capability.RESEARCH]: capabilitySchema(
        CAPABILITY_DEFAULTS[Capability.RESEARCH],
      ),
      [Capability.SUMMARIZER]: capabilitySchema(
        CAPABILITY_DEFAULTS[Capability.SUMMARIZER],
      ),
      [Capability.VERIFIER]: capabilitySchema(
        CAPABILITY_DEFAULTS[Capability.VERIFIER],
      ),
    }),
    summarizer: z.object({
      maxInputTokens: integer(4000, 1),
      maxOutputTokens: integer(512, 1),
    }),
    summarizerPricing: z.object({
      inputPer1kTokens: amount(0.0001),
      outputPer1kTokens: amount(0.0004),
    }),
  })
  .refine(
    (settings) =>
      settings.workerPoolSize <=
      Math.min(
        settings.capabilities[Capability.RESEARCH].maxConcurrent,
        settings.capabilities[Capability.SUMMARIZER].maxConcurrent,
        settings.capabilities[Capability.VERIFIER].maxConcurrent,
      ),
    {
      message:
        'WORKER_POOL_SIZE must not exceed the max concurrency of research, summarizer or verifier',
      path: ['workerPoolSize'],
    },
  );

type EnvReader = (key: string) => string | undefined;

function capabilityInput(read: EnvReader, capability: Capability) {
  const prefix = capability.toUpperCase();
  return {
    minIntervalMs: read(`${prefix}_MIN_INTERVAL_MS`),
    maxConcurrent: read(`${prefix}_MAX_CONCURRENT`),
    costCeiling: read(`${prefix}_COST_CEILING`),
    estimatedCost: read(`${prefix}_ESTIMATED_COST`),
  };
}

/**
 * Builds execution settings from environment-style keys. Throws a ZodError
 * listing every invalid key.
 */
export function parseExecutionSettings(read: EnvReader): ExecutionSettings {
  return ExecutionSettingsSchema.parse({
    workerPoolSize: read('WORKER_POOL_SIZE'),
    heartbeatIntervalMs: read('HEARTBEAT_INTERVAL_MS'),
    stallMonitorEnabled: read('STALL_MONITOR_ENABLED'),
    stallThresholdMs: read('STALL_THRESHOLD_MS'),
    stallCheckIntervalMs: read('STALL_CHECK_INTERVAL_MS'),
    discoveryMaxResultsPerUnit: read('DISCOVERY_MAX_RESULTS_PER_UNIT'),
    fallbackExpectedCount: read('FALLBACK_EXPECTED_COUNT'),
    verificationSafeScore: read('VERIFICATION_SAFE_SCORE'),
    resultsMaxLimit: read('RESULTS_MAX_LIMIT'),
    research: {
      maxLinks: read('RESEARCH_MAX_LINKS'),
      maxBytes: read('RESEARCH_MAX_BYTES'),
      pageCharLimit: read('RESEARCH_PAGE_CHAR_LIMIT'),
      timeoutMs: read('RESEARCH_TIMEOUT_MS'),
      domainDelayMs: read('RESEARCH_DOMAIN_DELAY_MS'),
      domainFailureThreshold: read('RESEARCH_DOMAIN_FAILURE_THRESHOLD'),
    },
    backoff: {
      baseDelayMs: read('BACKOFF_BASE_DELAY_MS'),
      maxDelayMs: read('BACKOFF_MAX_DELAY_MS'),
      maxRetries: read('BACKOFF_MAX_RETRIES'),
    },
    capabilities: {
      [Capability.DISCOVERY]: capabilityInput(read, Capability.DISCOVERY),
      [Capability.RESEARCH]: capabilityInput(read, Capability.RESEARCH),
      [Capability.SUMMARIZER]: capabilityInput(read, Capability.SUMMARIZER),
      [Capability.VERIFIER]: capabilityInput(read, Capability.VERIFIER),
    },
    summarizer: {
      maxInputTokens: read('SUMMARIZER_MAX_INPUT_TOKENS'),
      maxOutputTokens: read('SUMMARIZER_MAX_OUTPUT_TOKENS'),
    },
    summarizerPricing: {
      inputPer1kTokens: read('SUMMARIZER_INPUT_COST_PER_1K'),
      outputPer1kTokens: read('SUMMARIZER_OUTPUT_COST_PER_1K'),
    },
  });
}

/** Settings with every default applied, handy for tests and scripts */
export function defaultExecutionSettings(
  overrides: Record<string, string> = {},
): ExecutionSettings {
  return parseExecutionSettings((key) => overrides[key]);
}
