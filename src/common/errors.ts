/**
 * Error taxonomy shared by the planner, scheduler, pipeline stages and store.
 *
 * Item-level kinds are contained by the engine; planning and infrastructure
 * errors propagate to campaign status.
 */

export class InvalidRegionError extends Error {
  constructor(readonly region: string) {
    super(`No density entries for region "${region}"`);
    this.name = 'InvalidRegionError';
  }
}

/** Raised by capability adapters when a provider signals throttling (e.g. HTTP 429). */
export class ThrottledError extends Error {
  constructor(
    readonly provider: string,
    readonly retryAfterMs?: number,
  ) {
    super(`${provider} throttled the request`);
    this.name = 'ThrottledError';
  }
}

/** Backoff was exhausted while the provider kept throttling. */
export class ProviderThrottledError extends Error {
  constructor(
    readonly provider: string,
    readonly attempts: number,
  ) {
    super(`${provider} still throttling after ${attempts} attempts`);
    this.name = 'ProviderThrottledError';
  }
}

/** Any other provider-side failure (bad status, malformed payload, open circuit). */
export class CapabilityError extends Error {
  constructor(
    readonly provider: string,
    message: string,
    readonly statusCode?: number,
  ) {
    super(`${provider}: ${message}`);
    this.name = 'CapabilityError';
  }
}

/** Storage could not be reached or rejected a write. */
export class InfrastructureError extends Error {
  constructor(
    readonly operation: string,
    cause?: unknown,
  ) {
    super(`Repository operation "${operation}" failed: ${describeError(cause)}`, {
      cause,
    });
    this.name = 'InfrastructureError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
