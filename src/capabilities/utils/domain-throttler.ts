import { Logger } from '@nestjs/common';
import { sleep } from '../../scheduler/backoff';

export interface DomainThrottlerOptions {
  minDelayMs: number;
  failureThreshold: number;
  clock?: () => number;
}

/**
 * Keeps a minimum delay between requests to the same domain and blocks a
 * domain after too many consecutive failures.
 */
export class DomainThrottler {
  private readonly logger = new Logger(DomainThrottler.name);
  private readonly nextSlot = new Map<string, number>();
  private readonly failures = new Map<string, number>();
  private readonly blocked = new Set<string>();
  private readonly clock: () => number;

  constructor(private readonly options: DomainThrottlerOptions) {
    this.clock = options.clock ?? Date.now;
  }

  isBlocked(domain: string): boolean {
    return this.blocked.has(domain);
  }

  /** Waits for the domain's next free slot and claims it. */
  async wait(domain: string, signal?: AbortSignal): Promise<void> {
    const now = this.clock();
    const slot = Math.max(now, this.nextSlot.get(domain) ?? 0);
    this.nextSlot.set(domain, slot + this.options.minDelayMs);
    await sleep(slot - now, signal);
  }

  recordSuccess(domain: string): void {
    this.failures.delete(domain);
  }

  recordFailure(domain: string): void {
    const count = (this.failures.get(domain) ?? 0) + 1;
    this.failures.set(domain, count);
    if (count >= this.options.failureThreshold && !this.blocked.has(domain)) {
      this.blocked.add(domain);
      this.logger.warn(`Domain marked as failed: ${domain}`);
    }
  }
}
