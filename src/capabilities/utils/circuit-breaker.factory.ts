import { Injectable, Logger } from '@nestjs/common';
import CircuitBreaker from 'opossum';
import { CapabilityError, ThrottledError } from '../../common/errors';

export interface CircuitBreakerConfig {
  timeout: number;
  errorThreshold: number;
  resetTimeout: number;
  volumeThreshold: number;
}

export interface CircuitHealth {
  state: 'CLOSED' | 'OPEN' | 'HALF_OPEN';
  failures: number;
  rejects: number;
  fires: number;
}

interface BreakerView {
  readonly opened: boolean;
  readonly halfOpen: boolean;
  readonly stats: CircuitBreaker.Stats;
}

@Injectable()
export class CircuitBreakerFactory {
  private readonly logger = new Logger(CircuitBreakerFactory.name);
  private readonly breakers = new Map<string, BreakerView>();

  private readonly DEFAULT_CONFIG: CircuitBreakerConfig = {
    timeout: 30000,
    errorThreshold: 50,
    resetTimeout: 30000,
    volumeThreshold: 10,
  };

  createBreaker<TI extends unknown[], TR>(
    name: string,
    action: (...args: TI) => Promise<TR>,
    config?: Partial<CircuitBreakerConfig>,
  ): CircuitBreaker<TI, TR> {
    const merged = { ...this.DEFAULT_CONFIG, ...config };

    const breaker = new CircuitBreaker<TI, TR>(action, {
      timeout: merged.timeout,
      errorThresholdPercentage: merged.errorThreshold,
      resetTimeout: merged.resetTimeout,
      volumeThreshold: merged.volumeThreshold,
      // Throttling and client errors say nothing about provider health
      errorFilter: (error: unknown) =>
        error instanceof ThrottledError ||
        (error instanceof CapabilityError &&
          error.statusCode !== undefined &&
          error.statusCode >= 400 &&
          error.statusCode < 500),
    });

    breaker.on('open', () => {
      this.logger.error(`[OPEN] Circuit breaker OPEN for ${name}`);
    });
    breaker.on('halfOpen', () => {
      this.logger.warn(`[HALF-OPEN] Circuit breaker HALF-OPEN for ${name}`);
    });
    breaker.on('close', () => {
      this.logger.log(`[CLOSED] Circuit breaker CLOSED for ${name}`);
    });
    breaker.on('timeout', () => {
      this.logger.warn(`Circuit breaker timeout for ${name}`);
    });

    this.breakers.set(name, breaker);
    return breaker;
  }

  health(): Record<string, CircuitHealth> {
    const health: Record<string, CircuitHealth> = {};
    this.breakers.forEach((breaker, name) => {
      health[name] = {
        state: breaker.opened ? 'OPEN' : breaker.halfOpen ? 'HALF_OPEN' : 'CLOSED',
        failures: breaker.stats.failures,
        rejects: breaker.stats.rejects,
        fires: breaker.stats.fires,
      };
    });
    return health;
  }
}

/**
 * Fires a breaker and maps opossum's own rejections (open circuit, timeout)
 * to `CapabilityError`. Errors raised by the action pass through unchanged.
 */
export async function fireBreaker<TI extends unknown[], TR>(
  provider: string,
  breaker: CircuitBreaker<TI, TR>,
  ...args: TI
): Promise<TR> {
  try {
    return await breaker.fire(...args);
  } catch (error: unknown) {
    if (error instanceof ThrottledError || error instanceof CapabilityError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new CapabilityError(provider, message);
  }
}
