import { Controller, Get } from '@nestjs/common';
import {
  CircuitBreakerFactory,
  CircuitHealth,
} from '../capabilities/utils/circuit-breaker.factory';

export interface HealthView {
  status: 'ok' | 'degraded';
  circuits: Record<string, CircuitHealth>;
}

@Controller('health')
export class HealthController {
  constructor(private readonly breakers: CircuitBreakerFactory) {}

  /** Degraded while any provider circuit is open. */
  @Get()
  check(): HealthView {
    const circuits = this.breakers.health();
    const degraded = Object.values(circuits).some((circuit) => circuit.state === 'OPEN');
    return { status: degraded ? 'degraded' : 'ok', circuits };
  }
}
