import { HealthController } from './health.controller';
import { CircuitBreakerFactory } from '../capabilities/utils/circuit-breaker.factory';

describe('HealthController', () => {
  it('should report ok with no open circuits', () => {
    const breakers = new CircuitBreakerFactory();
    breakers.createBreaker('bouncer', async () => 'ok');

    expect(new HealthController(breakers).check()).toEqual({
      status: 'ok',
      circuits: {
        bouncer: { state: 'CLOSED', failures: 0, rejects: 0, fires: 0 },
      },
    });
  });

  it('should report degraded while a circuit is open', () => {
    const breakers = new CircuitBreakerFactory();
    const breaker = breakers.createBreaker('gemini', async () => 'ok');
    breaker.open();

    const health = new HealthController(breakers).check();
    breaker.shutdown();

    expect(health.status).toBe('degraded');
    expect(health.circuits.gemini.state).toBe('OPEN');
  });
});
