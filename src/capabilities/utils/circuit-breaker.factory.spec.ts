import { CapabilityError, ThrottledError } from '../../common/errors';
import { CircuitBreakerFactory, fireBreaker } from './circuit-breaker.factory';

describe('CircuitBreakerFactory', () => {
  let factory: CircuitBreakerFactory;

  beforeEach(() => {
    factory = new CircuitBreakerFactory();
  });

  it('should pass results through a closed breaker', async () => {
    const breaker = factory.createBreaker('echo', (value: string) =>
      Promise.resolve(value.toUpperCase()),
    );

    await expect(fireBreaker('echo', breaker, 'ok')).resolves.toBe('OK');
    expect(factory.health().echo).toMatchObject({ state: 'CLOSED', fires: 1 });
  });

  it('should open after failures and reject as CapabilityError', async () => {
    const breaker = factory.createBreaker(
      'flaky',
      () => Promise.reject(new Error('connection reset')),
      { volumeThreshold: 1, errorThreshold: 1, resetTimeout: 60000 },
    );

    await expect(fireBreaker('flaky', breaker)).rejects.toBeInstanceOf(CapabilityError);
    const error = await fireBreaker('flaky', breaker).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CapabilityError);
    expect(factory.health().flaky.state).toBe('OPEN');
    breaker.shutdown();
  });

  it('should not count throttling towards opening the circuit', async () => {
    const breaker = factory.createBreaker(
      'throttled',
      () => Promise.reject(new ThrottledError('throttled')),
      { volumeThreshold: 1, errorThreshold: 1 },
    );

    await expect(fireBreaker('throttled', breaker)).rejects.toBeInstanceOf(ThrottledError);
    await expect(fireBreaker('throttled', breaker)).rejects.toBeInstanceOf(ThrottledError);
    expect(factory.health().throttled.state).toBe('CLOSED');
    breaker.shutdown();
  });
});
