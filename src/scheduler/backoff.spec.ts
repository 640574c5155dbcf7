import { backoffDelay, sleep } from './backoff';

describe('backoffDelay', () => {
  const policy = { baseDelayMs: 100, maxDelayMs: 1000, maxRetries: 5 };

  it('should double the delay on each attempt', () => {
    expect([0, 1, 2, 3].map((attempt) => backoffDelay(policy, attempt))).toEqual([
      100, 200, 400, 800,
    ]);
  });

  it('should cap the delay at the maximum', () => {
    expect(backoffDelay(policy, 4)).toBe(1000);
    expect(backoffDelay(policy, 10)).toBe(1000);
  });

  it('should prefer a longer retry-after hint, within the cap', () => {
    expect(backoffDelay(policy, 0, 500)).toBe(500);
    expect(backoffDelay(policy, 2, 50)).toBe(400);
    expect(backoffDelay(policy, 0, 5000)).toBe(1000);
  });
});

describe('sleep', () => {
  it('should resolve early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();

    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;

    expect(Date.now() - started).toBeLessThan(1000);
  });
});
