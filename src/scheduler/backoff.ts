import { BackoffPolicy } from './interfaces/scheduler.interface';

/**
 * Delay before retry number `attempt` (0-based): base * 2^attempt, capped at
 * the policy maximum. A provider's retry-after hint wins when it is longer.
 */
export function backoffDelay(
  policy: BackoffPolicy,
  attempt: number,
  retryAfterMs?: number,
): number {
  const exponential = Math.min(
    policy.maxDelayMs,
    policy.baseDelayMs * Math.pow(2, attempt),
  );
  if (retryAfterMs === undefined) return exponential;
  return Math.min(policy.maxDelayMs, Math.max(exponential, retryAfterMs));
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
