import { CapabilityError, ThrottledError } from '../../common/errors';

/** Parses a Retry-After header given in seconds or as an HTTP date. */
export function retryAfterMs(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/**
 * Maps a non-OK response to the error the scheduler understands: 429 is a
 * throttling signal, anything else a capability failure carrying the status.
 */
export async function raiseForStatus(provider: string, res: Response): Promise<void> {
  if (res.ok) return;
  if (res.status === 429) {
    throw new ThrottledError(provider, retryAfterMs(res.headers.get('retry-after')));
  }
  const text = await res.text().catch(() => '');
  throw new CapabilityError(
    provider,
    `HTTP ${res.status}${text ? `: ${text.slice(0, 200)}` : ''}`,
    res.status,
  );
}

export interface LimitedBody {
  body: string;
  bytes: number;
  truncated: boolean;
}

/** Reads at most `maxBytes` of a response body, cancelling the rest. */
export async function readLimited(res: Response, maxBytes: number): Promise<LimitedBody> {
  if (!res.body) return { body: '', bytes: 0, truncated: false };

  const reader = res.body.getReader();
  const decoder = new TextDecoder();
  let body = '';
  let bytes = 0;
  let truncated = false;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    const chunk: Uint8Array = value;
    const room = maxBytes - bytes;
    if (chunk.byteLength > room) {
      body += decoder.decode(chunk.subarray(0, room), { stream: true });
      bytes += room;
      truncated = true;
      await reader.cancel();
      break;
    }
    body += decoder.decode(chunk, { stream: true });
    bytes += chunk.byteLength;
  }

  return { body: body + decoder.decode(), bytes, truncated };
}
