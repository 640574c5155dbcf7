import { CapabilityError, ThrottledError } from '../../common/errors';
import { raiseForStatus, readLimited, retryAfterMs } from './http';

describe('http utils', () => {
  describe('retryAfterMs', () => {
    it('should read seconds', () => {
      expect(retryAfterMs('3')).toBe(3000);
    });

    it('should read an HTTP date relative to now', () => {
      const now = Date.parse('2024-01-01T00:00:00Z');
      expect(retryAfterMs('Mon, 01 Jan 2024 00:00:05 GMT', now)).toBe(5000);
    });

    it('should ignore missing or garbled headers', () => {
      expect(retryAfterMs(null)).toBeUndefined();
      expect(retryAfterMs('soon')).toBeUndefined();
    });
  });

  describe('raiseForStatus', () => {
    it('should pass OK responses', async () => {
      await expect(raiseForStatus('p', new Response('ok'))).resolves.toBeUndefined();
    });

    it('should raise ThrottledError on 429 with the retry hint', async () => {
      const res = new Response('slow down', {
        status: 429,
        headers: { 'retry-after': '2' },
      });

      const error = await raiseForStatus('p', res).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ThrottledError);
      expect(error).toMatchObject({ provider: 'p', retryAfterMs: 2000 });
    });

    it('should raise CapabilityError with the status otherwise', async () => {
      const res = new Response('missing', { status: 404 });

      const error = await raiseForStatus('p', res).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CapabilityError);
      expect(error).toMatchObject({ statusCode: 404, message: 'p: HTTP 404: missing' });
    });
  });

  describe('readLimited', () => {
    it('should read a small body whole', async () => {
      await expect(readLimited(new Response('hello'), 100)).resolves.toEqual({
        body: 'hello',
        bytes: 5,
        truncated: false,
      });
    });

    it('should stop at the byte budget', async () => {
      await expect(readLimited(new Response('hello world'), 5)).resolves.toEqual({
        body: 'hello',
        bytes: 5,
        truncated: true,
      });
    });
  });
});
