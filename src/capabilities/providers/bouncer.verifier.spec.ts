import { ConfigService } from '@nestjs/config';
import { CapabilityError, ThrottledError } from '../../common/errors';
import { CircuitBreakerFactory } from '../utils/circuit-breaker.factory';
import { BouncerVerifier } from './bouncer.verifier';

describe('BouncerVerifier', () => {
  let fetchSpy: jest.SpyInstance;
  let verifier: BouncerVerifier;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    verifier = new BouncerVerifier(
      new ConfigService({ BOUNCER_API_KEY: 'test-key' }),
      new CircuitBreakerFactory(),
    );
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should return status and score from the provider', async () => {
    fetchSpy.mockResolvedValue(
      new Response(JSON.stringify({ status: 'deliverable', score: 97, reason: 'accepted_email' })),
    );

    await expect(verifier.verify('owner@shop.example.com')).resolves.toEqual({
      status: 'deliverable',
      score: 97,
      reason: 'accepted_email',
    });
    const [url, init] = fetchSpy.mock.calls[0];
    expect(String(url)).toBe(
      'https://api.usebouncer.com/v1.1/email/verify?email=owner%40shop.example.com',
    );
    expect(init.headers).toMatchObject({ 'x-api-key': 'test-key' });
  });

  it('should map unrecognised statuses to unknown and clamp the score', async () => {
    fetchSpy.mockResolvedValue(new Response(JSON.stringify({ status: 'timeout', score: 140 })));

    await expect(verifier.verify('a@b.example.com')).resolves.toEqual({
      status: 'unknown',
      score: 100,
      reason: null,
    });
  });

  it('should raise ThrottledError on 429', async () => {
    fetchSpy.mockResolvedValue(new Response('', { status: 429 }));

    await expect(verifier.verify('a@b.example.com')).rejects.toBeInstanceOf(ThrottledError);
  });

  it('should raise CapabilityError on a malformed payload', async () => {
    fetchSpy.mockResolvedValue(new Response(JSON.stringify({ unexpected: true })));

    await expect(verifier.verify('a@b.example.com')).rejects.toBeInstanceOf(CapabilityError);
  });
});
