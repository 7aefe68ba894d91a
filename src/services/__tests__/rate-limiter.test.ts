import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimiter } from '../rate-limiter.js';
import { MemoryCredentialStore } from '../../storage/memory/credential-store.js';
import { clientKey } from '../../middleware/rate-limiter.js';

const limits = {
  token: { maxRequests: 2, windowSeconds: 60 },
  device: { maxRequests: 5, windowSeconds: 60 },
  authorize: { maxRequests: 20, windowSeconds: 60 },
  revoke: { maxRequests: 10, windowSeconds: 60 },
};

describe('RateLimiter', () => {
  let clock: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    clock = 0;
    const store = new MemoryCredentialStore({ now: () => clock });
    limiter = new RateLimiter(store, { limits, bypassSecret: 'test-internal-secret' });
  });

  it('should allow requests up to the limit', async () => {
    expect(await limiter.check('token', 'svc')).toEqual({
      endpoint: 'token',
      limit: 2,
      remaining: 1,
      bypassed: false,
    });
    expect((await limiter.check('token', 'svc')).remaining).toBe(0);
  });

  it('should reject the request over the limit with the window remainder', async () => {
    await limiter.check('token', 'svc');
    await limiter.check('token', 'svc');
    clock = 30_000;

    await expect(limiter.check('token', 'svc')).rejects.toMatchObject({
      failure: { kind: 'rate_limited', limit: 2, count: 3, retryAfter: 30 },
    });
  });

  it('should bypass only with the exact secret', async () => {
    expect(limiter.isBypassed('test-internal-secret')).toBe(true);
    expect(limiter.isBypassed('test-internal-secre')).toBe(false);
    expect(limiter.isBypassed(undefined)).toBe(false);

    for (let i = 0; i < 5; i++) {
      expect((await limiter.check('token', 'svc', 'test-internal-secret')).bypassed).toBe(true);
    }
  });

  it('should never bypass without a configured secret', () => {
    const open = new RateLimiter(new MemoryCredentialStore(), { limits });
    expect(open.isBypassed('')).toBe(false);
    expect(open.isBypassed('anything')).toBe(false);
  });
});

describe('clientKey', () => {
  const headers = (values: Record<string, string>) => (name: string) =>
    values[name.toLowerCase()];

  it('should prefer the client id header', () => {
    expect(clientKey(headers({ 'x-client-id': 'svc', 'x-forwarded-for': '1.2.3.4' }))).toBe('svc');
  });

  it('should fall back to the first forwarded address', () => {
    expect(clientKey(headers({ 'x-forwarded-for': '1.2.3.4, 5.6.7.8' }))).toBe('1.2.3.4');
  });

  it('should fall back to the real ip and then to unknown', () => {
    expect(clientKey(headers({ 'x-real-ip': '9.9.9.9' }))).toBe('9.9.9.9');
    expect(clientKey(headers({}))).toBe('unknown');
  });
});
