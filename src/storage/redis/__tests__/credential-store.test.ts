import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RedisCredentialStore } from '../credential-store.js';
import { AuthError } from '../../../errors/auth-error.js';

const redis = vi.hoisted(() => ({
  get: vi.fn(),
  set: vi.fn(),
  del: vi.fn(),
  ttl: vi.fn(),
  eval: vi.fn(),
  ping: vi.fn(),
}));

vi.mock('@upstash/redis', () => ({
  Redis: class {
    get = redis.get;
    set = redis.set;
    del = redis.del;
    ttl = redis.ttl;
    eval = redis.eval;
    ping = redis.ping;
  },
}));

describe('RedisCredentialStore', () => {
  let store: RedisCredentialStore;

  beforeEach(() => {
    vi.resetAllMocks();
    store = new RedisCredentialStore({
      url: 'https://redis.test',
      token: 'test-token',
      timeoutMs: 20,
    });
  });

  it('should map a slow backend to store_unavailable', async () => {
    redis.get.mockReturnValue(new Promise(() => undefined));

    const error = await store.get('k').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({
      failure: { kind: 'store_unavailable', detail: 'redis GET timed out after 20ms' },
    });
  });

  it('should map backend errors to store_unavailable', async () => {
    redis.set.mockRejectedValue(new Error('connection reset'));

    await expect(store.put('k', 'v', 10)).rejects.toMatchObject({
      failure: { kind: 'store_unavailable', detail: 'connection reset' },
    });
  });

  it('should write with an expiry', async () => {
    redis.set.mockResolvedValue('OK');
    await store.put('k', 'v', 10);
    expect(redis.set).toHaveBeenCalledWith('k', 'v', { ex: 10 });
  });

  it('should report missing and persistent keys as having no TTL', async () => {
    redis.ttl.mockResolvedValueOnce(-2).mockResolvedValueOnce(-1).mockResolvedValueOnce(42);

    expect(await store.ttl('a')).toBeNull();
    expect(await store.ttl('b')).toBeNull();
    expect(await store.ttl('c')).toBe(42);
  });

  it('should treat a null SET NX reply as already present', async () => {
    redis.set.mockResolvedValueOnce('OK').mockResolvedValueOnce(null);

    expect(await store.setIfAbsent('k', 'v', 10)).toBe(true);
    expect(await store.setIfAbsent('k', 'v', 10)).toBe(false);
    expect(redis.set).toHaveBeenCalledWith('k', 'v', { nx: true, ex: 10 });
  });

  it('should pass delete requests to the swap script', async () => {
    redis.eval.mockResolvedValue(1);

    expect(await store.compareAndSwap('k', 'old', null)).toBe(true);
    expect(redis.eval).toHaveBeenCalledWith(expect.any(String), ['k'], ['old', '', '1']);
  });

  it('should read counter replies', async () => {
    redis.eval.mockResolvedValueOnce([3, 57]).mockResolvedValueOnce([1, -1]);

    expect(await store.increment('c', 60)).toEqual({ count: 3, ttlSeconds: 57 });
    expect(await store.increment('c', 60)).toEqual({ count: 1, ttlSeconds: 60 });
  });

  it('should reject malformed counter replies', async () => {
    redis.eval.mockResolvedValue('nonsense');

    await expect(store.increment('c', 60)).rejects.toMatchObject({
      failure: { kind: 'store_unavailable', detail: 'unexpected counter reply' },
    });
  });

  it('should report health from PING', async () => {
    redis.ping.mockResolvedValueOnce('PONG').mockRejectedValueOnce(new Error('down'));

    expect(await store.isHealthy()).toBe(true);
    expect(await store.isHealthy()).toBe(false);
  });

  it('should skip empty deletes', async () => {
    expect(await store.delete()).toBe(0);
    expect(redis.del).not.toHaveBeenCalled();
  });
});
