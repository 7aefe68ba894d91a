/**
 * Upstash Redis credential store
 *
 * Redis over REST, so it works from long-running servers and serverless
 * runtimes alike. Multi-step updates run as Lua scripts or MULTI
 * transactions so that concurrent requests never interleave.
 */

import { Redis } from '@upstash/redis';
import { z } from 'zod';
import type {
  ICredentialStore,
  StoreEntry,
  CounterState,
} from '../interfaces/credential-store.js';
import { AuthError } from '../../errors/auth-error.js';
import { withTimeout } from '../../utils/timeout.js';
import { DEFAULT_STORE_TIMEOUT_MS } from '../../config/constants.js';

// KEYS[1] = key, ARGV[1] = expected, ARGV[2] = next, ARGV[3] = '1' to delete
const COMPARE_AND_SWAP_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if current ~= ARGV[1] then
  return 0
end
if ARGV[3] == '1' then
  redis.call('DEL', KEYS[1])
else
  redis.call('SET', KEYS[1], ARGV[2], 'KEEPTTL')
end
return 1
`;

// KEYS[1] = counter, ARGV[1] = window seconds
const INCREMENT_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return { count, redis.call('TTL', KEYS[1]) }
`;

const counterReplySchema = z.tuple([z.coerce.number(), z.coerce.number()]);

export interface RedisCredentialStoreOptions {
  url: string;
  token: string;
  timeoutMs?: number;
}

export class RedisCredentialStore implements ICredentialStore {
  private redis: Redis;
  private readonly timeoutMs: number;

  constructor(options: RedisCredentialStoreOptions) {
    this.redis = new Redis({
      url: options.url,
      token: options.token,
      // Values are JSON strings we parse ourselves
      automaticDeserialization: false,
      retry: false,
    });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
  }

  /**
   * Bound a backend call and map every failure to `store_unavailable`
   */
  private async run<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(call(), this.timeoutMs, `redis ${operation}`);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new AuthError({ kind: 'store_unavailable', detail }, { cause: error });
    }
  }

  async get(key: string): Promise<string | null> {
    return this.run('GET', () => this.redis.get<string>(key));
  }

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.run('SET', () => this.redis.set(key, value, { ex: ttlSeconds }));
  }

  async putMany(entries: StoreEntry[]): Promise<void> {
    if (entries.length === 0) return;

    await this.run('MULTI', () => {
      const tx = this.redis.multi();
      for (const entry of entries) {
        tx.set(entry.key, entry.value, { ex: entry.ttlSeconds });
      }
      return tx.exec();
    });
  }

  async delete(...keys: string[]): Promise<number> {
    if (keys.length === 0) return 0;
    return this.run('DEL', () => this.redis.del(...keys));
  }

  async ttl(key: string): Promise<number | null> {
    const seconds = await this.run('TTL', () => this.redis.ttl(key));
    // -2: missing, -1: no expiry
    return seconds < 0 ? null : seconds;
  }

  async updatePreservingTtl(key: string, value: string): Promise<boolean> {
    const reply = await this.run('SET', () =>
      this.redis.set(key, value, { keepTtl: true, xx: true })
    );
    return reply !== null;
  }

  async compareAndSwap(key: string, expected: string, next: string | null): Promise<boolean> {
    const reply = await this.run('EVAL', () =>
      this.redis.eval<string[], number>(
        COMPARE_AND_SWAP_SCRIPT,
        [key],
        [expected, next ?? '', next === null ? '1' : '0']
      )
    );
    return Number(reply) === 1;
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const reply = await this.run('SET', () =>
      this.redis.set(key, value, { nx: true, ex: ttlSeconds })
    );
    return reply !== null;
  }

  async addMember(setKey: string, member: string, ttlSeconds: number): Promise<void> {
    await this.run('MULTI', () => {
      const tx = this.redis.multi();
      tx.sadd(setKey, member);
      tx.expire(setKey, ttlSeconds);
      return tx.exec();
    });
  }

  async members(setKey: string): Promise<string[]> {
    return this.run('SMEMBERS', () => this.redis.smembers(setKey));
  }

  async removeMember(setKey: string, member: string): Promise<void> {
    await this.run('SREM', () => this.redis.srem(setKey, member));
  }

  async increment(key: string, windowSeconds: number): Promise<CounterState> {
    const reply = await this.run('EVAL', () =>
      this.redis.eval<string[], unknown>(INCREMENT_SCRIPT, [key], [String(windowSeconds)])
    );

    const parsed = counterReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new AuthError({ kind: 'store_unavailable', detail: 'unexpected counter reply' });
    }

    const [count, ttlSeconds] = parsed.data;
    return { count, ttlSeconds: ttlSeconds < 0 ? windowSeconds : ttlSeconds };
  }

  async isHealthy(): Promise<boolean> {
    try {
      const reply = await this.run('PING', () => this.redis.ping());
      return reply === 'PONG';
    } catch (error) {
      if (error instanceof AuthError) return false;
      throw error;
    }
  }
}
