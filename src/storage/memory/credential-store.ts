import type {
  ICredentialStore,
  StoreEntry,
  CounterState,
} from '../interfaces/credential-store.js';

interface Entry<T> {
  value: T;
  expiresAt: number | null; // epoch ms
}

/**
 * In-memory credential store with Redis-like TTL semantics.
 * Used by tests and single-process development runs.
 */
export class MemoryCredentialStore implements ICredentialStore {
  private values = new Map<string, Entry<string>>();
  private sets = new Map<string, Entry<Set<string>>>();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  private live<T>(map: Map<string, Entry<T>>, key: string): Entry<T> | undefined {
    const entry = map.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      map.delete(key);
      return undefined;
    }
    return entry;
  }

  private expiry(ttlSeconds: number): number {
    return this.now() + ttlSeconds * 1000;
  }

  async get(key: string): Promise<string | null> {
    return this.live(this.values, key)?.value ?? null;
  }

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.sets.delete(key);
    this.values.set(key, { value, expiresAt: this.expiry(ttlSeconds) });
  }

  async putMany(entries: StoreEntry[]): Promise<void> {
    for (const entry of entries) {
      await this.put(entry.key, entry.value, entry.ttlSeconds);
    }
  }

  async delete(...keys: string[]): Promise<number> {
    let deleted = 0;
    for (const key of keys) {
      if (this.live(this.values, key) || this.live(this.sets, key)) {
        deleted++;
      }
      this.values.delete(key);
      this.sets.delete(key);
    }
    return deleted;
  }

  async ttl(key: string): Promise<number | null> {
    const entry = this.live(this.values, key) ?? this.live(this.sets, key);
    if (!entry || entry.expiresAt === null) return null;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  async updatePreservingTtl(key: string, value: string): Promise<boolean> {
    const entry = this.live(this.values, key);
    if (!entry) return false;

    this.values.set(key, { value, expiresAt: entry.expiresAt });
    return true;
  }

  async compareAndSwap(key: string, expected: string, next: string | null): Promise<boolean> {
    const entry = this.live(this.values, key);
    if (!entry || entry.value !== expected) return false;

    if (next === null) {
      this.values.delete(key);
    } else {
      this.values.set(key, { value: next, expiresAt: entry.expiresAt });
    }
    return true;
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (this.live(this.values, key) || this.live(this.sets, key)) return false;

    this.values.set(key, { value, expiresAt: this.expiry(ttlSeconds) });
    return true;
  }

  async addMember(setKey: string, member: string, ttlSeconds: number): Promise<void> {
    const entry = this.live(this.sets, setKey);
    const members = entry?.value ?? new Set<string>();
    members.add(member);
    this.sets.set(setKey, { value: members, expiresAt: this.expiry(ttlSeconds) });
  }

  async members(setKey: string): Promise<string[]> {
    const entry = this.live(this.sets, setKey);
    return entry ? [...entry.value] : [];
  }

  async removeMember(setKey: string, member: string): Promise<void> {
    const entry = this.live(this.sets, setKey);
    if (!entry) return;

    entry.value.delete(member);
    if (entry.value.size === 0) {
      this.sets.delete(setKey);
    }
  }

  async increment(key: string, windowSeconds: number): Promise<CounterState> {
    const entry = this.live(this.values, key);

    if (!entry || entry.expiresAt === null) {
      const expiresAt = this.expiry(windowSeconds);
      this.values.set(key, { value: '1', expiresAt });
      return { count: 1, ttlSeconds: windowSeconds };
    }

    const count = Number.parseInt(entry.value, 10) + 1;
    this.values.set(key, { value: String(count), expiresAt: entry.expiresAt });
    return { count, ttlSeconds: Math.ceil((entry.expiresAt - this.now()) / 1000) };
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  /**
   * Number of live keys (testing helper)
   */
  size(): number {
    let count = 0;
    for (const key of [...this.values.keys()]) {
      if (this.live(this.values, key)) count++;
    }
    for (const key of [...this.sets.keys()]) {
      if (this.live(this.sets, key)) count++;
    }
    return count;
  }
}
