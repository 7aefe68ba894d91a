/**
 * One entry of an atomic multi-key write
 */
export interface StoreEntry {
  key: string;
  value: string;
  ttlSeconds: number;
}

/**
 * Result of a fixed-window counter increment
 */
export interface CounterState {
  count: number;
  ttlSeconds: number;
}

/**
 * Shared TTL key-value store behind every ephemeral credential.
 *
 * Every method rejects with an `AuthError` of kind `store_unavailable` when
 * the backend fails or does not answer in time.
 */
export interface ICredentialStore {
  get(key: string): Promise<string | null>;

  put(key: string, value: string, ttlSeconds: number): Promise<void>;

  /**
   * Write several keys as one transaction
   */
  putMany(entries: StoreEntry[]): Promise<void>;

  /**
   * Delete keys in a single operation, returning how many existed
   */
  delete(...keys: string[]): Promise<number>;

  /**
   * Remaining lifetime in seconds; null when the key is missing or has no TTL
   */
  ttl(key: string): Promise<number | null>;

  /**
   * Overwrite an existing key, keeping its remaining TTL.
   * Returns false when the key no longer exists.
   */
  updatePreservingTtl(key: string, value: string): Promise<boolean>;

  /**
   * Replace the value only if it still equals `expected`, keeping the TTL.
   * A null `next` deletes the key instead.
   */
  compareAndSwap(key: string, expected: string, next: string | null): Promise<boolean>;

  /**
   * Write only if the key does not exist. True when this call wrote it.
   */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;

  // Set operations (session index)
  addMember(setKey: string, member: string, ttlSeconds: number): Promise<void>;
  members(setKey: string): Promise<string[]>;
  removeMember(setKey: string, member: string): Promise<void>;

  /**
   * Increment a counter; the window TTL is set only when the counter is created
   */
  increment(key: string, windowSeconds: number): Promise<CounterState>;

  isHealthy(): Promise<boolean>;
}
