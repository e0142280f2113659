/**
 * Cache Store
 *
 * The fast key-value store shared by every request handler.
 * Values are strings; callers serialize their own payloads.
 */

export interface CacheSetOptions {
  readonly ttlSeconds?: number;
}

export interface CacheStore {
  readonly name: string;

  /** Returns undefined on a miss or an expired entry */
  get(key: string): Promise<string | undefined>;

  set(key: string, value: string, options?: CacheSetOptions): Promise<void>;

  /**
   * Atomically adds one to an integer counter and returns the new value.
   * A missing key counts from 0. Counters never expire.
   */
  increment(key: string): Promise<number>;

  delete(key: string): Promise<void>;

  /** Drops every key this store owns */
  clear(): Promise<void>;
}
