/**
 * In-Memory Cache Store
 *
 * Single-process CacheStore used when no REDIS_URL is configured and by
 * the test suites. Expired entries are dropped on read and swept on write
 * at most once per sweep interval, so pages orphaned by a version bump do
 * not accumulate. The store holds no timers.
 */

import type { CacheSetOptions, CacheStore } from "@issuedesk/contracts";

export interface MemoryCacheStoreOptions {
  /** Milliseconds since the epoch. Defaults to Date.now. */
  readonly clock?: () => number;
  /** Minimum time between sweeps of expired entries. Defaults to 30 seconds. */
  readonly sweepIntervalMs?: number;
}

interface CacheEntry {
  readonly value: string;
  readonly expiresAt?: number;
}

const DEFAULT_SWEEP_INTERVAL_MS = 30_000;

export class MemoryCacheStore implements CacheStore {
  readonly name = "memory";

  private readonly entries = new Map<string, CacheEntry>();
  private readonly clock: () => number;
  private readonly sweepIntervalMs: number;
  private nextSweepAt: number;

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.nextSweepAt = this.clock() + this.sweepIntervalMs;
  }

  async get(key: string): Promise<string | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  async set(key: string, value: string, options?: CacheSetOptions): Promise<void> {
    this.sweepIfDue();
    const expiresAt =
      options?.ttlSeconds === undefined ? undefined : this.clock() + options.ttlSeconds * 1000;
    this.entries.set(key, { value, expiresAt });
  }

  /** Read and write happen in one synchronous step, so concurrent callers never lose an increment */
  async increment(key: string): Promise<number> {
    this.sweepIfDue();
    const entry = this.entries.get(key);
    const current = entry && !this.isExpired(entry) ? Number.parseInt(entry.value, 10) : 0;
    if (Number.isNaN(current)) {
      throw new Error(`Cache key "${key}" does not hold an integer`);
    }

    const next = current + 1;
    this.entries.set(key, { value: String(next) });
    return next;
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  /** Number of live entries. Used by tests. */
  get size(): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (!this.isExpired(entry)) count += 1;
    }
    return count;
  }

  /** Number of held entries, expired ones included. */
  get entryCount(): number {
    return this.entries.size;
  }

  private sweepIfDue(): void {
    const now = this.clock();
    if (now < this.nextSweepAt) {
      return;
    }

    this.nextSweepAt = now + this.sweepIntervalMs;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== undefined && entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }

  private isExpired(entry: CacheEntry): boolean {
    return entry.expiresAt !== undefined && entry.expiresAt <= this.clock();
  }
}
