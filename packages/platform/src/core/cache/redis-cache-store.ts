/**
 * Redis Cache Store
 *
 * CacheStore backed by Redis through @redis/client. Shared by every API
 * instance, so version counters stay consistent across processes.
 * INCR is atomic on the server.
 *
 * Every key is namespaced with the configured prefix so several
 * environments can share one Redis.
 */

import { createClient } from "@redis/client";
import type { CacheSetOptions, CacheStore } from "@issuedesk/contracts";

export type RedisClient = ReturnType<typeof createClient>;

export interface RedisCacheStoreOptions {
  readonly client: RedisClient;
  readonly keyPrefix?: string;
}

function normalizePrefix(prefix: string | undefined): string {
  if (!prefix) return "";
  return prefix.endsWith(":") ? prefix : `${prefix}:`;
}

export class RedisCacheStore implements CacheStore {
  readonly name = "redis";

  private readonly client: RedisClient;
  private readonly keyPrefix: string;

  constructor(options: RedisCacheStoreOptions) {
    this.client = options.client;
    this.keyPrefix = normalizePrefix(options.keyPrefix);
  }

  async get(key: string): Promise<string | undefined> {
    const stored = await this.client.get(this.withPrefix(key));
    return stored === null ? undefined : String(stored);
  }

  async set(key: string, value: string, options?: CacheSetOptions): Promise<void> {
    if (options?.ttlSeconds !== undefined) {
      await this.client.set(this.withPrefix(key), value, { EX: options.ttlSeconds });
    } else {
      await this.client.set(this.withPrefix(key), value);
    }
  }

  async increment(key: string): Promise<number> {
    return this.client.incr(this.withPrefix(key));
  }

  async delete(key: string): Promise<void> {
    await this.client.del(this.withPrefix(key));
  }

  /** Deletes every key under this store's prefix */
  async clear(): Promise<void> {
    const pattern = `${this.keyPrefix}*`;
    for await (const key of this.client.scanIterator({ MATCH: pattern, COUNT: 100 })) {
      await this.client.del(key);
    }
  }

  private withPrefix(key: string): string {
    return `${this.keyPrefix}${key}`;
  }
}

/** Longest wait between reconnect attempts */
export const REDIS_MAX_RECONNECT_DELAY_MS = 3000;

/** Linear backoff, capped at REDIS_MAX_RECONNECT_DELAY_MS */
export function redisReconnectDelay(retries: number): number {
  return Math.min((retries + 1) * 100, REDIS_MAX_RECONNECT_DELAY_MS);
}

/**
 * Connects a Redis client for the cache. Connection errors after startup
 * are reported through the callback. The offline queue is disabled, so
 * while the client reconnects every command rejects at once and the list
 * cache falls back to live queries.
 */
export async function connectRedisCacheStore(
  url: string,
  keyPrefix: string,
  onError: (error: Error) => void
): Promise<{ store: RedisCacheStore; close: () => Promise<void> }> {
  const client = createClient({
    url,
    disableOfflineQueue: true,
    socket: { reconnectStrategy: redisReconnectDelay },
  });
  client.on("error", onError);
  await client.connect();

  return {
    store: new RedisCacheStore({ client, keyPrefix }),
    close: async () => {
      await client.quit();
    },
  };
}
