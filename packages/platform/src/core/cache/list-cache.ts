/**
 * Versioned List Cache
 *
 * Read-through cache for list pages, scoped per actor. Each (list, actor)
 * pair has a version counter; pages are stored under keys that embed the
 * version, so bumping the counter makes every stored page unreachable
 * at once without enumerating keys.
 *
 * The cache never decides what an actor may see. It only stores what the
 * live query returned for that actor after the permission checks passed.
 * Any cache-store failure degrades to a live query.
 */

import type { CachedList, CacheStore, Logger } from "@issuedesk/contracts";
import { pageKey, parseVersion, versionKey } from "./cache-keys.js";

export interface ListCacheOptions {
  readonly store: CacheStore;
  /** Lifetime of a stored page */
  readonly ttlSeconds: number;
  readonly logger: Logger;
}

export interface ListPageRequest {
  list: CachedList;
  /** null for anonymous callers, who are never cached */
  actorId: string | null;
  page: number;
  /** Nested routes: "project_<id>" or "issue_<id>" */
  scope?: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ListCache {
  readonly store: CacheStore;
  private readonly ttlSeconds: number;
  private readonly logger: Logger;

  constructor(options: ListCacheOptions) {
    this.store = options.store;
    this.ttlSeconds = options.ttlSeconds;
    this.logger = options.logger;
  }

  /** The actor's current version of the list. A missing counter is version 0. */
  async currentVersion(list: CachedList, actorId: string): Promise<number> {
    return parseVersion(await this.store.get(versionKey(list, actorId)));
  }

  /**
   * Atomically advances the actor's version of the list and returns the
   * new version. Pages stored under older versions are never read again.
   */
  async bumpVersion(list: CachedList, actorId: string): Promise<number> {
    return this.store.increment(versionKey(list, actorId));
  }

  /**
   * Returns the stored page for the actor's current version, or computes
   * it, stores it and returns it.
   */
  async readThrough(
    request: ListPageRequest,
    compute: () => Promise<unknown>
  ): Promise<unknown> {
    const { list, actorId, page, scope } = request;
    if (actorId === null) {
      return compute();
    }

    let version: number;
    try {
      version = await this.currentVersion(list, actorId);
    } catch (error) {
      // Without a version there is no key that a later bump would orphan
      this.logger.warn("Cache version unavailable, serving live result", {
        list,
        actorId,
        error: errorMessage(error),
      });
      return compute();
    }

    const key = pageKey(list, actorId, page, version, scope);
    const cached = await this.readPage(key);
    if (cached !== undefined) {
      this.logger.debug("Cache hit", { key });
      return cached;
    }

    this.logger.debug("Cache miss", { key });
    const result = await compute();

    try {
      await this.store.set(key, JSON.stringify(result), { ttlSeconds: this.ttlSeconds });
    } catch (error) {
      this.logger.warn("Failed to store list page", { key, error: errorMessage(error) });
    }

    return result;
  }

  private async readPage(key: string): Promise<unknown> {
    try {
      const raw = await this.store.get(key);
      return raw === undefined ? undefined : JSON.parse(raw);
    } catch (error) {
      this.logger.warn("Failed to read list page, recomputing", { key, error: errorMessage(error) });
      return undefined;
    }
  }
}
