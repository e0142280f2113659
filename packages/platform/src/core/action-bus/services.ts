/**
 * Action Services
 *
 * Wires the stores the Action Bus runs against. The API builds one set
 * at startup; tests build one per case around in-memory stores.
 */

import type { CacheStore, DataStore } from "@issuedesk/contracts";
import { CacheInvalidator } from "../cache/invalidation.js";
import { ListCache } from "../cache/list-cache.js";
import { createLogger } from "./middleware/logging.js";
import type { ActionServices } from "./bus.js";

export interface ActionServicesOptions {
  store: DataStore;
  cacheStore: CacheStore;
  /** Defaults to 300 */
  listTtlSeconds?: number;
  /** Defaults to 10 */
  pageSize?: number;
}

export function createActionServices(options: ActionServicesOptions): ActionServices {
  const logger = createLogger("cache");
  const listCache = new ListCache({
    store: options.cacheStore,
    ttlSeconds: options.listTtlSeconds ?? 300,
    logger,
  });

  return {
    store: options.store,
    listCache,
    invalidator: new CacheInvalidator(listCache, logger),
    pageSize: options.pageSize ?? 10,
  };
}
