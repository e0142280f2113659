/**
 * Bootstrap
 *
 * Wires the platform engine with the domain layer.
 * This is the SINGLE place where platform meets domain.
 *
 * Sequence:
 *   1. Load config
 *   2. Pick the data store (Postgres when DATABASE_URL is set) and migrate it
 *   3. Pick the cache store (Redis when REDIS_URL is set)
 *   4. Initialize the auth provider
 *   5. Register the domain's actions with the Action Bus
 */

import {
  captureException,
  closeDatabase,
  connectRedisCacheStore,
  createActionServices,
  createLogger,
  initAuthProvider,
  initDatabase,
  loadConfig,
  MemoryCacheStore,
  MemoryDataStore,
  PostgresDataStore,
  registerActions,
  runMigrations,
  type ActionServices,
  type AppConfig,
} from "@issuedesk/platform";
import type { CacheStore, DataStore } from "@issuedesk/contracts";
import { actions } from "@issuedesk/domain";

const logger = createLogger("bootstrap");

export interface Runtime {
  config: AppConfig;
  services: ActionServices;
  /** Releases the database and cache connections */
  close(): Promise<void>;
}

async function openDataStore(config: AppConfig): Promise<DataStore> {
  if (!config.database.url) {
    logger.warn("DATABASE_URL not set, using the in-memory data store");
    return new MemoryDataStore();
  }

  const { sql, db } = initDatabase(config.database.url);
  const created = await runMigrations(sql);
  logger.info("Database ready", { createdTables: created });
  return new PostgresDataStore(db);
}

async function openCacheStore(
  config: AppConfig
): Promise<{ store: CacheStore; close: () => Promise<void> }> {
  if (!config.cache.redisUrl) {
    logger.info("REDIS_URL not set, using the in-memory cache store");
    return { store: new MemoryCacheStore(), close: async () => {} };
  }

  return connectRedisCacheStore(config.cache.redisUrl, config.cache.keyPrefix, (error) => {
    logger.error("Redis connection error", { error: error.message });
    captureException(error, { component: "cache" });
  });
}

/**
 * Initializes the entire application.
 * Call once at server startup.
 */
export async function bootstrap(): Promise<Runtime> {
  const config = loadConfig();

  const store = await openDataStore(config);
  const cache = await openCacheStore(config);

  initAuthProvider(config, store.users);

  registerActions(actions);
  logger.info("Registered actions", { count: actions.length });

  const services = createActionServices({
    store,
    cacheStore: cache.store,
    listTtlSeconds: config.cache.listTtlSeconds,
    pageSize: config.pagination.pageSize,
  });

  return {
    config,
    services,
    async close() {
      await cache.close();
      await closeDatabase();
    },
  };
}
