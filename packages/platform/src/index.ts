/**
 * @issuedesk/platform
 *
 * The platform engine. Provides the Action Bus, the Authorization Engine,
 * the versioned list cache, the data stores and the REST adapter.
 */

// Config
export { loadConfig, type AppConfig } from "./core/config/index.js";

// Database
export { initDatabase, getDatabase, closeDatabase, type Database } from "./core/database/connection.js";
export { runMigrations, TABLES, type MigrationClient } from "./core/database/migrate.js";
export { PostgresDataStore } from "./core/database/postgres-store.js";
export { MemoryDataStore, type MemoryDataStoreOptions } from "./core/database/memory-store.js";

// Action Bus
export {
  dispatch,
  NotFoundError,
  type ActionResult,
  type ActionErrorType,
  type ActionServices,
} from "./core/action-bus/bus.js";
export { createActionServices, type ActionServicesOptions } from "./core/action-bus/services.js";
export {
  registerAction,
  registerActions,
  getAction,
  getAllActions,
  clearActionRegistry,
} from "./core/action-bus/registry.js";
export { ValidationError, type FieldError } from "./core/action-bus/middleware/validation.js";
export { PermissionError } from "./core/action-bus/middleware/permission.js";
export { createLogger, logActionExecution } from "./core/action-bus/middleware/logging.js";

// Authorization
export {
  resolvePolicy,
  getPredicate,
  resolveOwningProject,
  isProjectMember,
  projectAudience,
} from "./core/authorization/index.js";

// Cache
export {
  ListCache,
  CacheInvalidator,
  collectAudience,
  MemoryCacheStore,
  RedisCacheStore,
  connectRedisCacheStore,
  versionKey,
  pageKey,
  type InvalidationReport,
} from "./core/cache/index.js";

// Authentication
export { initAuthProvider, getAuthProvider, setAuthProvider } from "./auth/index.js";
export { SupabaseAuthProvider } from "./auth/supabase-provider.js";
export { DevAuthProvider } from "./auth/dev-provider.js";

// Observability
export {
  captureException,
  captureMessage,
  flushObservability,
  setObservabilityProvider,
  ConsoleObservabilityProvider,
  type ObservabilityProvider,
} from "./core/observability/index.js";

// REST Adapter
export { registerRESTRoutes, routeBindings, type RouteBinding } from "./adapters/rest/adapter.js";
export { buildRequestContext } from "./adapters/rest/request-context.js";
