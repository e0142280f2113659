/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated at startup - fail fast if misconfigured.
 *
 * Backends are picked from what is configured:
 *   - DATABASE_URL set → Postgres, otherwise the in-memory data store
 *   - REDIS_URL set    → Redis, otherwise the in-memory cache store
 * Production refuses to run without a database.
 */

export interface AppConfig {
  env: string;
  database: {
    /** null selects the in-memory data store */
    url: string | null;
  };
  cache: {
    /** null selects the in-memory cache store */
    redisUrl: string | null;
    keyPrefix: string;
    /** How long a cached list page lives */
    listTtlSeconds: number;
  };
  pagination: {
    pageSize: number;
  };
  api: {
    port: number;
    host: string;
    /** Allowed CORS origin; null reflects the request origin */
    corsOrigin: string | null;
    rateLimitMax: number;
    rateLimitWindowMs: number;
  };
  auth: {
    supabaseUrl: string | null;
    supabaseServiceKey: string | null;
  };
}

/** Reads a positive integer variable, or returns the fallback when unset */
function readPositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(
      `${name} must be a positive integer, got "${raw}". See .env.example.`
    );
  }
  return value;
}

function readOptional(env: NodeJS.ProcessEnv, name: string): string | null {
  const raw = env[name];
  return raw === undefined || raw.trim() === "" ? null : raw.trim();
}

/**
 * Loads configuration from process.env (or the given environment).
 * Throws immediately if a variable is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV ?? "development";
  const databaseUrl = readOptional(env, "DATABASE_URL");

  if (!databaseUrl && nodeEnv === "production") {
    throw new Error(
      "DATABASE_URL environment variable is required in production. See .env.example."
    );
  }

  return {
    env: nodeEnv,
    database: {
      url: databaseUrl,
    },
    cache: {
      redisUrl: readOptional(env, "REDIS_URL"),
      keyPrefix: readOptional(env, "CACHE_KEY_PREFIX") ?? "issuedesk",
      listTtlSeconds: readPositiveInt(env, "LIST_CACHE_TTL_SECONDS", 300),
    },
    pagination: {
      pageSize: readPositiveInt(env, "PAGE_SIZE", 10),
    },
    api: {
      port: readPositiveInt(env, "API_PORT", 4000),
      host: env.API_HOST ?? "0.0.0.0",
      corsOrigin: readOptional(env, "CORS_ORIGIN"),
      rateLimitMax: readPositiveInt(env, "RATE_LIMIT_MAX", 100),
      rateLimitWindowMs: readPositiveInt(env, "RATE_LIMIT_WINDOW_MS", 60_000),
    },
    auth: {
      supabaseUrl: readOptional(env, "SUPABASE_URL"),
      supabaseServiceKey: readOptional(env, "SUPABASE_SERVICE_KEY"),
    },
  };
}
