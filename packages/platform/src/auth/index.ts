/**
 * Auth Module
 *
 * Manages the active AuthProvider instance. The provider is set at
 * startup (in bootstrap) and used by the auth middleware to verify
 * every incoming request.
 *
 * Provider selection:
 *   - If SUPABASE_URL and SUPABASE_SERVICE_KEY are set → SupabaseAuthProvider
 *   - Otherwise in non-production → DevAuthProvider (token is a user id)
 *   - In production without config → throws (fail fast)
 */

import type { AuthProvider, UserRepository } from "@issuedesk/contracts";
import type { AppConfig } from "../core/config/index.js";
import { createLogger } from "../core/action-bus/middleware/logging.js";
import { SupabaseAuthProvider } from "./supabase-provider.js";
import { DevAuthProvider } from "./dev-provider.js";

const logger = createLogger("auth");

/** The singleton auth provider instance */
let authProvider: AuthProvider | null = null;

/**
 * Initialize the auth provider based on configuration.
 * Call this once at startup (in bootstrap).
 */
export function initAuthProvider(config: AppConfig, users: UserRepository): AuthProvider {
  const { supabaseUrl, supabaseServiceKey } = config.auth;

  if (supabaseUrl && supabaseServiceKey) {
    authProvider = new SupabaseAuthProvider({
      url: supabaseUrl,
      serviceKey: supabaseServiceKey,
      users,
    });
    logger.info("Using Supabase auth provider");
  } else if (config.env === "production") {
    throw new Error(
      "Authentication must be configured in production. " +
      "Set SUPABASE_URL and SUPABASE_SERVICE_KEY environment variables."
    );
  } else {
    authProvider = new DevAuthProvider(users);
    logger.warn("Using development auth provider (bearer token is a user id)");
  }

  return authProvider;
}

/**
 * Get the active auth provider.
 * Throws if initAuthProvider() hasn't been called.
 */
export function getAuthProvider(): AuthProvider {
  if (!authProvider) {
    throw new Error(
      "Auth provider not initialized. Call initAuthProvider() in bootstrap."
    );
  }
  return authProvider;
}

/**
 * Set a custom auth provider (for testing or custom implementations).
 * Pass null to clear it.
 */
export function setAuthProvider(provider: AuthProvider | null): void {
  authProvider = provider;
}

// Re-export provider implementations
export { SupabaseAuthProvider } from "./supabase-provider.js";
export { DevAuthProvider } from "./dev-provider.js";
