/**
 * Authentication Contract
 *
 * Defines the AuthProvider interface - the abstraction that decouples
 * the application from any specific authentication implementation.
 *
 * High-level modules (REST auth middleware) depend on this interface;
 * low-level modules (Supabase, the development provider) implement it.
 * The concrete provider is injected at startup, not imported directly.
 */

import type { Actor } from "./context.js";

/**
 * The result of verifying an authentication token.
 * Either a valid Actor (authenticated) or null (invalid/expired token).
 */
export type AuthResult = Actor | null;

export interface AuthProvider {
  /**
   * Verify a bearer token and resolve the local user it belongs to.
   *
   * @param token - The raw token from the Authorization header
   * @returns The Actor, or null if the token is invalid/expired or
   *   belongs to no local user
   */
  verifyToken(token: string): Promise<AuthResult>;

  /**
   * Public configuration a client needs to obtain tokens.
   * Served by a public endpoint - never include secrets.
   */
  getPublicConfig(): Record<string, string>;
}
