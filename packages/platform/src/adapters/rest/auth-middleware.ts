/**
 * Fastify Authentication Middleware
 *
 * Extracts the Bearer token from the Authorization header, verifies it
 * through the configured AuthProvider, and attaches the Actor to the
 * request object for downstream handlers.
 *
 * A request without a token is anonymous (actor = null); each resource's
 * permission predicates decide what an anonymous caller may do. A token
 * that is present but does not verify is rejected with 401.
 *
 * Usage: Register this as a Fastify preHandler hook during bootstrap.
 */

import type { FastifyRequest, FastifyReply } from "fastify";
import type { Actor } from "@issuedesk/contracts";
import { getAuthProvider } from "../../auth/index.js";

/** Routes that never look at credentials */
const PUBLIC_ROUTES = new Set(["/health", "/api/health", "/api/auth/config"]);

/**
 * Extend Fastify's request type to include the authenticated actor.
 * This is the standard Fastify pattern for adding custom properties.
 */
declare module "fastify" {
  interface FastifyRequest {
    actor: Actor | null;
  }
}

/**
 * Extracts the Bearer token from the Authorization header.
 * Returns null if the header is missing.
 */
function extractBearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header) return null;

  const [scheme, token, ...rest] = header.split(" ");
  if (scheme.toLowerCase() !== "bearer" || !token || rest.length > 0) return "";

  return token;
}

/**
 * Fastify preHandler hook that resolves the caller.
 *
 *   1. No Authorization header → anonymous
 *   2. Malformed header or unverifiable token → 401
 *   3. Otherwise → request.actor is the verified user
 */
export async function authMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | void> {
  request.actor = null;

  // Preflight requests never carry credentials
  if (request.method === "OPTIONS") {
    return;
  }

  const path = request.url.split("?")[0];
  if (PUBLIC_ROUTES.has(path)) {
    return;
  }

  const token = extractBearerToken(request);
  if (token === null) {
    return;
  }

  const actor = token ? await getAuthProvider().verifyToken(token) : null;

  if (!actor) {
    return reply.status(401).send({
      success: false,
      error: "Invalid or expired authentication token.",
      errorType: "authentication",
    });
  }

  request.actor = actor;
}
