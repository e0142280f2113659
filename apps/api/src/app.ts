/**
 * HTTP Application
 *
 * Builds the Fastify instance: security headers, rate limiting, CORS,
 * the health check and every registered action's REST route.
 * Kept apart from index.ts so tests can inject() without listening.
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { registerRESTRoutes, type ActionServices, type AppConfig } from "@issuedesk/platform";

/** Routes that answer without credentials get a much higher ceiling */
const PUBLIC_PATHS = new Set(["/api/health", "/api/meta/actions", "/api/auth/config"]);

export async function buildApp(config: AppConfig, services: ActionServices): Promise<FastifyInstance> {
  const isProd = config.env === "production";

  const app = Fastify({
    logger: false, // We use our own structured logging
    // Behind a reverse proxy, rate limiting must see the real client IP
    trustProxy: isProd,
  });

  // Content Security Policy disabled outside production for local tooling
  await app.register(helmet, { contentSecurityPolicy: isProd });

  await app.register(rateLimit, {
    max: (request) =>
      PUBLIC_PATHS.has(request.url.split("?")[0]) ? 10_000 : config.api.rateLimitMax,
    timeWindow: config.api.rateLimitWindowMs,
  });

  // In production only the configured frontend origin; elsewhere any origin
  const { corsOrigin } = config.api;
  await app.register(cors, {
    origin: corsOrigin ? corsOrigin.split(",").map((o) => o.trim()) : true,
    credentials: true,
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
  });

  app.get("/api/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  await registerRESTRoutes(app, services);

  return app;
}
