/**
 * REST Adapter
 *
 * Maps the Action Bus to HTTP endpoints on a Fastify instance:
 *
 *   1. Resource routes: GET/POST /api/:plural, GET/PATCH/PUT/DELETE /api/:plural/:id
 *      - one route per registered action, by the "resource.kind" convention
 *
 *   2. Nested routes: /api/projects/:projectId/{contributors,issues},
 *      /api/issues/:issueId/comments - lists and creates scoped to a parent
 *
 *   3. Public endpoints: GET /api/auth/config, GET /api/meta/actions
 *
 * Routes whose action is not registered are not mounted, so a resource
 * without an update action answers 404 on PATCH.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest, HTTPMethods } from "fastify";
import { RESOURCE_PLURALS, RESOURCE_TYPES } from "@issuedesk/contracts";
import { dispatch, type ActionErrorType, type ActionResult, type ActionServices } from "../../core/action-bus/bus.js";
import { getAction, getAllActions } from "../../core/action-bus/registry.js";
import { getAuthProvider } from "../../auth/index.js";
import { authMiddleware } from "./auth-middleware.js";
import { buildRequestContext } from "./request-context.js";

/** One HTTP route bound to one action */
export interface RouteBinding {
  method: HTTPMethods;
  url: string;
  actionId: string;
}

/**
 * Maps Action Bus error types to HTTP status codes:
 *   validation → 400, permission → 403, not_found → 404, unknown → 500
 */
const ERROR_TYPE_TO_STATUS: Record<ActionErrorType, number> = {
  validation: 400,
  permission: 403,
  not_found: 404,
  unknown: 500,
};

/** Routes scoped to a parent resource */
const NESTED_ROUTES: readonly RouteBinding[] = [
  { method: "GET", url: "/api/projects/:projectId/contributors", actionId: "contributor.listByProject" },
  { method: "POST", url: "/api/projects/:projectId/contributors", actionId: "contributor.createInProject" },
  { method: "GET", url: "/api/projects/:projectId/issues", actionId: "issue.listByProject" },
  { method: "POST", url: "/api/projects/:projectId/issues", actionId: "issue.createInProject" },
  { method: "GET", url: "/api/issues/:issueId/comments", actionId: "comment.listByIssue" },
  { method: "POST", url: "/api/issues/:issueId/comments", actionId: "comment.createOnIssue" },
];

/** Every route the adapter knows about, whether or not its action exists */
export function routeBindings(): RouteBinding[] {
  const bindings: RouteBinding[] = [];

  for (const resource of RESOURCE_TYPES) {
    const basePath = `/api/${RESOURCE_PLURALS[resource]}`;
    bindings.push(
      { method: "GET", url: basePath, actionId: `${resource}.list` },
      { method: "POST", url: basePath, actionId: `${resource}.create` },
      { method: "GET", url: `${basePath}/:id`, actionId: `${resource}.retrieve` },
      { method: "PATCH", url: `${basePath}/:id`, actionId: `${resource}.update` },
      { method: "PUT", url: `${basePath}/:id`, actionId: `${resource}.update` },
      { method: "DELETE", url: `${basePath}/:id`, actionId: `${resource}.delete` }
    );
  }

  return [...bindings, ...NESTED_ROUTES];
}

function successStatus(kind: string): number {
  if (kind === "create") return 201;
  if (kind === "delete") return 204;
  return 200;
}

/**
 * Sends an ActionResult with the status its outcome maps to.
 * A successful delete has no body.
 */
function sendResult(reply: FastifyReply, kind: string, result: ActionResult): FastifyReply {
  if (!result.success) {
    return reply.status(ERROR_TYPE_TO_STATUS[result.errorType]).send(result);
  }

  const status = successStatus(kind);
  if (status === 204) {
    return reply.status(204).send();
  }
  return reply.status(status).send(result);
}

/**
 * Registers all REST routes on the Fastify instance.
 * Actions must be registered before this is called.
 */
export async function registerRESTRoutes(app: FastifyInstance, services: ActionServices) {
  // ---------------------------------------------------------------
  // Authentication middleware - runs before every request
  // ---------------------------------------------------------------
  app.decorateRequest("actor", null);
  app.addHook("preHandler", authMiddleware);

  // ---------------------------------------------------------------
  // Public endpoints
  // ---------------------------------------------------------------

  /** Auth configuration - tells clients how to authenticate */
  app.get("/api/auth/config", async () => {
    return getAuthProvider().getPublicConfig();
  });

  /** Returns all registered actions (for documentation) */
  app.get("/api/meta/actions", async () => {
    return getAllActions().map((a) => ({
      id: a.id,
      description: a.description,
      resource: a.resource,
      kind: a.kind,
      cachedList: a.cachedList ?? null,
    }));
  });

  // ---------------------------------------------------------------
  // Resource routes (generated from the action registry)
  // ---------------------------------------------------------------

  for (const binding of routeBindings()) {
    const action = getAction(binding.actionId);
    if (!action) continue;

    const { kind, resource } = action;

    app.route({
      method: binding.method,
      url: binding.url,
      handler: async (request: FastifyRequest, reply: FastifyReply) => {
        const context = buildRequestContext(
          {
            actor: request.actor,
            params: request.params,
            body: request.body,
            query: request.query,
          },
          { action: kind, resource }
        );

        const result = await dispatch(binding.actionId, context, services);
        return sendResult(reply, kind, result);
      },
    });
  }
}
