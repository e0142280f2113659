/**
 * Action Bus
 *
 * The central dispatch for all operations in IssueDesk.
 * Every action goes through this pipeline:
 *
 *   1. Lookup action by ID
 *   2. Request-level permission checks
 *   3. Load the target object (missing → not_found)
 *   4. Object-level permission checks
 *   5. Validate input against the action's Zod schema
 *   6. Capture the invalidation audience (update, delete)
 *   7. Execute - lists read through the versioned cache
 *   8. Invalidate affected actors' cached lists (mutations)
 *   9. Log the result
 *
 * The Bus is the SINGLE entry point for all operations. Its services are
 * passed in by the caller; it holds no global connections.
 */

import {
  ConstraintViolationError,
  isSafeAction,
  type ActionContext,
  type AnyActionDefinition,
  type DataStore,
  type RequestContext,
  type Resource,
} from "@issuedesk/contracts";
import { getAction } from "./registry.js";
import { validateInput, ValidationError } from "./middleware/validation.js";
import {
  checkObjectPermissions,
  checkRequestPermissions,
  createPermissionContext,
  PermissionError,
} from "./middleware/permission.js";
import { createLogger, logActionExecution } from "./middleware/logging.js";
import { resolvePolicy } from "../authorization/index.js";
import type { ListCache } from "../cache/list-cache.js";
import { collectAudience, type CacheInvalidator } from "../cache/invalidation.js";
import { captureException } from "../observability/index.js";

/**
 * Error categories for structured error handling.
 * The REST adapter maps these to HTTP status codes:
 *   not_found  → 404
 *   validation → 400
 *   permission → 403
 *   unknown    → 500
 */
export type ActionErrorType = "not_found" | "validation" | "permission" | "unknown";

/**
 * The result of dispatching an action.
 * Always includes success status - callers should check this.
 * On failure, errorType identifies the category for HTTP mapping.
 */
export type ActionResult<T = unknown> =
  | { success: true; data: T }
  | { success: false; error: string; errorType: ActionErrorType; details?: unknown };

/** What the bus needs to run an action */
export interface ActionServices {
  store: DataStore;
  listCache: ListCache;
  invalidator: CacheInvalidator;
  /** Page size for list actions */
  pageSize: number;
}

/** The target of an object-scoped action does not exist */
export class NotFoundError extends Error {
  constructor(message = "Not found.") {
    super(message);
    this.name = "NotFoundError";
  }
}

/**
 * Dispatches an action through the Action Bus pipeline.
 *
 * @param actionId - The action's unique ID (e.g., "issue.update")
 * @param request - What the Request Context Adapter extracted
 *
 * @returns ActionResult with success/failure and data/error
 */
export async function dispatch(
  actionId: string,
  request: RequestContext,
  services: ActionServices
): Promise<ActionResult> {
  const startTime = performance.now();
  const logger = createLogger(`action:${actionId}`);

  try {
    // 1. Lookup
    const action = getAction(actionId);
    if (!action) {
      return {
        success: false,
        error: `Action "${actionId}" not found`,
        errorType: "not_found",
      };
    }

    const data = await run(action, request, services, logger);

    const durationMs = Math.round(performance.now() - startTime);
    logActionExecution(actionId, durationMs, true);

    return { success: true, data };
  } catch (error) {
    const durationMs = Math.round(performance.now() - startTime);
    const errorMessage =
      error instanceof Error ? error.message : "Unknown error";

    logActionExecution(actionId, durationMs, false, errorMessage);

    if (error instanceof PermissionError) {
      return {
        success: false,
        error: errorMessage,
        errorType: "permission",
      };
    }

    if (error instanceof NotFoundError) {
      return {
        success: false,
        error: errorMessage,
        errorType: "not_found",
      };
    }

    if (error instanceof ValidationError) {
      return {
        success: false,
        error: errorMessage,
        errorType: "validation",
        details: { fieldErrors: error.fieldErrors },
      };
    }

    if (error instanceof ConstraintViolationError) {
      return {
        success: false,
        error: errorMessage,
        errorType: "validation",
        details: { constraint: error.constraint },
      };
    }

    // Unknown error - log full details server-side, return generic message
    logger.error("Action execution failed", {
      error: errorMessage,
      stack: error instanceof Error ? error.stack : undefined,
    });

    if (error instanceof Error) {
      captureException(error, {
        actionId,
        userId: request.actor?.userId,
      });
    }

    return {
      success: false,
      error: "An unexpected error occurred",
      errorType: "unknown",
    };
  }
}

/** Steps 2–8. Throws the typed errors dispatch() maps to results. */
async function run(
  action: AnyActionDefinition,
  request: RequestContext,
  services: ActionServices,
  logger: ActionContext["logger"]
): Promise<unknown> {
  const { store, listCache } = services;

  // 2. Request-level permissions
  const predicates = resolvePolicy(action.permissions);
  const permissionContext = createPermissionContext(request, store, async () =>
    action.loadTarget ? action.loadTarget(request, store) : null
  );
  await checkRequestPermissions(predicates, permissionContext);

  // 3–4. Target and object-level permissions
  let target: Resource | null = null;
  if (action.loadTarget) {
    target = await permissionContext.loadTarget();
    if (!target) {
      throw new NotFoundError();
    }
    await checkObjectPermissions(predicates, permissionContext, target);
  }

  // 5. Validate
  const input = validateInput(
    action,
    action.buildInput ? action.buildInput(request) : request.body
  );

  // 6. Who can see the object before it changes
  const audience = new Set<string>();
  if (target && (action.kind === "update" || action.kind === "delete")) {
    for (const actorId of await collectAudience(target, store)) {
      audience.add(actorId);
    }
  }

  // 7. Execute
  const context: ActionContext = {
    actor: request.actor,
    request,
    store,
    target,
    logger,
    pageSize: services.pageSize,
  };

  const { cachedList } = action;
  const output =
    cachedList && action.kind === "list"
      ? await listCache.readThrough(
          {
            list: cachedList,
            actorId: request.actor?.userId ?? null,
            page: request.page,
            scope: action.cacheScope?.(request),
          },
          () => action.execute(input, context)
        )
      : await action.execute(input, context);

  // 8. Invalidate
  if (!isSafeAction(action.kind)) {
    await invalidateAfter(action, output, audience, services, logger);
  }

  return output;
}

/**
 * Adds who can see the object now to who could see it before, then bumps
 * their cached lists. The mutation has already happened, so a failure
 * here is logged and never fails the request.
 */
async function invalidateAfter(
  action: AnyActionDefinition,
  output: unknown,
  audience: Set<string>,
  services: ActionServices,
  logger: ActionContext["logger"]
): Promise<void> {
  try {
    const changed = action.affectedResource
      ? await action.affectedResource(output, services.store)
      : null;
    if (changed) {
      for (const actorId of await collectAudience(changed, services.store)) {
        audience.add(actorId);
      }
    }

    if (audience.size === 0) return;

    const report = await services.invalidator.invalidate(audience);
    logger.debug("Cached lists invalidated", {
      actors: report.audience.length,
      bumped: report.bumped,
      failed: report.failed.length,
    });
  } catch (error) {
    logger.error("Cache invalidation skipped", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
