/**
 * Permission Middleware
 *
 * Evaluates an action's permission predicates in two stages:
 *   1. Request level - before the target is loaded or the input validated
 *   2. Object level  - against the loaded target, when there is one
 *
 * Predicates are evaluated in order and the first denial wins. A predicate
 * that does not implement a stage passes it. An action with no predicates
 * is open.
 */

import type {
  DataStore,
  PermissionContext,
  PermissionPredicate,
  RequestContext,
  Resource,
} from "@issuedesk/contracts";

/**
 * Builds the context predicates consult. The loader runs at most once
 * per request, however many predicates ask for the target.
 */
export function createPermissionContext(
  request: RequestContext,
  store: DataStore,
  loader: () => Promise<Resource | null>
): PermissionContext {
  let pending: Promise<Resource | null> | undefined;

  return {
    request,
    store,
    loadTarget() {
      pending ??= loader();
      return pending;
    },
  };
}

/**
 * Runs every request-level check. Throws PermissionError on the first denial.
 */
export async function checkRequestPermissions(
  predicates: readonly PermissionPredicate[],
  context: PermissionContext
): Promise<void> {
  for (const predicate of predicates) {
    if (predicate.hasPermission && !(await predicate.hasPermission(context))) {
      throw new PermissionError(predicate);
    }
  }
}

/**
 * Runs every object-level check against the target.
 * Throws PermissionError on the first denial.
 */
export async function checkObjectPermissions(
  predicates: readonly PermissionPredicate[],
  context: PermissionContext,
  target: Resource
): Promise<void> {
  for (const predicate of predicates) {
    if (
      predicate.hasObjectPermission &&
      !(await predicate.hasObjectPermission(context, target))
    ) {
      throw new PermissionError(predicate);
    }
  }
}

/**
 * Permission denied error. Its message is the denying predicate's message.
 */
export class PermissionError extends Error {
  public readonly predicate: string;

  constructor(predicate: Pick<PermissionPredicate, "name" | "message">) {
    super(predicate.message);
    this.name = "PermissionError";
    this.predicate = predicate.name;
  }
}
