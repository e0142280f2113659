/**
 * Permission Definitions
 *
 * Declares who can execute an action. Actions name the predicates that
 * guard them as plain data (PermissionRule); the platform owns the
 * predicate implementations and evaluates them before every execution:
 * first every request-level check, then, once the target object is
 * loaded, every object-level check. The first predicate that says no
 * wins and its message is what the caller sees.
 *
 * A predicate that leaves a check undefined passes that stage.
 */

import type { RequestContext } from "./context.js";
import type { Resource } from "./entity.js";
import type { DataStore } from "./store.js";

/** What a predicate may consult while deciding */
export interface PermissionContext {
  request: RequestContext;
  store: DataStore;

  /**
   * Loads the object the request targets (path `id`), or the parent a
   * nested list is scoped to. Resolves to null when it does not exist.
   * Memoized per request.
   */
  loadTarget(): Promise<Resource | null>;
}

export interface PermissionPredicate {
  /** Short identifier for logs (e.g., "contributor-gated") */
  readonly name: string;

  /** Fixed, human-readable reason reported on denial */
  readonly message: string;

  /** Request-level check, evaluated before anything is loaded or validated */
  hasPermission?(context: PermissionContext): Promise<boolean>;

  /** Object-level check, evaluated against the loaded target */
  hasObjectPermission?(context: PermissionContext, target: Resource): Promise<boolean>;
}

/** The predicates the platform provides */
export const PREDICATE_NAMES = [
  "authenticated",
  "self-or-create",
  "project-author-gated",
  "contributor-gated",
  "resource-author-or-read-only",
] as const;
export type PredicateName = (typeof PREDICATE_NAMES)[number];

/**
 * One entry of an action's policy.
 *
 * @example
 * permissions: [
 *   { predicate: "authenticated" },
 *   { predicate: "contributor-gated", objectOnly: true },
 * ]
 */
export interface PermissionRule {
  predicate: PredicateName;
  /** Skip the predicate's request-level check */
  objectOnly?: boolean;
}

/**
 * Helper function to define a predicate with type checking.
 */
export function definePredicate(predicate: PermissionPredicate): PermissionPredicate {
  return predicate;
}
