/**
 * Action Definition
 *
 * An Action is one of the five operations a resource exposes
 * (list, retrieve, create, update, delete). Every Action is:
 *   - Typed (input is validated with Zod)
 *   - Permissioned (the platform evaluates its predicates first)
 *   - Cache-aware (lists declare which cached list they belong to;
 *     mutations declare which resource they changed)
 *   - Observable (the platform logs and times it)
 */

import type { z } from "zod";
import type { ActionContext, ActionKind, RequestContext } from "./context.js";
import type { CachedList, Resource, ResourceType } from "./entity.js";
import type { PermissionRule } from "./permission.js";
import type { DataStore } from "./store.js";

/**
 * The complete definition of an action.
 *
 * @typeParam TTarget - what `loadTarget` resolves to; `null` for actions
 *   that operate on no existing object (flat list, create)
 */
export interface ActionDefinition<
  TInput = unknown,
  TOutput = unknown,
  TTarget extends Resource | null = Resource | null,
> {
  /**
   * Unique identifier.
   * Convention: "resource.kind" (e.g., "issue.update"), with a scope
   * suffix for nested routes (e.g., "issue.listByProject").
   */
  id: string;

  /** Plain English description, used in logs and the action index */
  description: string;

  resource: ResourceType;

  kind: ActionKind;

  /** Zod schema for input validation. Defaults may make its input looser than TInput. */
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;

  /** Evaluated in order; the first denial short-circuits. Empty means open. */
  permissions: PermissionRule[];

  /** Lists only: the versioned cache list this action reads through */
  cachedList?: CachedList;

  /**
   * Lists only: distinguishes a nested list's cache keys from the flat
   * list's (e.g., "project_<id>"). Shares the flat list's version counter.
   */
  cacheScope?(request: RequestContext): string | undefined;

  /** Builds the raw input to validate. Defaults to the request body. */
  buildInput?(request: RequestContext): unknown;

  /**
   * Loads the object this action operates on. When declared and it
   * resolves to null, the bus answers not_found.
   */
  loadTarget?(request: RequestContext, store: DataStore): Promise<TTarget | null>;

  /** The business logic. No HTTP, no cache, no permission checks. */
  execute(input: TInput, context: ActionContext<TTarget>): Promise<TOutput>;

  /**
   * Create and update: the resource as it stands after execution, used
   * to find actors whose cached lists are now stale. Deletes need none;
   * the platform captures their audience before executing.
   */
  affectedResource?(output: TOutput, store: DataStore): Promise<Resource | null>;
}

/** Any registered action, whatever its input, output or target */
export type AnyActionDefinition = ActionDefinition<unknown, unknown, Resource | null>;

/**
 * Helper function to define an action with type checking.
 * Use this in domain action files for autocomplete and validation.
 */
export function defineAction<TInput, TOutput, TTarget extends Resource | null = null>(
  definition: ActionDefinition<TInput, TOutput, TTarget>
): ActionDefinition<TInput, TOutput, TTarget> {
  return definition;
}
