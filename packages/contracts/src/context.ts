/**
 * Request and Action Context
 *
 * RequestContext is what the Request Context Adapter extracts from an
 * inbound HTTP request. ActionContext is what the Action Bus hands to an
 * action's execute function once every permission check has passed.
 *
 * The domain NEVER constructs either - the platform does.
 */

import type { Resource, ResourceType } from "./entity.js";
import type { DataStore } from "./store.js";

/**
 * The authenticated user making a request.
 * Anonymous requests carry `null` instead of an Actor.
 */
export interface Actor {
  userId: string;
  username: string;
}

/** The five operations every resource exposes */
export type ActionKind = "list" | "retrieve" | "create" | "update" | "delete";

export const SAFE_ACTIONS: readonly ActionKind[] = ["list", "retrieve"];

/** Read-only actions. Everything else is a mutation. */
export function isSafeAction(kind: ActionKind): boolean {
  return SAFE_ACTIONS.includes(kind);
}

/** Identifiers that may appear in a route path */
export interface PathParams {
  id?: string;
  projectId?: string;
  issueId?: string;
}

/** Resource references found in a submitted payload */
export interface BodyReferences {
  project?: string;
  issue?: string;
}

/**
 * Everything the Authorization Engine and Cache Layer know about a request.
 * Holds no logic of its own.
 */
export interface RequestContext {
  actor: Actor | null;
  action: ActionKind;
  resource: ResourceType;
  params: PathParams;
  body: Record<string, unknown>;
  references: BodyReferences;
  /** 1-based page number for list actions */
  page: number;
}

/**
 * Structured logger provided to actions.
 * Actions should use this instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * The context object passed to every action's execute function.
 * `target` is the object the action operates on (or the parent a nested
 * list is scoped to); it is `null` for actions that declare no target.
 */
export interface ActionContext<TTarget extends Resource | null = Resource | null> {
  actor: Actor | null;
  request: RequestContext;
  store: DataStore;
  target: TTarget;
  logger: Logger;
  /** Page size for list actions */
  pageSize: number;
}
