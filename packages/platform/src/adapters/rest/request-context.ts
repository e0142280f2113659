/**
 * Request Context Adapter
 *
 * Turns what Fastify parsed out of an HTTP request into the RequestContext
 * the Action Bus, the permission predicates and the list cache consume.
 * Extraction only: no lookups, no decisions.
 */

import type {
  ActionKind,
  Actor,
  BodyReferences,
  PathParams,
  RequestContext,
  ResourceType,
} from "@issuedesk/contracts";

/** The raw pieces of an HTTP request, as the framework hands them over */
export interface RawRequest {
  actor: Actor | null;
  params: unknown;
  body: unknown;
  query: unknown;
}

/** What the matched route says about the request */
export interface RouteTarget {
  action: ActionKind;
  resource: ResourceType;
}

/**
 * Body fields that name a parent resource, per resource.
 * A payload may only point at the parents its resource actually has.
 */
const REFERENCE_FIELDS: Record<ResourceType, readonly (keyof BodyReferences)[]> = {
  user: [],
  project: [],
  contributor: ["project"],
  issue: ["project"],
  comment: ["issue"],
};

const PATH_PARAM_NAMES = ["id", "projectId", "issueId"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads one field of an untyped object */
function field(source: unknown, name: string): unknown {
  return isRecord(source) ? source[name] : undefined;
}

/** Identifiers arrive as strings; integers are accepted and stringified */
function toIdentifier(value: unknown): string | undefined {
  if (typeof value === "string" && value !== "") return value;
  if (typeof value === "number" && Number.isInteger(value)) return String(value);
  return undefined;
}

export function extractParams(raw: unknown): PathParams {
  const params: PathParams = {};
  for (const name of PATH_PARAM_NAMES) {
    const value = toIdentifier(field(raw, name));
    if (value !== undefined) params[name] = value;
  }
  return params;
}

export function extractBody(raw: unknown): Record<string, unknown> {
  return isRecord(raw) ? raw : {};
}

/**
 * Parent references for the resource. On nested routes the path names
 * the parent, and any reference in the body is ignored.
 */
export function extractReferences(
  resource: ResourceType,
  params: PathParams,
  body: Record<string, unknown>
): BodyReferences {
  if (params.projectId) return { project: params.projectId };
  if (params.issueId) return { issue: params.issueId };

  const references: BodyReferences = {};
  for (const name of REFERENCE_FIELDS[resource]) {
    const value = toIdentifier(body[name]);
    if (value !== undefined) references[name] = value;
  }
  return references;
}

/** `?page=N` for a positive integer N; anything else is the first page */
export function extractPage(query: unknown): number {
  const raw = field(query, "page");
  const page = typeof raw === "string" && /^\d+$/.test(raw) ? Number(raw) : NaN;
  return Number.isSafeInteger(page) && page >= 1 ? page : 1;
}

export function buildRequestContext(raw: RawRequest, route: RouteTarget): RequestContext {
  const params = extractParams(raw.params);
  const body = extractBody(raw.body);

  return {
    actor: raw.actor,
    action: route.action,
    resource: route.resource,
    params,
    body,
    references: extractReferences(route.resource, params, body),
    page: extractPage(raw.query),
  };
}
