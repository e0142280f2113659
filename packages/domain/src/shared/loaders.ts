/**
 * Target Loaders
 *
 * Resolve the object an action operates on from the route's path
 * parameters, tagged with its resource type. A missing object resolves
 * to null and the Action Bus answers not_found.
 */

import type { ActionContext, DataStore, RequestContext, ResourceOf } from "@issuedesk/contracts";

export async function loadUser(
  request: RequestContext,
  store: DataStore
): Promise<ResourceOf<"user"> | null> {
  const user = request.params.id ? await store.users.findById(request.params.id) : null;
  return user ? { type: "user", entity: user } : null;
}

export async function loadProject(
  request: RequestContext,
  store: DataStore
): Promise<ResourceOf<"project"> | null> {
  const project = request.params.id ? await store.projects.findById(request.params.id) : null;
  return project ? { type: "project", entity: project } : null;
}

/** The parent project of a nested route */
export async function loadParentProject(
  request: RequestContext,
  store: DataStore
): Promise<ResourceOf<"project"> | null> {
  const { projectId } = request.params;
  const project = projectId ? await store.projects.findById(projectId) : null;
  return project ? { type: "project", entity: project } : null;
}

export async function loadContributor(
  request: RequestContext,
  store: DataStore
): Promise<ResourceOf<"contributor"> | null> {
  const contributor = request.params.id ? await store.contributors.findById(request.params.id) : null;
  return contributor ? { type: "contributor", entity: contributor } : null;
}

/** A membership, visible only to the author of its project */
export async function loadAuthoredContributor(
  request: RequestContext,
  store: DataStore
): Promise<ResourceOf<"contributor"> | null> {
  const loaded = await loadContributor(request, store);
  if (!loaded || !request.actor) return null;
  const project = await store.projects.findById(loaded.entity.projectId);
  return project?.authorId === request.actor.userId ? loaded : null;
}

export async function loadIssue(
  request: RequestContext,
  store: DataStore
): Promise<ResourceOf<"issue"> | null> {
  const issue = request.params.id ? await store.issues.findById(request.params.id) : null;
  return issue ? { type: "issue", entity: issue } : null;
}

/** The parent issue of a nested route */
export async function loadParentIssue(
  request: RequestContext,
  store: DataStore
): Promise<ResourceOf<"issue"> | null> {
  const { issueId } = request.params;
  const issue = issueId ? await store.issues.findById(issueId) : null;
  return issue ? { type: "issue", entity: issue } : null;
}

export async function loadComment(
  request: RequestContext,
  store: DataStore
): Promise<ResourceOf<"comment"> | null> {
  const comment = request.params.id ? await store.comments.findById(request.params.id) : null;
  return comment ? { type: "comment", entity: comment } : null;
}

/**
 * The acting user's id. Only called by actions whose policy starts with
 * an authentication check, so a missing actor is a wiring mistake.
 */
export function actorId({ actor }: ActionContext): string {
  if (!actor) {
    throw new Error("This action requires an authenticated actor.");
  }
  return actor.userId;
}
