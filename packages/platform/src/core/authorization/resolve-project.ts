/**
 * Owning Project Resolution
 *
 * Every object-scoped permission decision and every cache invalidation
 * starts from the project an object belongs to. This is the one place
 * that knows how each resource type reaches its project.
 */

import type { DataStore, Project, Resource } from "@issuedesk/contracts";

/**
 * Returns the project that owns the resource, or null when there is none
 * (users) or it no longer exists.
 */
export async function resolveOwningProject(
  resource: Resource,
  store: DataStore
): Promise<Project | null> {
  switch (resource.type) {
    case "project":
      return resource.entity;
    case "contributor":
    case "issue":
      return store.projects.findById(resource.entity.projectId);
    case "comment": {
      const issue = await store.issues.findById(resource.entity.issueId);
      return issue ? store.projects.findById(issue.projectId) : null;
    }
    case "user":
      return null;
  }
}

/** True when the user authored the project or contributes to it */
export async function isProjectMember(
  store: DataStore,
  project: Project,
  userId: string
): Promise<boolean> {
  if (project.authorId === userId) return true;
  return store.contributors.exists(project.id, userId);
}

/**
 * Everyone whose cached lists depend on the project: its author and
 * all of its contributors, without duplicates.
 */
export async function projectAudience(
  store: DataStore,
  project: Project
): Promise<Set<string>> {
  const audience = new Set<string>([project.authorId]);
  for (const userId of await store.contributors.listUserIds(project.id)) {
    audience.add(userId);
  }
  return audience;
}
