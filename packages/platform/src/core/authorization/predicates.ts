/**
 * Permission Predicates
 *
 * The building blocks of every resource policy. Each predicate answers
 * one question at request level, at object level, or both, and carries
 * the fixed message a denied caller sees.
 *
 * A reference that cannot be resolved (no project in the request, a
 * referenced issue or contributor that does not exist) is a denial.
 * Authorship is compared by identifier.
 */

import {
  authorIdOf,
  definePredicate,
  isSafeAction,
  type DataStore,
  type PermissionContext,
  type PermissionPredicate,
  type Project,
} from "@issuedesk/contracts";
import { isProjectMember, resolveOwningProject } from "./resolve-project.js";

// ---------------------------------------------------------------------------
// Authenticated
// ---------------------------------------------------------------------------

export const isAuthenticated = definePredicate({
  name: "authenticated",
  message: "Authentication credentials were not provided.",
  async hasPermission({ request }) {
    return request.actor !== null;
  },
});

// ---------------------------------------------------------------------------
// Self or create
// ---------------------------------------------------------------------------

/** Anyone may sign up; everything else is limited to one's own account */
export const selfOrCreate = definePredicate({
  name: "self-or-create",
  message: "You can only access your own account.",
  async hasPermission({ request }) {
    return request.action === "create" || request.actor !== null;
  },
  async hasObjectPermission({ request }, target) {
    return (
      request.actor !== null &&
      target.type === "user" &&
      target.entity.id === request.actor.userId
    );
  },
});

// ---------------------------------------------------------------------------
// Project author gated
// ---------------------------------------------------------------------------

async function findProject(store: DataStore, id: string | undefined): Promise<Project | null> {
  return id ? store.projects.findById(id) : null;
}

/** Reads are open to members; membership changes belong to the project author */
export const projectAuthorGated = definePredicate({
  name: "project-author-gated",
  message: "Only the project author can perform this action.",
  async hasPermission({ request, store }) {
    const { actor } = request;
    if (!actor) return false;
    if (isSafeAction(request.action)) return true;

    if (request.action === "delete" && request.params.id) {
      const contributor = await store.contributors.findById(request.params.id);
      if (!contributor) return false;
      const project = await store.projects.findById(contributor.projectId);
      return project?.authorId === actor.userId;
    }

    const project = await findProject(
      store,
      request.references.project ?? request.params.projectId
    );
    return project?.authorId === actor.userId;
  },
  async hasObjectPermission({ request, store }, target) {
    if (isSafeAction(request.action)) return true;
    const { actor } = request;
    if (!actor) return false;
    const project = await resolveOwningProject(target, store);
    return project?.authorId === actor.userId;
  },
});

// ---------------------------------------------------------------------------
// Contributor gated
// ---------------------------------------------------------------------------

/**
 * Finds the project a create request is aimed at: the body's project,
 * then the project of the body's issue, then the path parameters.
 */
async function resolveCreateProject({ request, store }: PermissionContext): Promise<Project | null> {
  const { references, params } = request;

  if (references.project) {
    return store.projects.findById(references.project);
  }
  if (references.issue) {
    const issue = await store.issues.findById(references.issue);
    return issue ? store.projects.findById(issue.projectId) : null;
  }
  if (params.projectId) {
    return store.projects.findById(params.projectId);
  }
  if (params.issueId) {
    const issue = await store.issues.findById(params.issueId);
    return issue ? store.projects.findById(issue.projectId) : null;
  }
  return null;
}

/** Members may read and create; only the project author may change another's object */
export const contributorGated = definePredicate({
  name: "contributor-gated",
  message: "You must be a contributor to this project.",
  async hasPermission(context) {
    const { request, store } = context;
    const { actor } = request;
    if (!actor) return false;
    if (isSafeAction(request.action)) return true;

    let project: Project | null;
    if (request.action === "create") {
      project = await resolveCreateProject(context);
    } else {
      const target = await context.loadTarget();
      project = target ? await resolveOwningProject(target, store) : null;
    }

    return project !== null && isProjectMember(store, project, actor.userId);
  },
  async hasObjectPermission({ request, store }, target) {
    const { actor } = request;
    if (!actor) return false;
    const project = await resolveOwningProject(target, store);
    if (!project) return false;

    if (isSafeAction(request.action)) {
      return isProjectMember(store, project, actor.userId);
    }
    return project.authorId === actor.userId;
  },
});

// ---------------------------------------------------------------------------
// Resource author or read only
// ---------------------------------------------------------------------------

export const resourceAuthorOrReadOnly = definePredicate({
  name: "resource-author-or-read-only",
  message: "Only the resource author can modify or delete.",
  async hasObjectPermission({ request }, target) {
    if (isSafeAction(request.action)) return true;
    return request.actor !== null && authorIdOf(target) === request.actor.userId;
  },
});

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

/** The same predicate with its request-level check removed */
export function objectOnly(predicate: PermissionPredicate): PermissionPredicate {
  return {
    name: predicate.name,
    message: predicate.message,
    hasObjectPermission: predicate.hasObjectPermission,
  };
}
