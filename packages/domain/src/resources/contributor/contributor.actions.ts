/**
 * Contributor Actions
 *
 * Membership is managed by the project author: only they may add or
 * remove contributors. The flat list shows the contributors of every
 * project the actor authored; the nested list shows one project's
 * contributors to any of its members.
 */

import { z } from "zod";
import {
  defineAction,
  type DataStore,
  type PermissionRule,
  type RequestContext,
  type Resource,
} from "@issuedesk/contracts";
import {
  actorId,
  loadAuthoredContributor,
  loadContributor,
  loadParentProject,
} from "../../shared/loaders.js";
import { pageRequest, toPage } from "../../shared/paging.js";
import { serializeContributor, usersById, type ContributorView } from "../../shared/serializers.js";
import { projectPolicy } from "../project/project.actions.js";

const policy: PermissionRule[] = [
  { predicate: "authenticated" },
  { predicate: "project-author-gated" },
];

export const contributorCreateSchema = z.object({
  user: z.string().uuid(),
  project: z.string().uuid(),
});

const byProject = (request: RequestContext) =>
  request.params.projectId ? `project_${request.params.projectId}` : undefined;

export const listContributors = defineAction({
  id: "contributor.list",
  description: "Lists the contributors of projects the actor authored",
  resource: "contributor",
  kind: "list",
  inputSchema: z.object({}),
  permissions: policy,
  cachedList: "contributors",
  async execute(_input, context) {
    const paged = await context.store.contributors.listForProjectAuthor(actorId(context), pageRequest(context));
    const users = await usersById(context.store, paged.items.map((c) => c.userId));
    return toPage(context, paged, paged.items.map((c) => serializeContributor(c, users)));
  },
});

export const listProjectContributors = defineAction({
  id: "contributor.listByProject",
  description: "Lists one project's contributors to its members",
  resource: "contributor",
  kind: "list",
  inputSchema: z.object({}),
  permissions: projectPolicy,
  cachedList: "contributors",
  cacheScope: byProject,
  loadTarget: loadParentProject,
  async execute(_input, context) {
    const paged = await context.store.contributors.listByProject(context.target.entity.id, pageRequest(context));
    const users = await usersById(context.store, paged.items.map((c) => c.userId));
    return toPage(context, paged, paged.items.map((c) => serializeContributor(c, users)));
  },
});

async function addContributor(input: z.infer<typeof contributorCreateSchema>, store: DataStore) {
  const contributor = await store.contributors.create({ userId: input.user, projectId: input.project });
  return serializeContributor(contributor, await usersById(store, [contributor.userId]));
}

async function affectedContributor(output: ContributorView, store: DataStore): Promise<Resource | null> {
  const contributor = await store.contributors.findById(output.id);
  return contributor ? { type: "contributor", entity: contributor } : null;
}

export const createContributor = defineAction({
  id: "contributor.create",
  description: "Adds a user to a project the actor authored",
  resource: "contributor",
  kind: "create",
  inputSchema: contributorCreateSchema,
  permissions: policy,
  execute: (input, { store }) => addContributor(input, store),
  affectedResource: affectedContributor,
});

export const addProjectContributor = defineAction({
  id: "contributor.createInProject",
  description: "Adds a user to the project in the path",
  resource: "contributor",
  kind: "create",
  inputSchema: contributorCreateSchema,
  permissions: policy,
  buildInput: (request) => ({ ...request.body, project: request.params.projectId }),
  execute: (input, { store }) => addContributor(input, store),
  affectedResource: affectedContributor,
});

export const retrieveContributor = defineAction({
  id: "contributor.retrieve",
  description: "Shows a contributor of a project the actor authored",
  resource: "contributor",
  kind: "retrieve",
  inputSchema: z.object({}),
  permissions: policy,
  // Non-authors get not_found
  loadTarget: loadAuthoredContributor,
  async execute(_input, { store, target }) {
    return serializeContributor(target.entity, await usersById(store, [target.entity.userId]));
  },
});

export const deleteContributor = defineAction({
  id: "contributor.delete",
  description: "Removes a user from a project the actor authored",
  resource: "contributor",
  kind: "delete",
  inputSchema: z.object({}),
  permissions: policy,
  loadTarget: loadContributor,
  async execute(_input, { store, target }) {
    await store.contributors.delete(target.entity.id);
    return null;
  },
});

export const contributorActions = [
  listContributors,
  listProjectContributors,
  createContributor,
  addProjectContributor,
  retrieveContributor,
  deleteContributor,
];
