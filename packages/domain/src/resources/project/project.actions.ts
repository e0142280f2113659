/**
 * Project Actions
 *
 * Any authenticated user may create a project and becomes its author and
 * first contributor. Only members see a project; only its author may
 * change or delete it.
 */

import { z } from "zod";
import { defineAction, PROJECT_TYPES, type PermissionRule } from "@issuedesk/contracts";
import { actorId, loadProject } from "../../shared/loaders.js";
import { pageRequest, toPage } from "../../shared/paging.js";
import { serializeProject, usersById } from "../../shared/serializers.js";

export const projectPolicy: PermissionRule[] = [
  { predicate: "authenticated" },
  { predicate: "contributor-gated", objectOnly: true },
  { predicate: "resource-author-or-read-only" },
];

export const projectCreateSchema = z.object({
  title: z.string().trim().min(1).max(255),
  description: z.string(),
  type: z.enum(PROJECT_TYPES),
});

export const projectUpdateSchema = projectCreateSchema.partial();

export const listProjects = defineAction({
  id: "project.list",
  description: "Lists the projects the actor contributes to",
  resource: "project",
  kind: "list",
  inputSchema: z.object({}),
  permissions: projectPolicy,
  cachedList: "projects",
  async execute(_input, context) {
    const paged = await context.store.projects.listForMember(actorId(context), pageRequest(context));
    const users = await usersById(context.store, paged.items.map((p) => p.authorId));
    return toPage(context, paged, paged.items.map((p) => serializeProject(p, users)));
  },
});

export const createProject = defineAction({
  id: "project.create",
  description: "Creates a project authored by the actor",
  resource: "project",
  kind: "create",
  inputSchema: projectCreateSchema,
  permissions: projectPolicy,
  async execute(input, context) {
    const project = await context.store.projects.create({ ...input, authorId: actorId(context) });
    return serializeProject(project, await usersById(context.store, [project.authorId]));
  },
  async affectedResource(output, store) {
    const project = await store.projects.findById(output.id);
    return project ? { type: "project", entity: project } : null;
  },
});

export const retrieveProject = defineAction({
  id: "project.retrieve",
  description: "Shows a project to one of its members",
  resource: "project",
  kind: "retrieve",
  inputSchema: z.object({}),
  permissions: projectPolicy,
  loadTarget: loadProject,
  async execute(_input, { store, target }) {
    return serializeProject(target.entity, await usersById(store, [target.entity.authorId]));
  },
});

export const updateProject = defineAction({
  id: "project.update",
  description: "Changes a project's title, description or type",
  resource: "project",
  kind: "update",
  inputSchema: projectUpdateSchema,
  permissions: projectPolicy,
  loadTarget: loadProject,
  async execute(input, { store, target }) {
    const updated = await store.projects.update(target.entity.id, input);
    return updated ? serializeProject(updated, await usersById(store, [updated.authorId])) : null;
  },
  async affectedResource(output, store) {
    const project = output ? await store.projects.findById(output.id) : null;
    return project ? { type: "project", entity: project } : null;
  },
});

export const deleteProject = defineAction({
  id: "project.delete",
  description: "Deletes a project with its contributors, issues and comments",
  resource: "project",
  kind: "delete",
  inputSchema: z.object({}),
  permissions: projectPolicy,
  loadTarget: loadProject,
  async execute(_input, { store, target }) {
    await store.projects.delete(target.entity.id);
    return null;
  },
});

export const projectActions = [listProjects, createProject, retrieveProject, updateProject, deleteProject];
