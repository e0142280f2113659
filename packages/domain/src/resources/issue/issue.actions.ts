/**
 * Issue Actions
 *
 * Issues belong to a project and are open to its members. Only the author
 * of an issue may change or delete it; its project and author are fixed
 * at creation.
 */

import { z } from "zod";
import {
  defineAction,
  ISSUE_PRIORITIES,
  ISSUE_STATUSES,
  ISSUE_TAGS,
  type DataStore,
  type Issue,
  type PermissionRule,
  type RequestContext,
  type Resource,
} from "@issuedesk/contracts";
import { actorId, loadIssue, loadParentProject } from "../../shared/loaders.js";
import { pageRequest, toPage } from "../../shared/paging.js";
import { serializeIssue, usersById, type IssueView } from "../../shared/serializers.js";
import { projectPolicy } from "../project/project.actions.js";

export const issuePolicy: PermissionRule[] = [
  { predicate: "authenticated" },
  { predicate: "contributor-gated" },
  { predicate: "resource-author-or-read-only" },
];

export const issueCreateSchema = z.object({
  title: z.string().trim().min(1).max(255),
  description: z.string(),
  priority: z.enum(ISSUE_PRIORITIES),
  tag: z.enum(ISSUE_TAGS),
  status: z.enum(ISSUE_STATUSES).default("TODO"),
  project: z.string().uuid(),
  assignee: z.string().uuid().nullable().optional(),
});

/** Unknown keys such as `project` and `author` are stripped */
export const issueUpdateSchema = z.object({
  title: z.string().trim().min(1).max(255).optional(),
  description: z.string().optional(),
  priority: z.enum(ISSUE_PRIORITIES).optional(),
  tag: z.enum(ISSUE_TAGS).optional(),
  status: z.enum(ISSUE_STATUSES).optional(),
  assignee: z.string().uuid().nullable().optional(),
});

async function present(issues: Issue[], store: DataStore): Promise<IssueView[]> {
  const users = await usersById(
    store,
    issues.flatMap((issue) => (issue.assigneeId ? [issue.authorId, issue.assigneeId] : [issue.authorId]))
  );
  return issues.map((issue) => serializeIssue(issue, users));
}

async function presentOne(issue: Issue, store: DataStore): Promise<IssueView> {
  return serializeIssue(issue, await usersById(store, [issue.authorId, issue.assigneeId ?? issue.authorId]));
}

async function affectedIssue(output: IssueView | null, store: DataStore): Promise<Resource | null> {
  const issue = output ? await store.issues.findById(output.id) : null;
  return issue ? { type: "issue", entity: issue } : null;
}

async function openIssue(
  input: z.infer<typeof issueCreateSchema>,
  context: { store: DataStore; authorId: string }
): Promise<IssueView> {
  const { project, assignee, ...fields } = input;
  const issue = await context.store.issues.create({
    ...fields,
    projectId: project,
    authorId: context.authorId,
    assigneeId: assignee ?? null,
  });
  return presentOne(issue, context.store);
}

export const listIssues = defineAction({
  id: "issue.list",
  description: "Lists the issues of every project the actor contributes to",
  resource: "issue",
  kind: "list",
  inputSchema: z.object({}),
  permissions: issuePolicy,
  cachedList: "issues",
  async execute(_input, context) {
    const paged = await context.store.issues.listForMember(actorId(context), pageRequest(context));
    return toPage(context, paged, await present(paged.items, context.store));
  },
});

export const listProjectIssues = defineAction({
  id: "issue.listByProject",
  description: "Lists one project's issues to its members",
  resource: "issue",
  kind: "list",
  inputSchema: z.object({}),
  permissions: projectPolicy,
  cachedList: "issues",
  cacheScope: (request: RequestContext) =>
    request.params.projectId ? `project_${request.params.projectId}` : undefined,
  loadTarget: loadParentProject,
  async execute(_input, context) {
    const paged = await context.store.issues.listByProject(context.target.entity.id, pageRequest(context));
    return toPage(context, paged, await present(paged.items, context.store));
  },
});

export const createIssue = defineAction({
  id: "issue.create",
  description: "Opens an issue in a project the actor contributes to",
  resource: "issue",
  kind: "create",
  inputSchema: issueCreateSchema,
  permissions: issuePolicy,
  execute: (input, context) => openIssue(input, { store: context.store, authorId: actorId(context) }),
  affectedResource: affectedIssue,
});

export const createProjectIssue = defineAction({
  id: "issue.createInProject",
  description: "Opens an issue in the project in the path",
  resource: "issue",
  kind: "create",
  inputSchema: issueCreateSchema,
  permissions: issuePolicy,
  buildInput: (request) => ({ ...request.body, project: request.params.projectId }),
  execute: (input, context) => openIssue(input, { store: context.store, authorId: actorId(context) }),
  affectedResource: affectedIssue,
});

export const retrieveIssue = defineAction({
  id: "issue.retrieve",
  description: "Shows an issue to a member of its project",
  resource: "issue",
  kind: "retrieve",
  inputSchema: z.object({}),
  permissions: issuePolicy,
  loadTarget: loadIssue,
  async execute(_input, { store, target }) {
    return presentOne(target.entity, store);
  },
});

export const updateIssue = defineAction({
  id: "issue.update",
  description: "Changes an issue the actor authored",
  resource: "issue",
  kind: "update",
  inputSchema: issueUpdateSchema,
  permissions: issuePolicy,
  loadTarget: loadIssue,
  async execute(input, { store, target }) {
    const { assignee, ...fields } = input;
    const updated = await store.issues.update(
      target.entity.id,
      assignee === undefined ? fields : { ...fields, assigneeId: assignee }
    );
    return updated ? presentOne(updated, store) : null;
  },
  affectedResource: affectedIssue,
});

export const deleteIssue = defineAction({
  id: "issue.delete",
  description: "Deletes an issue the actor authored, with its comments",
  resource: "issue",
  kind: "delete",
  inputSchema: z.object({}),
  permissions: issuePolicy,
  loadTarget: loadIssue,
  async execute(_input, { store, target }) {
    await store.issues.delete(target.entity.id);
    return null;
  },
});

export const issueActions = [
  listIssues,
  listProjectIssues,
  createIssue,
  createProjectIssue,
  retrieveIssue,
  updateIssue,
  deleteIssue,
];
