/**
 * Comment Actions
 *
 * Comments hang off an issue; any member of the issue's project may read
 * or post them, and only their author may edit or delete them.
 */

import { z } from "zod";
import { defineAction, type Comment, type DataStore, type Resource } from "@issuedesk/contracts";
import { actorId, loadComment, loadParentIssue } from "../../shared/loaders.js";
import { pageRequest, toPage } from "../../shared/paging.js";
import { serializeComment, usersById, type CommentView } from "../../shared/serializers.js";
import { issuePolicy } from "../issue/issue.actions.js";

export const commentCreateSchema = z.object({
  description: z.string().min(1),
  issue: z.string().uuid(),
});

/** The issue and author of a comment never change */
export const commentUpdateSchema = commentCreateSchema.pick({ description: true }).partial();

async function present(comments: Comment[], store: DataStore): Promise<CommentView[]> {
  const users = await usersById(store, comments.map((comment) => comment.authorId));
  return comments.map((comment) => serializeComment(comment, users));
}

async function presentOne(comment: Comment, store: DataStore): Promise<CommentView> {
  return serializeComment(comment, await usersById(store, [comment.authorId]));
}

async function affectedComment(output: CommentView | null, store: DataStore): Promise<Resource | null> {
  const comment = output ? await store.comments.findById(output.id) : null;
  return comment ? { type: "comment", entity: comment } : null;
}

async function postComment(
  input: z.infer<typeof commentCreateSchema>,
  store: DataStore,
  authorId: string
): Promise<CommentView> {
  const comment = await store.comments.create({ description: input.description, issueId: input.issue, authorId });
  return presentOne(comment, store);
}

export const listComments = defineAction({
  id: "comment.list",
  description: "Lists comments on issues of every project the actor contributes to",
  resource: "comment",
  kind: "list",
  inputSchema: z.object({}),
  permissions: issuePolicy,
  cachedList: "comments",
  async execute(_input, context) {
    const paged = await context.store.comments.listForMember(actorId(context), pageRequest(context));
    return toPage(context, paged, await present(paged.items, context.store));
  },
});

export const listIssueComments = defineAction({
  id: "comment.listByIssue",
  description: "Lists one issue's comments to members of its project",
  resource: "comment",
  kind: "list",
  inputSchema: z.object({}),
  permissions: issuePolicy,
  cachedList: "comments",
  cacheScope: (request) => (request.params.issueId ? `issue_${request.params.issueId}` : undefined),
  loadTarget: loadParentIssue,
  async execute(_input, context) {
    const paged = await context.store.comments.listByIssue(context.target.entity.id, pageRequest(context));
    return toPage(context, paged, await present(paged.items, context.store));
  },
});

export const createComment = defineAction({
  id: "comment.create",
  description: "Comments on an issue of a project the actor contributes to",
  resource: "comment",
  kind: "create",
  inputSchema: commentCreateSchema,
  permissions: issuePolicy,
  execute: (input, context) => postComment(input, context.store, actorId(context)),
  affectedResource: affectedComment,
});

export const createIssueComment = defineAction({
  id: "comment.createOnIssue",
  description: "Comments on the issue in the path",
  resource: "comment",
  kind: "create",
  inputSchema: commentCreateSchema,
  permissions: issuePolicy,
  buildInput: (request) => ({ ...request.body, issue: request.params.issueId }),
  execute: (input, context) => postComment(input, context.store, actorId(context)),
  affectedResource: affectedComment,
});

export const retrieveComment = defineAction({
  id: "comment.retrieve",
  description: "Shows a comment to a member of its project",
  resource: "comment",
  kind: "retrieve",
  inputSchema: z.object({}),
  permissions: issuePolicy,
  loadTarget: loadComment,
  execute: (_input, { store, target }) => presentOne(target.entity, store),
});

export const updateComment = defineAction({
  id: "comment.update",
  description: "Edits a comment the actor wrote",
  resource: "comment",
  kind: "update",
  inputSchema: commentUpdateSchema,
  permissions: issuePolicy,
  loadTarget: loadComment,
  async execute(input, { store, target }) {
    const updated = await store.comments.update(target.entity.id, input);
    return updated ? presentOne(updated, store) : null;
  },
  affectedResource: affectedComment,
});

export const deleteComment = defineAction({
  id: "comment.delete",
  description: "Deletes a comment the actor wrote",
  resource: "comment",
  kind: "delete",
  inputSchema: z.object({}),
  permissions: issuePolicy,
  loadTarget: loadComment,
  async execute(_input, { store, target }) {
    await store.comments.delete(target.entity.id);
    return null;
  },
});

export const commentActions = [
  listComments,
  listIssueComments,
  createComment,
  createIssueComment,
  retrieveComment,
  updateComment,
  deleteComment,
];
