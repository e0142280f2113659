/**
 * User Actions
 *
 * Anyone may sign up. Every other operation requires an account, and
 * reading or changing a single user is limited to one's own record.
 *
 * The users list is never cached. Changing or deleting a user still
 * invalidates the cached lists of everyone sharing a project with them,
 * since usernames appear in those payloads.
 */

import { z } from "zod";
import { defineAction, MINIMUM_USER_AGE, type PermissionRule } from "@issuedesk/contracts";
import { loadUser } from "../../shared/loaders.js";
import { pageRequest, toPage } from "../../shared/paging.js";
import { serializeUser } from "../../shared/serializers.js";

const policy: PermissionRule[] = [{ predicate: "self-or-create" }];

const age = z
  .number()
  .int()
  .min(MINIMUM_USER_AGE, `User must be at least ${MINIMUM_USER_AGE} years old.`)
  .nullable();

export const userCreateSchema = z.object({
  username: z.string().trim().min(1).max(150),
  email: z.string().email(),
  age: age.optional(),
  canBeContacted: z.boolean().default(false),
  canDataBeShared: z.boolean().default(false),
});

export const userUpdateSchema = z.object({
  username: z.string().trim().min(1).max(150).optional(),
  email: z.string().email().optional(),
  age: age.optional(),
  canBeContacted: z.boolean().optional(),
  canDataBeShared: z.boolean().optional(),
});

export const listUsers = defineAction({
  id: "user.list",
  description: "Lists every user; others' email and age are hidden unless they share data",
  resource: "user",
  kind: "list",
  inputSchema: z.object({}),
  permissions: policy,
  async execute(_input, context) {
    const paged = await context.store.users.list(pageRequest(context));
    const results = paged.items.map((user) =>
      serializeUser(user, user.id !== context.actor?.userId && !user.canDataBeShared)
    );
    return toPage(context, paged, results);
  },
});

export const createUser = defineAction({
  id: "user.create",
  description: "Signs a new user up",
  resource: "user",
  kind: "create",
  inputSchema: userCreateSchema,
  permissions: policy,
  async execute(input, { store }) {
    return serializeUser(await store.users.create(input));
  },
});

export const retrieveUser = defineAction({
  id: "user.retrieve",
  description: "Shows the actor's own account",
  resource: "user",
  kind: "retrieve",
  inputSchema: z.object({}),
  permissions: policy,
  loadTarget: loadUser,
  async execute(_input, { target }) {
    return serializeUser(target.entity);
  },
});

export const updateUser = defineAction({
  id: "user.update",
  description: "Changes the actor's own account",
  resource: "user",
  kind: "update",
  inputSchema: userUpdateSchema,
  permissions: policy,
  loadTarget: loadUser,
  async execute(input, { store, target }) {
    const updated = await store.users.update(target.entity.id, input);
    return updated ? serializeUser(updated) : null;
  },
  async affectedResource(output, store) {
    const user = output ? await store.users.findById(output.id) : null;
    return user ? { type: "user", entity: user } : null;
  },
});

export const deleteUser = defineAction({
  id: "user.delete",
  description: "Deletes the actor's own account and everything they authored",
  resource: "user",
  kind: "delete",
  inputSchema: z.object({}),
  permissions: policy,
  loadTarget: loadUser,
  async execute(_input, { store, target }) {
    await store.users.delete(target.entity.id);
    return null;
  },
});

export const userActions = [listUsers, createUser, retrieveUser, updateUser, deleteUser];
