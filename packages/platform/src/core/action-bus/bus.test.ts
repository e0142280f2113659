/**
 * Action Bus - Test Suite
 *
 * Validates the central dispatch pipeline:
 *   1. Lookup → action must exist
 *   2. Authorize → request-level, then object-level predicates
 *   3. Validate → input must match schema
 *   4. Execute → lists read through the cache
 *   5. Invalidate → mutations bump the audience's list versions
 *   6. Return → structured result
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { z } from "zod";
import {
  ConstraintViolationError,
  defineAction,
  type AnyActionDefinition,
  type CacheStore,
  type DataStore,
  type Issue,
  type Project,
  type RequestContext,
  type ResourceOf,
  type User,
} from "@issuedesk/contracts";
import { dispatch, type ActionServices } from "./bus.js";
import { registerAction, clearActionRegistry } from "./registry.js";
import { createActionServices } from "./services.js";
import { MemoryDataStore } from "../database/memory-store.js";
import { MemoryCacheStore } from "../cache/memory-cache-store.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

let data: MemoryDataStore;
let cacheStore: MemoryCacheStore;
let services: ActionServices;
let author: User;
let member: User;
let outsider: User;
let project: Project;
let issue: Issue;

beforeEach(async () => {
  clearActionRegistry();
  data = new MemoryDataStore();
  cacheStore = new MemoryCacheStore();
  services = createActionServices({ store: data, cacheStore });

  author = await data.users.create({ username: "author", email: "author@example.com" });
  member = await data.users.create({ username: "member", email: "member@example.com" });
  outsider = await data.users.create({ username: "outsider", email: "outsider@example.com" });
  project = await data.projects.create({
    title: "Tracker",
    description: "Issue tracker",
    type: "BACKEND",
    authorId: author.id,
  });
  await data.contributors.create({ userId: member.id, projectId: project.id });
  issue = await data.issues.create({
    title: "Crash",
    description: "On start",
    priority: "HIGH",
    tag: "BUG",
    projectId: project.id,
    authorId: author.id,
  });
});

function request(user: User | null, overrides: Partial<RequestContext> = {}): RequestContext {
  return {
    actor: user ? { userId: user.id, username: user.username } : null,
    action: "list",
    resource: "issue",
    params: {},
    body: {},
    references: {},
    page: 1,
    ...overrides,
  };
}

async function loadIssue(
  req: RequestContext,
  store: DataStore
): Promise<ResourceOf<"issue"> | null> {
  const found = req.params.id ? await store.issues.findById(req.params.id) : null;
  return found ? { type: "issue", entity: found } : null;
}

const listIssues = defineAction({
  id: "issue.list",
  description: "Lists issues visible to the actor",
  resource: "issue",
  kind: "list",
  inputSchema: z.object({}),
  permissions: [{ predicate: "authenticated" }],
  cachedList: "issues",
  async execute(_input, { actor, store, pageSize }) {
    const page = await store.issues.listForMember(actor?.userId ?? "", { limit: pageSize, offset: 0 });
    return { count: page.total, results: page.items.map((i) => ({ id: i.id, title: i.title })) };
  },
});

const updateIssue = defineAction({
  id: "issue.update",
  description: "Updates an issue",
  resource: "issue",
  kind: "update",
  inputSchema: z.object({ title: z.string().min(1).max(255) }).partial(),
  permissions: [
    { predicate: "authenticated" },
    { predicate: "contributor-gated" },
    { predicate: "resource-author-or-read-only" },
  ],
  loadTarget: loadIssue,
  async execute(input, { store, target }) {
    const updated = await store.issues.update(target.entity.id, input);
    return updated ? { id: updated.id, title: updated.title } : null;
  },
  async affectedResource(output, store) {
    const found = output ? await store.issues.findById(output.id) : null;
    return found ? { type: "issue", entity: found } : null;
  },
});

function register(...actions: AnyActionDefinition[]) {
  for (const action of actions) registerAction(action);
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

describe("dispatch - lookup", () => {
  it("returns not_found for an unknown action", async () => {
    const result = await dispatch("nonexistent.action", request(author), services);

    expect(result).toEqual({
      success: false,
      error: 'Action "nonexistent.action" not found',
      errorType: "not_found",
    });
  });

  it("returns not_found when the target does not exist", async () => {
    register(
      defineAction({
        ...updateIssue,
        id: "issue.retrieve",
        kind: "retrieve",
        inputSchema: z.object({}),
        execute: async (_input, { target }) => target.entity,
        affectedResource: undefined,
      })
    );

    const result = await dispatch(
      "issue.retrieve",
      request(author, { action: "retrieve", params: { id: "missing" } }),
      services
    );

    expect(result).toEqual({ success: false, error: "Not found.", errorType: "not_found" });
  });
});

// ---------------------------------------------------------------------------
// Permissions
// ---------------------------------------------------------------------------

describe("dispatch - permissions", () => {
  it("reports the denying predicate's message", async () => {
    register(listIssues);

    const result = await dispatch("issue.list", request(null), services);

    expect(result).toEqual({
      success: false,
      error: "Authentication credentials were not provided.",
      errorType: "permission",
    });
  });

  it("denies before validating or executing", async () => {
    const execute = vi.fn(async () => null);
    register(defineAction({ ...updateIssue, id: "issue.guarded", execute }));

    const result = await dispatch(
      "issue.guarded",
      request(outsider, { action: "update", params: { id: issue.id }, body: { title: 42 } }),
      services
    );

    expect(result).toMatchObject({ success: false, errorType: "permission" });
    expect(execute).not.toHaveBeenCalled();
  });

  it("applies object-level checks to the loaded target", async () => {
    register(updateIssue);

    const result = await dispatch(
      "issue.update",
      request(member, { action: "update", params: { id: issue.id }, body: { title: "Renamed" } }),
      services
    );

    expect(result).toEqual({
      success: false,
      error: "You must be a contributor to this project.",
      errorType: "permission",
    });
    expect((await data.issues.findById(issue.id))?.title).toBe("Crash");
  });

  it("runs actions without permissions", async () => {
    register(
      defineAction({
        id: "user.ping",
        description: "Open action",
        resource: "user",
        kind: "create",
        inputSchema: z.object({}),
        permissions: [],
        execute: async () => "pong",
      })
    );

    expect(await dispatch("user.ping", request(null), services)).toEqual({
      success: true,
      data: "pong",
    });
  });
});

// ---------------------------------------------------------------------------
// Validation and errors
// ---------------------------------------------------------------------------

describe("dispatch - validation and errors", () => {
  it("returns field errors for invalid input", async () => {
    register(updateIssue);

    const result = await dispatch(
      "issue.update",
      request(author, { action: "update", params: { id: issue.id }, body: { title: "" } }),
      services
    );

    expect(result).toEqual({
      success: false,
      error: 'Validation failed for action "issue.update"',
      errorType: "validation",
      details: {
        fieldErrors: [
          { field: "title", message: "String must contain at least 1 character(s)", code: "too_small" },
        ],
      },
    });
  });

  it("reports constraint violations as validation failures", async () => {
    register(
      defineAction({
        id: "contributor.create",
        description: "Adds a contributor",
        resource: "contributor",
        kind: "create",
        inputSchema: z.object({}),
        permissions: [],
        execute: async () => {
          throw new ConstraintViolationError(
            "contributors_user_project_key",
            "This user is already a contributor to the project."
          );
        },
      })
    );

    const result = await dispatch("contributor.create", request(author, { action: "create" }), services);

    expect(result).toEqual({
      success: false,
      error: "This user is already a contributor to the project.",
      errorType: "validation",
      details: { constraint: "contributors_user_project_key" },
    });
  });

  it("hides unexpected errors behind a generic message", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    register(
      defineAction({
        id: "issue.broken",
        description: "Fails",
        resource: "issue",
        kind: "list",
        inputSchema: z.object({}),
        permissions: [],
        execute: async () => {
          throw new Error("Database connection lost");
        },
      })
    );

    const result = await dispatch("issue.broken", request(author), services);

    expect(result).toEqual({
      success: false,
      error: "An unexpected error occurred",
      errorType: "unknown",
    });
    error.mockRestore();
  });
});

// ---------------------------------------------------------------------------
// Cache
// ---------------------------------------------------------------------------

describe("dispatch - list cache", () => {
  it("serves the second read from the cache", async () => {
    const execute = vi.fn(listIssues.execute);
    register(defineAction({ ...listIssues, execute }));

    const first = await dispatch("issue.list", request(member), services);
    const second = await dispatch("issue.list", request(member), services);

    expect(execute).toHaveBeenCalledTimes(1);
    expect(second).toEqual(first);
    expect(await cacheStore.get(`issues_user_${member.id}_page_1_v0`)).toBeDefined();
  });

  it("never caches anonymous reads", async () => {
    const execute = vi.fn(async () => []);
    register(
      defineAction({
        id: "project.public",
        description: "Open list",
        resource: "project",
        kind: "list",
        inputSchema: z.object({}),
        permissions: [],
        cachedList: "projects",
        execute,
      })
    );

    await dispatch("project.public", request(null), services);
    await dispatch("project.public", request(null), services);

    expect(execute).toHaveBeenCalledTimes(2);
    expect(cacheStore.size).toBe(0);
  });

  it("recomputes a member's list after an update they can see", async () => {
    register(listIssues, updateIssue);

    await dispatch("issue.list", request(member), services);
    const update = await dispatch(
      "issue.update",
      request(author, { action: "update", params: { id: issue.id }, body: { title: "Renamed" } }),
      services
    );
    const after = await dispatch("issue.list", request(member), services);

    expect(update).toEqual({ success: true, data: { id: issue.id, title: "Renamed" } });
    expect(after).toEqual({
      success: true,
      data: { count: 1, results: [{ id: issue.id, title: "Renamed" }] },
    });
    expect(await services.listCache.currentVersion("issues", member.id)).toBe(1);
    expect(await services.listCache.currentVersion("issues", outsider.id)).toBe(0);
  });

  it("does not touch versions when a mutation is denied", async () => {
    register(updateIssue);

    await dispatch(
      "issue.update",
      request(outsider, { action: "update", params: { id: issue.id }, body: { title: "x" } }),
      services
    );

    expect(await services.listCache.currentVersion("issues", author.id)).toBe(0);
  });

  it("still succeeds when the cache cannot be bumped", async () => {
    const broken: CacheStore = {
      name: "broken",
      get: async () => undefined,
      set: async () => {},
      increment: async () => {
        throw new Error("cache down");
      },
      delete: async () => {},
      clear: async () => {},
    };
    const degraded = createActionServices({ store: data, cacheStore: broken });
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    register(updateIssue);

    const result = await dispatch(
      "issue.update",
      request(author, { action: "update", params: { id: issue.id }, body: { title: "Renamed" } }),
      degraded
    );

    expect(result).toEqual({ success: true, data: { id: issue.id, title: "Renamed" } });
    error.mockRestore();
  });
});
