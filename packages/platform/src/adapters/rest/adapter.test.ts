/**
 * REST Adapter Tests
 *
 * Mounts a handful of actions on a Fastify instance and checks routing,
 * the request context each route builds, and status code mapping.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import { defineAction, type DataStore, type RequestContext, type ResourceOf, type User } from "@issuedesk/contracts";
import { registerRESTRoutes, routeBindings } from "./adapter.js";
import { clearActionRegistry, registerActions } from "../../core/action-bus/registry.js";
import { createActionServices } from "../../core/action-bus/services.js";
import { MemoryDataStore } from "../../core/database/memory-store.js";
import { MemoryCacheStore } from "../../core/cache/memory-cache-store.js";
import { DevAuthProvider, setAuthProvider } from "../../auth/index.js";

let store: MemoryDataStore;
let app: FastifyInstance;
let ada: User;

async function loadProject(
  request: RequestContext,
  data: DataStore
): Promise<ResourceOf<"project"> | null> {
  const id = request.params.id ?? request.params.projectId;
  const project = id ? await data.projects.findById(id) : null;
  return project ? { type: "project", entity: project } : null;
}

const projectActions = [
  defineAction({
    id: "project.create",
    description: "Creates a project",
    resource: "project",
    kind: "create",
    inputSchema: z.object({ title: z.string().min(1), description: z.string(), type: z.enum(["BACKEND", "IOS"]) }),
    permissions: [{ predicate: "authenticated" }],
    async execute(input, { actor, store: data }) {
      const project = await data.projects.create({ ...input, authorId: actor?.userId ?? "" });
      return { id: project.id, title: project.title };
    },
  }),
  defineAction({
    id: "project.retrieve",
    description: "Shows a project",
    resource: "project",
    kind: "retrieve",
    inputSchema: z.object({}),
    permissions: [{ predicate: "authenticated" }, { predicate: "contributor-gated", objectOnly: true }],
    loadTarget: loadProject,
    async execute(_input, { target }) {
      return { id: target.entity.id, title: target.entity.title };
    },
  }),
  defineAction({
    id: "project.delete",
    description: "Deletes a project",
    resource: "project",
    kind: "delete",
    inputSchema: z.object({}),
    permissions: [
      { predicate: "authenticated" },
      { predicate: "contributor-gated", objectOnly: true },
      { predicate: "resource-author-or-read-only" },
    ],
    loadTarget: loadProject,
    async execute(_input, { target, store: data }) {
      await data.projects.delete(target.entity.id);
      return null;
    },
  }),
  defineAction({
    id: "issue.listByProject",
    description: "Echoes what the route extracted",
    resource: "issue",
    kind: "list",
    inputSchema: z.object({}),
    permissions: [],
    async execute(_input, { request }) {
      return { params: request.params, references: request.references, page: request.page };
    },
  }),
];

beforeEach(async () => {
  clearActionRegistry();
  registerActions(projectActions);

  store = new MemoryDataStore();
  ada = await store.users.create({ username: "ada", email: "ada@example.com" });
  setAuthProvider(new DevAuthProvider(store.users));

  app = Fastify({ logger: false });
  await registerRESTRoutes(app, createActionServices({ store, cacheStore: new MemoryCacheStore() }));
  await app.ready();
});

afterEach(async () => {
  await app.close();
  setAuthProvider(null);
});

const asAda = () => ({ authorization: `Bearer ${ada.id}` });

describe("routeBindings", () => {
  it("maps PATCH and PUT to the same update action", () => {
    const updates = routeBindings().filter((b) => b.url === "/api/issues/:id" && b.actionId === "issue.update");
    expect(updates.map((b) => b.method)).toEqual(["PATCH", "PUT"]);
  });
});

describe("registerRESTRoutes", () => {
  it("answers 201 with the result envelope on create", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/api/projects",
      headers: asAda(),
      payload: { title: "Tracker", description: "Issue tracker", type: "BACKEND" },
    });

    expect(response.statusCode).toBe(201);
    expect(response.json()).toMatchObject({ success: true, data: { title: "Tracker" } });
  });

  it("answers 204 with no body on delete", async () => {
    const project = await store.projects.create({
      title: "Tracker",
      description: "",
      type: "IOS",
      authorId: ada.id,
    });

    const response = await app.inject({ method: "DELETE", url: `/api/projects/${project.id}`, headers: asAda() });

    expect(response.statusCode).toBe(204);
    expect(response.body).toBe("");
    expect(await store.projects.findById(project.id)).toBeNull();
  });

  it("maps failures to status codes", async () => {
    const anonymous = await app.inject({ method: "POST", url: "/api/projects", payload: {} });
    const invalid = await app.inject({ method: "POST", url: "/api/projects", headers: asAda(), payload: {} });
    const missing = await app.inject({ method: "GET", url: "/api/projects/missing", headers: asAda() });

    expect(anonymous.statusCode).toBe(403);
    expect(anonymous.json()).toEqual({
      success: false,
      error: "Authentication credentials were not provided.",
      errorType: "permission",
    });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toMatchObject({ errorType: "validation" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ success: false, error: "Not found.", errorType: "not_found" });
  });

  it("returns 401 when the bearer token is not a known user", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/api/projects/anything",
      headers: { authorization: "Bearer not-a-user" },
    });

    expect(response.statusCode).toBe(401);
  });

  it("mounts only routes whose action is registered", async () => {
    const response = await app.inject({ method: "GET", url: "/api/projects", headers: asAda() });
    expect(response.statusCode).toBe(404);
  });

  it("builds the request context from path, body and query", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/api/projects/p-7/issues?page=2",
    });

    expect(response.json()).toEqual({
      success: true,
      data: { params: { projectId: "p-7" }, references: { project: "p-7" }, page: 2 },
    });
  });

  it("serves the public endpoints without credentials", async () => {
    const config = await app.inject({ method: "GET", url: "/api/auth/config" });
    const actions = await app.inject({ method: "GET", url: "/api/meta/actions" });

    expect(config.json()).toMatchObject({ provider: "dev" });
    expect(actions.json()).toHaveLength(4);
    expect(actions.json()[0]).toEqual({
      id: "project.create",
      description: "Creates a project",
      resource: "project",
      kind: "create",
      cachedList: null,
    });
  });
});
