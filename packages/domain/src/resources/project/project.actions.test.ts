import { describe, it, expect, beforeEach } from "vitest";
import type { User } from "@issuedesk/contracts";
import { createHarness, type Harness } from "../../test/harness.js";

let h: Harness;
let ada: User;
let grace: User;
let mallory: User;

const tracker = { title: "Tracker", description: "Issue tracker", type: "BACKEND" };

beforeEach(async () => {
  h = createHarness();
  ada = await h.user("ada");
  grace = await h.user("grace");
  mallory = await h.user("mallory");
});

describe("project.create", () => {
  it("makes the actor author and sole contributor", async () => {
    const id = await h.create("project.create", { as: ada, body: tracker });

    const contributors = await h.store.contributors.listByProject(id, { limit: 10, offset: 0 });
    expect(contributors.total).toBe(1);
    expect(contributors.items[0]?.userId).toBe(ada.id);
    expect(await h.ok("project.retrieve", { as: ada, params: { id } })).toMatchObject({
      title: "Tracker",
      type: "BACKEND",
      author: { id: ada.id, username: "ada" },
    });
  });

  it("ignores an author in the payload", async () => {
    const id = await h.create("project.create", { as: ada, body: { ...tracker, authorId: grace.id } });
    expect((await h.store.projects.findById(id))?.authorId).toBe(ada.id);
  });

  it("rejects an unknown project type", async () => {
    const result = await h.call("project.create", { as: ada, body: { ...tracker, type: "DESKTOP" } });
    expect(result).toMatchObject({ success: false, errorType: "validation" });
  });

  it("requires authentication", async () => {
    const result = await h.call("project.create", { body: tracker });
    expect(result).toEqual({
      success: false,
      error: "Authentication credentials were not provided.",
      errorType: "permission",
    });
  });
});

describe("project access", () => {
  let projectId: string;

  beforeEach(async () => {
    projectId = await h.create("project.create", { as: ada, body: tracker });
    await h.store.contributors.create({ userId: grace.id, projectId });
  });

  it("hides the project from non-members", async () => {
    const result = await h.call("project.retrieve", { as: mallory, params: { id: projectId } });
    expect(result).toEqual({
      success: false,
      error: "You must be a contributor to this project.",
      errorType: "permission",
    });
  });

  it("denies every mutation by a non-member", async () => {
    const update = await h.call("project.update", {
      as: mallory,
      params: { id: projectId },
      body: { title: "Taken" },
    });
    const remove = await h.call("project.delete", { as: mallory, params: { id: projectId } });

    expect(update).toMatchObject({ success: false, errorType: "permission" });
    expect(remove).toMatchObject({ success: false, errorType: "permission" });
    expect((await h.store.projects.findById(projectId))?.title).toBe("Tracker");
  });

  it("lets contributors read but not change the project", async () => {
    const read = await h.call("project.retrieve", { as: grace, params: { id: projectId } });
    const update = await h.call("project.update", {
      as: grace,
      params: { id: projectId },
      body: { title: "Renamed" },
    });

    expect(read).toMatchObject({ success: true, data: { id: projectId } });
    expect(update).toMatchObject({ success: false, errorType: "permission" });
  });

  it("gives the same answer when asked twice", async () => {
    const first = await h.call("project.update", { as: mallory, params: { id: projectId }, body: {} });
    const second = await h.call("project.update", { as: mallory, params: { id: projectId }, body: {} });
    expect(second).toEqual(first);
  });

  it("lets the author update and delete", async () => {
    const updated = await h.ok("project.update", {
      as: ada,
      params: { id: projectId },
      body: { title: "Renamed", type: "IOS" },
    });
    expect(updated).toMatchObject({ title: "Renamed", type: "IOS", description: "Issue tracker" });

    expect(await h.call("project.delete", { as: ada, params: { id: projectId } })).toEqual({
      success: true,
      data: null,
    });
    expect(await h.store.contributors.exists(projectId, grace.id)).toBe(false);
  });
});

describe("project.list", () => {
  it("lists only the projects the actor belongs to", async () => {
    const own = await h.create("project.create", { as: ada, body: tracker });
    await h.create("project.create", { as: mallory, body: { ...tracker, title: "Secret" } });

    expect(await h.ok("project.list", { as: ada })).toMatchObject({
      count: 1,
      results: [{ id: own, title: "Tracker" }],
    });
  });

  it("serves a cached page until a mutation bumps the version", async () => {
    const projectId = await h.create("project.create", { as: ada, body: tracker });
    await h.store.contributors.create({ userId: grace.id, projectId });
    const { listCache } = h.services;

    const before = await listCache.currentVersion("projects", grace.id);
    expect(await h.ok("project.list", { as: grace })).toMatchObject({ results: [{ title: "Tracker" }] });

    // A change the bus never saw stays invisible behind the cached page
    await h.store.projects.update(projectId, { title: "Silent" });
    expect(await h.ok("project.list", { as: grace })).toMatchObject({ results: [{ title: "Tracker" }] });

    await h.ok("project.update", { as: ada, params: { id: projectId }, body: { title: "Loud" } });

    expect(await listCache.currentVersion("projects", grace.id)).toBeGreaterThan(before);
    expect(await h.ok("project.list", { as: grace })).toMatchObject({ results: [{ title: "Loud" }] });
  });

  it("pages through results", async () => {
    for (let i = 1; i <= 12; i++) {
      await h.create("project.create", { as: ada, body: { ...tracker, title: `P${i}` } });
    }

    const second = await h.ok("project.list", { as: ada, page: 2 });
    expect(second).toMatchObject({
      count: 12,
      page: 2,
      pageSize: 10,
      results: [{ title: "P11" }, { title: "P12" }],
    });
  });
});
