import { describe, it, expect, beforeEach } from "vitest";
import type { User } from "@issuedesk/contracts";
import { createHarness, type Harness } from "../../test/harness.js";
import { issueUpdateSchema } from "./issue.actions.js";

let h: Harness;
let ada: User;
let grace: User;
let mallory: User;
let projectId: string;

const bug = { title: "Crash on start", description: "Segfault", priority: "HIGH", tag: "BUG" };

beforeEach(async () => {
  h = createHarness();
  ada = await h.user("ada");
  grace = await h.user("grace");
  mallory = await h.user("mallory");
  projectId = await h.create("project.create", {
    as: ada,
    body: { title: "Tracker", description: "", type: "BACKEND" },
  });
});

describe("issueUpdateSchema", () => {
  it("drops the project and author fields", () => {
    expect(issueUpdateSchema.parse({ title: "New", project: "p-2", author: "u-2" })).toEqual({ title: "New" });
  });
});

describe("creating issues", () => {
  it("defaults the status to TODO and sets the author", async () => {
    const result = await h.call("issue.create", { as: ada, body: { ...bug, project: projectId } });

    expect(result).toMatchObject({
      success: true,
      data: { status: "TODO", project: projectId, author: { id: ada.id, username: "ada" }, assignee: null },
    });
  });

  it("takes the project from the path on the nested route", async () => {
    const result = await h.call("issue.createInProject", {
      as: ada,
      params: { projectId },
      body: { ...bug, assignee: grace.id },
    });

    expect(result).toMatchObject({
      success: true,
      data: { project: projectId, assignee: { id: grace.id, username: "grace" } },
    });
  });

  it("refuses non-members", async () => {
    const result = await h.call("issue.create", { as: mallory, body: { ...bug, project: projectId } });
    expect(result).toEqual({
      success: false,
      error: "You must be a contributor to this project.",
      errorType: "permission",
    });
  });

  it("rejects an assignee id that is not a UUID before touching the store", async () => {
    const result = await h.call("issue.create", {
      as: ada,
      body: { ...bug, project: projectId, assignee: "abc" },
    });

    expect(result).toEqual({
      success: false,
      error: 'Validation failed for action "issue.create"',
      errorType: "validation",
      details: { fieldErrors: [{ field: "assignee", message: "Invalid uuid", code: "invalid_string" }] },
    });
    expect(await h.store.issues.listByProject(projectId, { limit: 10, offset: 0 })).toMatchObject({ total: 0 });
  });

  it("refuses a request that names no project", async () => {
    const result = await h.call("issue.create", { as: ada, body: bug });
    expect(result).toMatchObject({ success: false, errorType: "permission" });
  });
});

describe("issue lists", () => {
  it("grants a project's issue list once the user is added as contributor", async () => {
    await h.ok("issue.createInProject", { as: ada, params: { projectId }, body: bug });

    const denied = await h.call("issue.listByProject", { as: grace, params: { projectId } });
    expect(denied).toMatchObject({ success: false, errorType: "permission" });

    await h.ok("contributor.createInProject", { as: ada, params: { projectId }, body: { user: grace.id } });

    const granted = await h.call("issue.listByProject", { as: grace, params: { projectId } });
    expect(granted).toMatchObject({
      success: true,
      data: { count: 1, results: [{ title: "Crash on start" }] },
    });
  });

  it("lists issues across every project the actor belongs to", async () => {
    const other = await h.create("project.create", {
      as: grace,
      body: { title: "Other", description: "", type: "IOS" },
    });
    await h.ok("issue.create", { as: ada, body: { ...bug, project: projectId } });
    await h.ok("issue.create", { as: grace, body: { ...bug, title: "Not ada's", project: other } });

    expect(await h.ok("issue.list", { as: ada })).toMatchObject({
      count: 1,
      results: [{ title: "Crash on start" }],
    });
  });
});

describe("changing issues", () => {
  let issueId: string;

  beforeEach(async () => {
    await h.ok("contributor.createInProject", { as: ada, params: { projectId }, body: { user: grace.id } });
    issueId = await h.create("issue.create", { as: ada, body: { ...bug, project: projectId } });
  });

  it("lets only the author update and refreshes contributors' cached lists", async () => {
    expect(await h.ok("issue.list", { as: grace })).toMatchObject({ results: [{ title: "Crash on start" }] });
    const version = await h.services.listCache.currentVersion("issues", grace.id);

    const denied = await h.call("issue.update", { as: grace, params: { id: issueId }, body: { title: "Mine" } });
    expect(denied).toMatchObject({ success: false, errorType: "permission" });
    expect(await h.services.listCache.currentVersion("issues", grace.id)).toBe(version);

    const updated = await h.call("issue.update", { as: ada, params: { id: issueId }, body: { title: "Fixed" } });
    expect(updated).toMatchObject({ success: true, data: { title: "Fixed" } });
    expect(await h.services.listCache.currentVersion("issues", grace.id)).toBeGreaterThan(version);
    expect(await h.ok("issue.list", { as: grace })).toMatchObject({ results: [{ title: "Fixed" }] });
  });

  it("keeps the project when an update names another one", async () => {
    await h.ok("issue.update", { as: ada, params: { id: issueId }, body: { project: "elsewhere", status: "FINISHED" } });

    const issue = await h.store.issues.findById(issueId);
    expect(issue?.projectId).toBe(projectId);
    expect(issue?.status).toBe("FINISHED");
  });

  it("rejects a malformed assignee on update", async () => {
    const result = await h.call("issue.update", { as: ada, params: { id: issueId }, body: { assignee: "abc" } });

    expect(result).toMatchObject({
      success: false,
      errorType: "validation",
      details: { fieldErrors: [{ field: "assignee", code: "invalid_string" }] },
    });
    expect((await h.store.issues.findById(issueId))?.assigneeId).toBeNull();
  });

  it("assigns and unassigns", async () => {
    await h.ok("issue.update", { as: ada, params: { id: issueId }, body: { assignee: grace.id } });
    expect((await h.store.issues.findById(issueId))?.assigneeId).toBe(grace.id);

    await h.ok("issue.update", { as: ada, params: { id: issueId }, body: { assignee: null } });
    expect((await h.store.issues.findById(issueId))?.assigneeId).toBeNull();
  });

  it("deletes an issue with its comments", async () => {
    await h.ok("comment.createOnIssue", { as: grace, params: { issueId }, body: { description: "Same here" } });

    expect(await h.call("issue.delete", { as: ada, params: { id: issueId } })).toEqual({
      success: true,
      data: null,
    });
    expect((await h.store.comments.listByIssue(issueId, { limit: 10, offset: 0 })).total).toBe(0);
  });
});
