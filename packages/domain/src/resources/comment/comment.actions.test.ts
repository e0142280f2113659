import { describe, it, expect, beforeEach } from "vitest";
import type { User } from "@issuedesk/contracts";
import { createHarness, type Harness } from "../../test/harness.js";

let h: Harness;
let ada: User;
let grace: User;
let linus: User;
let mallory: User;
let issueId: string;

beforeEach(async () => {
  h = createHarness();
  ada = await h.user("ada");
  grace = await h.user("grace");
  linus = await h.user("linus");
  mallory = await h.user("mallory");

  const projectId = await h.create("project.create", {
    as: ada,
    body: { title: "Tracker", description: "", type: "BACKEND" },
  });
  for (const user of [grace, linus]) {
    await h.ok("contributor.createInProject", { as: ada, params: { projectId }, body: { user: user.id } });
  }
  issueId = await h.create("issue.createInProject", {
    as: ada,
    params: { projectId },
    body: { title: "Crash", description: "", priority: "LOW", tag: "BUG" },
  });
});

describe("comment actions", () => {
  it("lets any contributor comment on an issue", async () => {
    const result = await h.call("comment.create", {
      as: grace,
      body: { description: "Reproduced", issue: issueId },
    });

    expect(result).toMatchObject({
      success: true,
      data: { description: "Reproduced", issue: issueId, author: { id: grace.id, username: "grace" } },
    });
  });

  it("refuses comments from non-members", async () => {
    const result = await h.call("comment.createOnIssue", {
      as: mallory,
      params: { issueId },
      body: { description: "Spam" },
    });

    expect(result).toEqual({
      success: false,
      error: "You must be a contributor to this project.",
      errorType: "permission",
    });
  });

  it("counts every concurrent comment in each member's list version", async () => {
    const { listCache } = h.services;
    const members = [ada, grace, linus];
    const before = await Promise.all(members.map((m) => listCache.currentVersion("comments", m.id)));

    const results = await Promise.all([
      h.call("comment.createOnIssue", { as: grace, params: { issueId }, body: { description: "First" } }),
      h.call("comment.createOnIssue", { as: linus, params: { issueId }, body: { description: "Second" } }),
    ]);

    expect(results.every((r) => r.success)).toBe(true);
    const after = await Promise.all(members.map((m) => listCache.currentVersion("comments", m.id)));
    after.forEach((version, i) => expect(version).toBeGreaterThanOrEqual((before[i] ?? 0) + 2));
    expect(await h.ok("comment.listByIssue", { as: ada, params: { issueId } })).toMatchObject({ count: 2 });
  });

  it("edits only the description, and only for the author", async () => {
    const commentId = await h.create("comment.createOnIssue", {
      as: ada,
      params: { issueId },
      body: { description: "Typo" },
    });

    const byOther = await h.call("comment.update", {
      as: grace,
      params: { id: commentId },
      body: { description: "Hijacked" },
    });
    const byAuthor = await h.call("comment.update", {
      as: ada,
      params: { id: commentId },
      body: { description: "Fixed", issue: "elsewhere" },
    });

    expect(byOther).toMatchObject({ success: false, errorType: "permission" });
    expect(byAuthor).toMatchObject({ success: true, data: { description: "Fixed", issue: issueId } });
  });

  it("shows an issue's comments to members only", async () => {
    await h.ok("comment.createOnIssue", { as: grace, params: { issueId }, body: { description: "Hi" } });

    const asLinus = await h.call("comment.listByIssue", { as: linus, params: { issueId } });
    const asMallory = await h.call("comment.listByIssue", { as: mallory, params: { issueId } });
    const flat = await h.ok("comment.list", { as: mallory });

    expect(asLinus).toMatchObject({ success: true, data: { count: 1, results: [{ description: "Hi" }] } });
    expect(asMallory).toMatchObject({ success: false, errorType: "permission" });
    expect(flat).toMatchObject({ count: 0, results: [] });
  });

  it("rejects an empty comment", async () => {
    const result = await h.call("comment.create", { as: grace, body: { description: "", issue: issueId } });
    expect(result).toMatchObject({ success: false, errorType: "validation" });
  });
});
