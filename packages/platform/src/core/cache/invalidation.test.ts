/**
 * Cache Invalidation - Test Suite
 *
 * Audience collection per resource type, one bump per (actor, list),
 * and the best-effort policy when increments fail.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { CacheStore, Logger, Project, User } from "@issuedesk/contracts";
import { MemoryDataStore } from "../database/memory-store.js";
import { CacheInvalidator, collectAudience } from "./invalidation.js";
import { ListCache } from "./list-cache.js";
import { MemoryCacheStore } from "./memory-cache-store.js";

function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

let data: MemoryDataStore;
let author: User;
let member: User;
let outsider: User;
let project: Project;

beforeEach(async () => {
  data = new MemoryDataStore();
  author = await data.users.create({ username: "author", email: "author@example.com" });
  member = await data.users.create({ username: "member", email: "member@example.com" });
  outsider = await data.users.create({ username: "outsider", email: "outsider@example.com" });
  project = await data.projects.create({
    title: "Tracker",
    description: "Issue tracker",
    type: "FRONTEND",
    authorId: author.id,
  });
  await data.contributors.create({ userId: member.id, projectId: project.id });
});

describe("collectAudience", () => {
  it("includes the project author and every contributor", async () => {
    const issue = await data.issues.create({
      title: "Crash",
      description: "On start",
      priority: "LOW",
      tag: "BUG",
      projectId: project.id,
      authorId: member.id,
    });
    const comment = await data.comments.create({
      description: "Confirmed",
      issueId: issue.id,
      authorId: author.id,
    });

    for (const resource of [
      { type: "project" as const, entity: project },
      { type: "issue" as const, entity: issue },
      { type: "comment" as const, entity: comment },
    ]) {
      const audience = await collectAudience(resource, data);
      expect([...audience].sort()).toEqual([author.id, member.id].sort());
    }
  });

  it("covers every project a user belongs to", async () => {
    const other = await data.projects.create({
      title: "Other",
      description: "",
      type: "IOS",
      authorId: outsider.id,
    });
    await data.contributors.create({ userId: member.id, projectId: other.id });

    const audience = await collectAudience({ type: "user", entity: member }, data);

    expect([...audience].sort()).toEqual([author.id, member.id, outsider.id].sort());
  });

  it("is empty when the owning project is gone", async () => {
    const [membership] = (await data.contributors.listByProject(project.id, { limit: 10, offset: 0 })).items;
    await data.projects.delete(project.id);

    const audience = await collectAudience({ type: "contributor", entity: membership }, data);
    expect(audience.size).toBe(0);
  });
});

describe("CacheInvalidator", () => {
  it("bumps every cached list once per actor", async () => {
    const store = new MemoryCacheStore();
    const listCache = new ListCache({ store, ttlSeconds: 300, logger: silentLogger() });
    const invalidator = new CacheInvalidator(listCache, silentLogger());

    const report = await invalidator.invalidate([author.id, member.id, author.id]);

    expect(report.bumped).toBe(8);
    expect(report.failed).toEqual([]);
    expect(report.audience).toEqual([author.id, member.id]);
    for (const list of ["projects", "contributors", "issues", "comments"] as const) {
      expect(await listCache.currentVersion(list, author.id)).toBe(1);
      expect(await listCache.currentVersion(list, member.id)).toBe(1);
      expect(await listCache.currentVersion(list, outsider.id)).toBe(0);
    }
  });

  it("counts concurrent invalidations separately", async () => {
    const store = new MemoryCacheStore();
    const listCache = new ListCache({ store, ttlSeconds: 300, logger: silentLogger() });
    const invalidator = new CacheInvalidator(listCache, silentLogger());

    await Promise.all([invalidator.invalidate([member.id]), invalidator.invalidate([member.id])]);

    expect(await listCache.currentVersion("comments", member.id)).toBe(2);
  });

  it("reports failed increments without throwing", async () => {
    const inner = new MemoryCacheStore();
    const broken: CacheStore = {
      name: "broken",
      get: (key) => inner.get(key),
      set: (key, value, options) => inner.set(key, value, options),
      increment: async () => {
        throw new Error("READONLY replica");
      },
      delete: (key) => inner.delete(key),
      clear: () => inner.clear(),
    };
    const logger = silentLogger();
    const invalidator = new CacheInvalidator(
      new ListCache({ store: broken, ttlSeconds: 300, logger }),
      logger
    );

    const report = await invalidator.invalidate([member.id]);

    expect(report.bumped).toBe(0);
    expect(report.failed).toHaveLength(4);
    expect(report.failed[0]).toEqual({
      list: "projects",
      actorId: member.id,
      error: "READONLY replica",
    });
    expect(logger.error).toHaveBeenCalledTimes(4);
  });
});
