/**
 * Seed Script
 *
 * Populates the configured data store with demo data, going through the
 * Action Bus so every permission rule and cache bump applies.
 *
 * Usage: npm run db:seed
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import type { Actor } from "@issuedesk/contracts";
import { buildRequestContext, createLogger, dispatch, getAction } from "@issuedesk/platform";
import { seedData } from "@issuedesk/domain";
import { bootstrap } from "./bootstrap.js";

const logger = createLogger("seed");

async function seed() {
  const runtime = await bootstrap();

  /** Dispatches one action and returns the created object's id */
  const run = async (actionId: string, actor: Actor | null, body: Record<string, unknown>) => {
    const action = getAction(actionId);
    if (!action) throw new Error(`Action "${actionId}" is not registered`);

    const request = buildRequestContext(
      { actor, params: {}, body, query: {} },
      { action: action.kind, resource: action.resource }
    );
    const result = await dispatch(actionId, request, runtime.services);
    if (!result.success) {
      throw new Error(`${actionId} failed: ${result.error}`);
    }
    const { data } = result;
    if (typeof data === "object" && data !== null && "id" in data && typeof data.id === "string") {
      return data.id;
    }
    throw new Error(`${actionId} returned no id`);
  };

  const users = new Map<string, Actor>();
  for (const user of seedData.users) {
    const userId = await run("user.create", null, user);
    users.set(user.username, { userId, username: user.username });
  }

  const actor = (username: string): Actor => {
    const found = users.get(username);
    if (!found) throw new Error(`Seed data names unknown user "${username}"`);
    return found;
  };

  const projects = new Map<string, string>();
  for (const { author, contributors, ...project } of seedData.projects) {
    const projectId = await run("project.create", actor(author), project);
    projects.set(project.title, projectId);
    for (const username of contributors) {
      await run("contributor.create", actor(author), { user: actor(username).userId, project: projectId });
    }
  }

  const issues = new Map<string, string>();
  for (const { author, project, assignee, ...issue } of seedData.issues) {
    const issueId = await run("issue.create", actor(author), {
      ...issue,
      project: projects.get(project),
      assignee: assignee ? actor(assignee).userId : null,
    });
    issues.set(issue.title, issueId);
  }

  for (const { author, issue, description } of seedData.comments) {
    await run("comment.create", actor(author), { description, issue: issues.get(issue) });
  }

  logger.info("Seeded", {
    users: users.size,
    projects: projects.size,
    issues: issues.size,
    comments: seedData.comments.length,
  });

  await runtime.close();
}

seed().then(
  () => process.exit(0),
  (err) => {
    logger.error("Seed failed", { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  }
);
