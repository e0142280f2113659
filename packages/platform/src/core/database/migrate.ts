/**
 * Migration Runner
 *
 * Creates the IssueDesk tables, their indexes and their constraints.
 * Idempotent: a table that already exists is left alone.
 *
 * Tables are created parents first so every foreign key has its target:
 *   users → projects → contributors → issues → comments
 *
 * Constraint names match schema.ts and the in-memory store, so a
 * violation reads the same whichever store raised it.
 */

import { createLogger } from "../action-bus/middleware/logging.js";
import { getDatabase } from "./connection.js";

const logger = createLogger("migrate");

/** The slice of the postgres.js client the runner needs */
export interface MigrationClient {
  unsafe(query: string, parameters?: string[]): Promise<readonly unknown[]>;
}

export interface TableMigration {
  name: string;
  create: string;
  indexes: string[];
}

export const TABLES: readonly TableMigration[] = [
  {
    name: "users",
    create: `
      CREATE TABLE users (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        username VARCHAR(150) NOT NULL,
        email VARCHAR(254) NOT NULL,
        age INTEGER CHECK (age IS NULL OR age >= 15),
        can_be_contacted BOOLEAN NOT NULL DEFAULT FALSE,
        can_data_be_shared BOOLEAN NOT NULL DEFAULT FALSE,
        created_time TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT users_username_key UNIQUE (username),
        CONSTRAINT users_email_key UNIQUE (email)
      )`,
    indexes: [],
  },
  {
    name: "projects",
    create: `
      CREATE TABLE projects (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        title VARCHAR(255) NOT NULL,
        description TEXT NOT NULL,
        type VARCHAR(16) NOT NULL CHECK (type IN ('BACKEND', 'FRONTEND', 'IOS', 'ANDROID')),
        author_id UUID NOT NULL,
        created_time TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT projects_author_id_fkey FOREIGN KEY (author_id)
          REFERENCES users(id) ON DELETE CASCADE
      )`,
    indexes: [`CREATE INDEX projects_author_idx ON projects(author_id)`],
  },
  {
    name: "contributors",
    create: `
      CREATE TABLE contributors (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        user_id UUID NOT NULL,
        project_id UUID NOT NULL,
        created_time TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT contributors_user_project_key UNIQUE (user_id, project_id),
        CONSTRAINT contributors_user_id_fkey FOREIGN KEY (user_id)
          REFERENCES users(id) ON DELETE CASCADE,
        CONSTRAINT contributors_project_id_fkey FOREIGN KEY (project_id)
          REFERENCES projects(id) ON DELETE CASCADE
      )`,
    indexes: [`CREATE INDEX contributors_project_idx ON contributors(project_id, created_time)`],
  },
  {
    name: "issues",
    create: `
      CREATE TABLE issues (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        title VARCHAR(255) NOT NULL,
        description TEXT NOT NULL,
        priority VARCHAR(16) NOT NULL CHECK (priority IN ('LOW', 'MEDIUM', 'HIGH')),
        tag VARCHAR(16) NOT NULL CHECK (tag IN ('BUG', 'FEATURE', 'TASK')),
        status VARCHAR(16) NOT NULL DEFAULT 'TODO'
          CHECK (status IN ('TODO', 'IN_PROGRESS', 'FINISHED')),
        project_id UUID NOT NULL,
        author_id UUID NOT NULL,
        assignee_id UUID,
        created_time TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT issues_project_id_fkey FOREIGN KEY (project_id)
          REFERENCES projects(id) ON DELETE CASCADE,
        CONSTRAINT issues_author_id_fkey FOREIGN KEY (author_id)
          REFERENCES users(id) ON DELETE CASCADE,
        CONSTRAINT issues_assignee_id_fkey FOREIGN KEY (assignee_id)
          REFERENCES users(id) ON DELETE SET NULL
      )`,
    indexes: [`CREATE INDEX issues_project_idx ON issues(project_id, created_time)`],
  },
  {
    name: "comments",
    create: `
      CREATE TABLE comments (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        description TEXT NOT NULL,
        issue_id UUID NOT NULL,
        author_id UUID NOT NULL,
        created_time TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT comments_issue_id_fkey FOREIGN KEY (issue_id)
          REFERENCES issues(id) ON DELETE CASCADE,
        CONSTRAINT comments_author_id_fkey FOREIGN KEY (author_id)
          REFERENCES users(id) ON DELETE CASCADE
      )`,
    indexes: [`CREATE INDEX comments_issue_idx ON comments(issue_id, created_time)`],
  },
];

/**
 * Checks if a table exists in the public schema.
 */
async function tableExists(client: MigrationClient, tableName: string): Promise<boolean> {
  const rows = await client.unsafe(
    `SELECT 1 FROM information_schema.tables WHERE table_schema = 'public' AND table_name = $1 LIMIT 1`,
    [tableName]
  );
  return rows.length > 0;
}

/**
 * Creates every missing table with its indexes.
 *
 * @returns the names of the tables this run created
 */
export async function runMigrations(
  client: MigrationClient = getDatabase().sql
): Promise<string[]> {
  const created: string[] = [];

  for (const table of TABLES) {
    if (await tableExists(client, table.name)) {
      continue;
    }

    await client.unsafe(table.create);
    for (const statement of table.indexes) {
      await client.unsafe(statement);
    }

    created.push(table.name);
    logger.info("Created table", { table: table.name });
  }

  if (created.length === 0) {
    logger.debug("Schema is up to date");
  }

  return created;
}
