/**
 * Database Schema
 *
 * Drizzle table definitions for the five IssueDesk tables. Column names
 * are snake_case in Postgres and camelCase in TypeScript, so a selected
 * row already has the shape of its contracts entity.
 *
 * The DDL that creates these tables lives in migrate.ts; constraint
 * names here and there must stay in sync with the memory store's.
 */

import {
  boolean,
  foreignKey,
  integer,
  pgTable,
  text,
  timestamp,
  unique,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import {
  ISSUE_PRIORITIES,
  ISSUE_STATUSES,
  ISSUE_TAGS,
  PROJECT_TYPES,
} from "@issuedesk/contracts";

const createdTime = () =>
  timestamp("created_time", { withTimezone: true, mode: "date" }).notNull().defaultNow();

export const users = pgTable(
  "users",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    username: varchar("username", { length: 150 }).notNull(),
    email: varchar("email", { length: 254 }).notNull(),
    age: integer("age"),
    canBeContacted: boolean("can_be_contacted").notNull().default(false),
    canDataBeShared: boolean("can_data_be_shared").notNull().default(false),
    createdTime: createdTime(),
  },
  (table) => ({
    usernameKey: unique("users_username_key").on(table.username),
    emailKey: unique("users_email_key").on(table.email),
  })
);

export const projects = pgTable(
  "projects",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    title: varchar("title", { length: 255 }).notNull(),
    description: text("description").notNull(),
    type: varchar("type", { length: 16, enum: PROJECT_TYPES }).notNull(),
    authorId: uuid("author_id").notNull(),
    createdTime: createdTime(),
  },
  (table) => ({
    authorFk: foreignKey({
      name: "projects_author_id_fkey",
      columns: [table.authorId],
      foreignColumns: [users.id],
    }).onDelete("cascade"),
  })
);

export const contributors = pgTable(
  "contributors",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    userId: uuid("user_id").notNull(),
    projectId: uuid("project_id").notNull(),
    createdTime: createdTime(),
  },
  (table) => ({
    userProjectKey: unique("contributors_user_project_key").on(table.userId, table.projectId),
    userFk: foreignKey({
      name: "contributors_user_id_fkey",
      columns: [table.userId],
      foreignColumns: [users.id],
    }).onDelete("cascade"),
    projectFk: foreignKey({
      name: "contributors_project_id_fkey",
      columns: [table.projectId],
      foreignColumns: [projects.id],
    }).onDelete("cascade"),
  })
);

export const issues = pgTable(
  "issues",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    title: varchar("title", { length: 255 }).notNull(),
    description: text("description").notNull(),
    priority: varchar("priority", { length: 16, enum: ISSUE_PRIORITIES }).notNull(),
    tag: varchar("tag", { length: 16, enum: ISSUE_TAGS }).notNull(),
    status: varchar("status", { length: 16, enum: ISSUE_STATUSES }).notNull().default("TODO"),
    projectId: uuid("project_id").notNull(),
    authorId: uuid("author_id").notNull(),
    assigneeId: uuid("assignee_id"),
    createdTime: createdTime(),
  },
  (table) => ({
    projectFk: foreignKey({
      name: "issues_project_id_fkey",
      columns: [table.projectId],
      foreignColumns: [projects.id],
    }).onDelete("cascade"),
    authorFk: foreignKey({
      name: "issues_author_id_fkey",
      columns: [table.authorId],
      foreignColumns: [users.id],
    }).onDelete("cascade"),
    assigneeFk: foreignKey({
      name: "issues_assignee_id_fkey",
      columns: [table.assigneeId],
      foreignColumns: [users.id],
    }).onDelete("set null"),
  })
);

export const comments = pgTable(
  "comments",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    description: text("description").notNull(),
    issueId: uuid("issue_id").notNull(),
    authorId: uuid("author_id").notNull(),
    createdTime: createdTime(),
  },
  (table) => ({
    issueFk: foreignKey({
      name: "comments_issue_id_fkey",
      columns: [table.issueId],
      foreignColumns: [issues.id],
    }).onDelete("cascade"),
    authorFk: foreignKey({
      name: "comments_author_id_fkey",
      columns: [table.authorId],
      foreignColumns: [users.id],
    }).onDelete("cascade"),
  })
);

export const schema = { users, projects, contributors, issues, comments };
