/**
 * Postgres Data Store
 *
 * The DataStore backed by PostgreSQL through Drizzle ORM. Relational rules
 * (unique keys, foreign keys, cascades) are enforced by the schema that
 * migrate.ts creates; this module translates their violations into
 * ConstraintViolationError so the Action Bus reports them as validation
 * failures.
 *
 * Every list is ordered by created_time, then id.
 */

import { and, asc, count, eq, inArray, or } from "drizzle-orm";
import {
  ConstraintViolationError,
  type CommentRepository,
  type ContributorRepository,
  type DataStore,
  type IssueRepository,
  type Paged,
  type ProjectRepository,
  type UserRepository,
} from "@issuedesk/contracts";
import type { Database } from "./connection.js";
import { comments, contributors, issues, projects, users } from "./schema.js";

// ---------------------------------------------------------------------------
// Constraint violations
// ---------------------------------------------------------------------------

const UNIQUE_VIOLATION = "23505";
const FOREIGN_KEY_VIOLATION = "23503";

const CONSTRAINT_MESSAGES: Record<string, string> = {
  users_username_key: "A user with that username already exists.",
  users_email_key: "A user with that email already exists.",
  contributors_user_project_key: "This user is already a contributor to the project.",
  projects_author_id_fkey: "The author does not exist.",
  contributors_user_id_fkey: "The user does not exist.",
  contributors_project_id_fkey: "The project does not exist.",
  issues_project_id_fkey: "The project does not exist.",
  issues_author_id_fkey: "The author does not exist.",
  issues_assignee_id_fkey: "The assignee does not exist.",
  comments_issue_id_fkey: "The issue does not exist.",
  comments_author_id_fkey: "The author does not exist.",
};

/**
 * Finds the postgres.js error behind a failed query. Drizzle may wrap
 * it, so the cause chain is walked a few levels.
 */
function postgresErrorOf(error: unknown): { code: string; constraint: string } | null {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    const code = Reflect.get(current, "code");
    const constraint = Reflect.get(current, "constraint_name");
    if (typeof code === "string" && typeof constraint === "string") {
      return { code, constraint };
    }
    current = current.cause;
  }
  return null;
}

/** Rethrows unique and foreign key violations as ConstraintViolationError */
export function translateConstraintError(error: unknown): never {
  const pgError = postgresErrorOf(error);
  if (
    pgError &&
    (pgError.code === UNIQUE_VIOLATION || pgError.code === FOREIGN_KEY_VIOLATION)
  ) {
    throw new ConstraintViolationError(
      pgError.constraint,
      CONSTRAINT_MESSAGES[pgError.constraint] ?? "The request conflicts with existing data."
    );
  }
  throw error;
}

async function guarded<T>(query: Promise<T>): Promise<T> {
  try {
    return await query;
  } catch (error) {
    return translateConstraintError(error);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Ids that are not UUIDs can match no row; the uuid column would reject them */
function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

async function paged<T>(
  items: Promise<T[]>,
  total: Promise<{ total: number }[]>
): Promise<Paged<T>> {
  const [rows, [counted]] = await Promise.all([items, total]);
  return { total: counted?.total ?? 0, items: rows };
}

/** Drops keys whose value is undefined so a patch never blanks a column */
function definedOnly<T extends object>(patch: T): Partial<T> {
  const result: Partial<T> = {};
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) Reflect.set(result, key, value);
  }
  return result;
}

function first<T>(rows: T[]): T | null {
  return rows.length > 0 ? rows[0] : null;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class PostgresDataStore implements DataStore {
  readonly users: UserRepository;
  readonly projects: ProjectRepository;
  readonly contributors: ContributorRepository;
  readonly issues: IssueRepository;
  readonly comments: CommentRepository;

  constructor(private readonly db: Database) {
    this.users = this.createUserRepository();
    this.projects = this.createProjectRepository();
    this.contributors = this.createContributorRepository();
    this.issues = this.createIssueRepository();
    this.comments = this.createCommentRepository();
  }

  /** Ids of projects the user authored or contributes to, as a subquery */
  private memberProjectIds(userId: string) {
    return this.db
      .select({ id: projects.id })
      .from(projects)
      .where(
        or(
          eq(projects.authorId, userId),
          inArray(
            projects.id,
            this.db
              .select({ id: contributors.projectId })
              .from(contributors)
              .where(eq(contributors.userId, userId))
          )
        )
      );
  }

  private createUserRepository(): UserRepository {
    const db = this.db;

    const findUser = async (id: string) =>
      isUuid(id) ? first(await db.select().from(users).where(eq(users.id, id)).limit(1)) : null;

    return {
      findById: findUser,
      async findByIds(ids) {
        const valid = ids.filter(isUuid);
        if (valid.length === 0) return [];
        return db.select().from(users).where(inArray(users.id, valid));
      },
      async findByEmail(email) {
        return first(
          await db
            .select()
            .from(users)
            .where(eq(users.email, email))
            .orderBy(asc(users.createdTime), asc(users.id))
            .limit(1)
        );
      },
      async list(page) {
        return paged(
          db
            .select()
            .from(users)
            .orderBy(asc(users.createdTime), asc(users.id))
            .limit(page.limit)
            .offset(page.offset),
          db.select({ total: count() }).from(users)
        );
      },
      async create(data) {
        const rows = await guarded(db.insert(users).values(data).returning());
        return rows[0];
      },
      async update(id, patch) {
        if (!isUuid(id)) return null;
        const values = definedOnly(patch);
        if (Object.keys(values).length === 0) return findUser(id);
        return first(
          await guarded(db.update(users).set(values).where(eq(users.id, id)).returning())
        );
      },
      async delete(id) {
        if (!isUuid(id)) return false;
        const rows = await db.delete(users).where(eq(users.id, id)).returning({ id: users.id });
        return rows.length > 0;
      },
    };
  }

  private createProjectRepository(): ProjectRepository {
    const db = this.db;
    const memberProjectIds = (userId: string) => this.memberProjectIds(userId);

    const findProject = async (id: string) =>
      isUuid(id) ? first(await db.select().from(projects).where(eq(projects.id, id)).limit(1)) : null;

    return {
      findById: findProject,
      async listForMember(userId, page) {
        if (!isUuid(userId)) return { total: 0, items: [] };
        const where = inArray(projects.id, memberProjectIds(userId));
        return paged(
          db
            .select()
            .from(projects)
            .where(where)
            .orderBy(asc(projects.createdTime), asc(projects.id))
            .limit(page.limit)
            .offset(page.offset),
          db.select({ total: count() }).from(projects).where(where)
        );
      },
      async listIdsForMember(userId) {
        if (!isUuid(userId)) return [];
        const rows = await db
          .select({ id: projects.id })
          .from(projects)
          .where(inArray(projects.id, memberProjectIds(userId)))
          .orderBy(asc(projects.createdTime), asc(projects.id));
        return rows.map((row) => row.id);
      },
      async create(data) {
        return guarded(
          db.transaction(async (tx) => {
            const [project] = await tx.insert(projects).values(data).returning();
            await tx.insert(contributors).values({ userId: data.authorId, projectId: project.id });
            return project;
          })
        );
      },
      async update(id, patch) {
        if (!isUuid(id)) return null;
        const values = definedOnly(patch);
        if (Object.keys(values).length === 0) return findProject(id);
        return first(await db.update(projects).set(values).where(eq(projects.id, id)).returning());
      },
      async delete(id) {
        if (!isUuid(id)) return false;
        const rows = await db.delete(projects).where(eq(projects.id, id)).returning({ id: projects.id });
        return rows.length > 0;
      },
    };
  }

  private createContributorRepository(): ContributorRepository {
    const db = this.db;
    const byCreation = [asc(contributors.createdTime), asc(contributors.id)];

    return {
      async findById(id) {
        if (!isUuid(id)) return null;
        return first(await db.select().from(contributors).where(eq(contributors.id, id)).limit(1));
      },
      async exists(projectId, userId) {
        if (!isUuid(projectId) || !isUuid(userId)) return false;
        const rows = await db
          .select({ id: contributors.id })
          .from(contributors)
          .where(and(eq(contributors.projectId, projectId), eq(contributors.userId, userId)))
          .limit(1);
        return rows.length > 0;
      },
      async listUserIds(projectId) {
        if (!isUuid(projectId)) return [];
        const rows = await db
          .select({ userId: contributors.userId })
          .from(contributors)
          .where(eq(contributors.projectId, projectId))
          .orderBy(...byCreation);
        return rows.map((row) => row.userId);
      },
      async listByProject(projectId, page) {
        if (!isUuid(projectId)) return { total: 0, items: [] };
        const where = eq(contributors.projectId, projectId);
        return paged(
          db.select().from(contributors).where(where).orderBy(...byCreation).limit(page.limit).offset(page.offset),
          db.select({ total: count() }).from(contributors).where(where)
        );
      },
      async listForProjectAuthor(authorId, page) {
        if (!isUuid(authorId)) return { total: 0, items: [] };
        const where = inArray(
          contributors.projectId,
          db.select({ id: projects.id }).from(projects).where(eq(projects.authorId, authorId))
        );
        return paged(
          db.select().from(contributors).where(where).orderBy(...byCreation).limit(page.limit).offset(page.offset),
          db.select({ total: count() }).from(contributors).where(where)
        );
      },
      async create(data) {
        const rows = await guarded(db.insert(contributors).values(data).returning());
        return rows[0];
      },
      async delete(id) {
        if (!isUuid(id)) return false;
        const rows = await db
          .delete(contributors)
          .where(eq(contributors.id, id))
          .returning({ id: contributors.id });
        return rows.length > 0;
      },
    };
  }

  private createIssueRepository(): IssueRepository {
    const db = this.db;
    const memberProjectIds = (userId: string) => this.memberProjectIds(userId);
    const byCreation = [asc(issues.createdTime), asc(issues.id)];

    const findIssue = async (id: string) =>
      isUuid(id) ? first(await db.select().from(issues).where(eq(issues.id, id)).limit(1)) : null;

    return {
      findById: findIssue,
      async listForMember(userId, page) {
        if (!isUuid(userId)) return { total: 0, items: [] };
        const where = inArray(issues.projectId, memberProjectIds(userId));
        return paged(
          db.select().from(issues).where(where).orderBy(...byCreation).limit(page.limit).offset(page.offset),
          db.select({ total: count() }).from(issues).where(where)
        );
      },
      async listByProject(projectId, page) {
        if (!isUuid(projectId)) return { total: 0, items: [] };
        const where = eq(issues.projectId, projectId);
        return paged(
          db.select().from(issues).where(where).orderBy(...byCreation).limit(page.limit).offset(page.offset),
          db.select({ total: count() }).from(issues).where(where)
        );
      },
      async create(data) {
        const rows = await guarded(db.insert(issues).values(data).returning());
        return rows[0];
      },
      async update(id, patch) {
        if (!isUuid(id)) return null;
        const values = definedOnly(patch);
        if (Object.keys(values).length === 0) return findIssue(id);
        return first(
          await guarded(db.update(issues).set(values).where(eq(issues.id, id)).returning())
        );
      },
      async delete(id) {
        if (!isUuid(id)) return false;
        const rows = await db.delete(issues).where(eq(issues.id, id)).returning({ id: issues.id });
        return rows.length > 0;
      },
    };
  }

  private createCommentRepository(): CommentRepository {
    const db = this.db;
    const memberProjectIds = (userId: string) => this.memberProjectIds(userId);
    const byCreation = [asc(comments.createdTime), asc(comments.id)];

    const findComment = async (id: string) =>
      isUuid(id) ? first(await db.select().from(comments).where(eq(comments.id, id)).limit(1)) : null;

    return {
      findById: findComment,
      async listForMember(userId, page) {
        if (!isUuid(userId)) return { total: 0, items: [] };
        const where = inArray(
          comments.issueId,
          db
            .select({ id: issues.id })
            .from(issues)
            .where(inArray(issues.projectId, memberProjectIds(userId)))
        );
        return paged(
          db.select().from(comments).where(where).orderBy(...byCreation).limit(page.limit).offset(page.offset),
          db.select({ total: count() }).from(comments).where(where)
        );
      },
      async listByIssue(issueId, page) {
        if (!isUuid(issueId)) return { total: 0, items: [] };
        const where = eq(comments.issueId, issueId);
        return paged(
          db.select().from(comments).where(where).orderBy(...byCreation).limit(page.limit).offset(page.offset),
          db.select({ total: count() }).from(comments).where(where)
        );
      },
      async create(data) {
        const rows = await guarded(db.insert(comments).values(data).returning());
        return rows[0];
      },
      async update(id, patch) {
        if (!isUuid(id)) return null;
        const values = definedOnly(patch);
        if (Object.keys(values).length === 0) return findComment(id);
        return first(await db.update(comments).set(values).where(eq(comments.id, id)).returning());
      },
      async delete(id) {
        if (!isUuid(id)) return false;
        const rows = await db.delete(comments).where(eq(comments.id, id)).returning({ id: comments.id });
        return rows.length > 0;
      },
    };
  }
}
