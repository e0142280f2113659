/**
 * In-Memory Data Store
 *
 * A DataStore that keeps every row in process memory. Used when no
 * DATABASE_URL is configured (local development) and by the test suites.
 *
 * Enforces the same relational rules as the Postgres schema: unique
 * usernames and contributor pairs, foreign keys, cascading deletes and
 * the author's contributor row created with every project.
 */

import { randomUUID } from "node:crypto";
import {
  ConstraintViolationError,
  type Comment,
  type CommentPatch,
  type CommentRepository,
  type Contributor,
  type ContributorRepository,
  type DataStore,
  type Issue,
  type IssuePatch,
  type IssueRepository,
  type NewComment,
  type NewContributor,
  type NewIssue,
  type NewProject,
  type NewUser,
  type PageRequest,
  type Paged,
  type Project,
  type ProjectPatch,
  type ProjectRepository,
  type User,
  type UserPatch,
  type UserRepository,
} from "@issuedesk/contracts";

export interface MemoryDataStoreOptions {
  /** Clock for createdTime. Defaults to the system clock. */
  now?: () => Date;
  generateId?: () => string;
}

interface Row {
  id: string;
  createdTime: Date;
}

/** Ordering shared with the SQL store: createdTime, then id */
function byCreation(a: Row, b: Row): number {
  const diff = a.createdTime.getTime() - b.createdTime.getTime();
  if (diff !== 0) return diff;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function paginate<T extends Row>(rows: Iterable<T>, page: PageRequest): Paged<T> {
  const sorted = Array.from(rows).sort(byCreation);
  return {
    total: sorted.length,
    items: sorted.slice(page.offset, page.offset + page.limit).map((row) => ({ ...row })),
  };
}

/** Drops keys whose value is undefined so a patch never blanks a column */
function compact<T extends object>(patch: T): T {
  const result = { ...patch };
  for (const key of Object.keys(result)) {
    if (Reflect.get(result, key) === undefined) {
      Reflect.deleteProperty(result, key);
    }
  }
  return result;
}

export class MemoryDataStore implements DataStore {
  private readonly userRows = new Map<string, User>();
  private readonly projectRows = new Map<string, Project>();
  private readonly contributorRows = new Map<string, Contributor>();
  private readonly issueRows = new Map<string, Issue>();
  private readonly commentRows = new Map<string, Comment>();

  private readonly clock: () => Date;
  private readonly generateId: () => string;
  private lastTimestamp = 0;

  readonly users: UserRepository;
  readonly projects: ProjectRepository;
  readonly contributors: ContributorRepository;
  readonly issues: IssueRepository;
  readonly comments: CommentRepository;

  constructor(options: MemoryDataStoreOptions = {}) {
    this.clock = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;

    this.users = this.createUserRepository();
    this.projects = this.createProjectRepository();
    this.contributors = this.createContributorRepository();
    this.issues = this.createIssueRepository();
    this.comments = this.createCommentRepository();
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  /** Rows created in the same millisecond keep their insertion order */
  private timestamp(): Date {
    const now = this.clock().getTime();
    this.lastTimestamp = Math.max(now, this.lastTimestamp + 1);
    return new Date(this.lastTimestamp);
  }

  private isMember(projectId: string, userId: string): boolean {
    const project = this.projectRows.get(projectId);
    if (!project) return false;
    if (project.authorId === userId) return true;
    for (const row of this.contributorRows.values()) {
      if (row.projectId === projectId && row.userId === userId) return true;
    }
    return false;
  }

  private requireUser(id: string, constraint: string): void {
    if (!this.userRows.has(id)) {
      throw new ConstraintViolationError(constraint, `User "${id}" does not exist.`);
    }
  }

  private requireProject(id: string, constraint: string): void {
    if (!this.projectRows.has(id)) {
      throw new ConstraintViolationError(constraint, `Project "${id}" does not exist.`);
    }
  }

  private requireIssue(id: string, constraint: string): void {
    if (!this.issueRows.has(id)) {
      throw new ConstraintViolationError(constraint, `Issue "${id}" does not exist.`);
    }
  }

  private insertContributor(data: NewContributor): Contributor {
    for (const row of this.contributorRows.values()) {
      if (row.projectId === data.projectId && row.userId === data.userId) {
        throw new ConstraintViolationError(
          "contributors_user_project_key",
          "This user is already a contributor to the project."
        );
      }
    }
    const contributor: Contributor = {
      id: this.generateId(),
      userId: data.userId,
      projectId: data.projectId,
      createdTime: this.timestamp(),
    };
    this.contributorRows.set(contributor.id, contributor);
    return { ...contributor };
  }

  private deleteComment(id: string): boolean {
    return this.commentRows.delete(id);
  }

  private deleteIssue(id: string): boolean {
    if (!this.issueRows.delete(id)) return false;
    for (const comment of Array.from(this.commentRows.values())) {
      if (comment.issueId === id) this.deleteComment(comment.id);
    }
    return true;
  }

  private deleteProject(id: string): boolean {
    if (!this.projectRows.delete(id)) return false;
    for (const contributor of Array.from(this.contributorRows.values())) {
      if (contributor.projectId === id) this.contributorRows.delete(contributor.id);
    }
    for (const issue of Array.from(this.issueRows.values())) {
      if (issue.projectId === id) this.deleteIssue(issue.id);
    }
    return true;
  }

  private deleteUser(id: string): boolean {
    if (!this.userRows.delete(id)) return false;
    for (const project of Array.from(this.projectRows.values())) {
      if (project.authorId === id) this.deleteProject(project.id);
    }
    for (const issue of Array.from(this.issueRows.values())) {
      if (issue.authorId === id) {
        this.deleteIssue(issue.id);
      } else if (issue.assigneeId === id) {
        this.issueRows.set(issue.id, { ...issue, assigneeId: null });
      }
    }
    for (const comment of Array.from(this.commentRows.values())) {
      if (comment.authorId === id) this.deleteComment(comment.id);
    }
    for (const contributor of Array.from(this.contributorRows.values())) {
      if (contributor.userId === id) this.contributorRows.delete(contributor.id);
    }
    return true;
  }

  private findCopy<T extends Row>(rows: Map<string, T>, id: string): T | null {
    const row = rows.get(id);
    return row ? { ...row } : null;
  }

  // -------------------------------------------------------------------------
  // Repositories
  // -------------------------------------------------------------------------

  private createUserRepository(): UserRepository {
    const rows = this.userRows;

    const assertUniqueUsername = (username: string, exceptId?: string) => {
      for (const row of rows.values()) {
        if (row.username === username && row.id !== exceptId) {
          throw new ConstraintViolationError(
            "users_username_key",
            "A user with that username already exists."
          );
        }
      }
    };

    const assertUniqueEmail = (email: string, exceptId?: string) => {
      for (const row of rows.values()) {
        if (row.email === email && row.id !== exceptId) {
          throw new ConstraintViolationError(
            "users_email_key",
            "A user with that email already exists."
          );
        }
      }
    };

    return {
      findById: async (id) => this.findCopy(rows, id),
      findByIds: async (ids) =>
        ids.flatMap((id) => {
          const row = rows.get(id);
          return row ? [{ ...row }] : [];
        }),
      findByEmail: async (email) => {
        for (const row of rows.values()) {
          if (row.email === email) return { ...row };
        }
        return null;
      },
      list: async (page) => paginate(rows.values(), page),
      create: async (data: NewUser) => {
        assertUniqueUsername(data.username);
        assertUniqueEmail(data.email);
        const user: User = {
          id: this.generateId(),
          username: data.username,
          email: data.email,
          age: data.age ?? null,
          canBeContacted: data.canBeContacted ?? false,
          canDataBeShared: data.canDataBeShared ?? false,
          createdTime: this.timestamp(),
        };
        rows.set(user.id, user);
        return { ...user };
      },
      update: async (id: string, patch: UserPatch) => {
        const existing = rows.get(id);
        if (!existing) return null;
        if (patch.username !== undefined) assertUniqueUsername(patch.username, id);
        if (patch.email !== undefined) assertUniqueEmail(patch.email, id);
        const updated = { ...existing, ...compact(patch) };
        rows.set(id, updated);
        return { ...updated };
      },
      delete: async (id) => this.deleteUser(id),
    };
  }

  private createProjectRepository(): ProjectRepository {
    const rows = this.projectRows;

    return {
      findById: async (id) => this.findCopy(rows, id),
      listForMember: async (userId, page) =>
        paginate(
          Array.from(rows.values()).filter((row) => this.isMember(row.id, userId)),
          page
        ),
      listIdsForMember: async (userId) =>
        Array.from(rows.values())
          .filter((row) => this.isMember(row.id, userId))
          .sort(byCreation)
          .map((row) => row.id),
      create: async (data: NewProject) => {
        this.requireUser(data.authorId, "projects_author_id_fkey");
        const project: Project = {
          id: this.generateId(),
          title: data.title,
          description: data.description,
          type: data.type,
          authorId: data.authorId,
          createdTime: this.timestamp(),
        };
        rows.set(project.id, project);
        this.insertContributor({ userId: data.authorId, projectId: project.id });
        return { ...project };
      },
      update: async (id: string, patch: ProjectPatch) => {
        const existing = rows.get(id);
        if (!existing) return null;
        const updated = { ...existing, ...compact(patch) };
        rows.set(id, updated);
        return { ...updated };
      },
      delete: async (id) => this.deleteProject(id),
    };
  }

  private createContributorRepository(): ContributorRepository {
    const rows = this.contributorRows;

    return {
      findById: async (id) => this.findCopy(rows, id),
      exists: async (projectId, userId) => {
        for (const row of rows.values()) {
          if (row.projectId === projectId && row.userId === userId) return true;
        }
        return false;
      },
      listUserIds: async (projectId) =>
        Array.from(rows.values())
          .filter((row) => row.projectId === projectId)
          .sort(byCreation)
          .map((row) => row.userId),
      listByProject: async (projectId, page) =>
        paginate(
          Array.from(rows.values()).filter((row) => row.projectId === projectId),
          page
        ),
      listForProjectAuthor: async (authorId, page) =>
        paginate(
          Array.from(rows.values()).filter(
            (row) => this.projectRows.get(row.projectId)?.authorId === authorId
          ),
          page
        ),
      create: async (data: NewContributor) => {
        this.requireUser(data.userId, "contributors_user_id_fkey");
        this.requireProject(data.projectId, "contributors_project_id_fkey");
        return this.insertContributor(data);
      },
      delete: async (id) => rows.delete(id),
    };
  }

  private createIssueRepository(): IssueRepository {
    const rows = this.issueRows;

    return {
      findById: async (id) => this.findCopy(rows, id),
      listForMember: async (userId, page) =>
        paginate(
          Array.from(rows.values()).filter((row) => this.isMember(row.projectId, userId)),
          page
        ),
      listByProject: async (projectId, page) =>
        paginate(
          Array.from(rows.values()).filter((row) => row.projectId === projectId),
          page
        ),
      create: async (data: NewIssue) => {
        this.requireProject(data.projectId, "issues_project_id_fkey");
        this.requireUser(data.authorId, "issues_author_id_fkey");
        if (data.assigneeId) this.requireUser(data.assigneeId, "issues_assignee_id_fkey");
        const issue: Issue = {
          id: this.generateId(),
          title: data.title,
          description: data.description,
          priority: data.priority,
          tag: data.tag,
          status: data.status ?? "TODO",
          projectId: data.projectId,
          authorId: data.authorId,
          assigneeId: data.assigneeId ?? null,
          createdTime: this.timestamp(),
        };
        rows.set(issue.id, issue);
        return { ...issue };
      },
      update: async (id: string, patch: IssuePatch) => {
        const existing = rows.get(id);
        if (!existing) return null;
        if (patch.assigneeId) this.requireUser(patch.assigneeId, "issues_assignee_id_fkey");
        const updated = { ...existing, ...compact(patch) };
        rows.set(id, updated);
        return { ...updated };
      },
      delete: async (id) => this.deleteIssue(id),
    };
  }

  private createCommentRepository(): CommentRepository {
    const rows = this.commentRows;

    const projectOf = (comment: Comment) => this.issueRows.get(comment.issueId)?.projectId;

    return {
      findById: async (id) => this.findCopy(rows, id),
      listForMember: async (userId, page) =>
        paginate(
          Array.from(rows.values()).filter((row) => {
            const projectId = projectOf(row);
            return projectId !== undefined && this.isMember(projectId, userId);
          }),
          page
        ),
      listByIssue: async (issueId, page) =>
        paginate(
          Array.from(rows.values()).filter((row) => row.issueId === issueId),
          page
        ),
      create: async (data: NewComment) => {
        this.requireIssue(data.issueId, "comments_issue_id_fkey");
        this.requireUser(data.authorId, "comments_author_id_fkey");
        const comment: Comment = {
          id: this.generateId(),
          description: data.description,
          issueId: data.issueId,
          authorId: data.authorId,
          createdTime: this.timestamp(),
        };
        rows.set(comment.id, comment);
        return { ...comment };
      },
      update: async (id: string, patch: CommentPatch) => {
        const existing = rows.get(id);
        if (!existing) return null;
        const updated = { ...existing, ...compact(patch) };
        rows.set(id, updated);
        return { ...updated };
      },
      delete: async (id) => this.deleteComment(id),
    };
  }
}
