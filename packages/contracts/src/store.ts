/**
 * Data Store
 *
 * The persistence boundary. The platform provides the concrete
 * implementations (Postgres via Drizzle, and an in-memory store);
 * actions and permission predicates only ever see these interfaces.
 *
 * Every implementation must enforce the same relational rules:
 *   - username is unique
 *   - (userId, projectId) is unique for contributors
 *   - creating a project also creates the author's contributor row
 *   - Project → {Contributor, Issue} → Comment deletes cascade
 *   - deleting a user cascades to what they authored and nulls assignees
 */

import type {
  Comment,
  Contributor,
  Issue,
  IssuePriority,
  IssueStatus,
  IssueTag,
  Project,
  ProjectType,
  User,
} from "./entity.js";

// ---------------------------------------------------------------------------
// Paging
// ---------------------------------------------------------------------------

export interface PageRequest {
  limit: number;
  offset: number;
}

/** One page of rows plus the total number of matching rows */
export interface Paged<T> {
  total: number;
  items: T[];
}

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface NewUser {
  username: string;
  email: string;
  age?: number | null;
  canBeContacted?: boolean;
  canDataBeShared?: boolean;
}

export type UserPatch = Partial<NewUser>;

export interface NewProject {
  title: string;
  description: string;
  type: ProjectType;
  authorId: string;
}

export type ProjectPatch = Partial<Omit<NewProject, "authorId">>;

export interface NewContributor {
  userId: string;
  projectId: string;
}

export interface NewIssue {
  title: string;
  description: string;
  priority: IssuePriority;
  tag: IssueTag;
  status?: IssueStatus;
  projectId: string;
  authorId: string;
  assigneeId?: string | null;
}

/** Project and author are fixed at creation */
export type IssuePatch = Partial<Omit<NewIssue, "projectId" | "authorId">>;

export interface NewComment {
  description: string;
  issueId: string;
  authorId: string;
}

/** Issue and author are fixed at creation */
export type CommentPatch = Partial<Pick<NewComment, "description">>;

// ---------------------------------------------------------------------------
// Repositories
// ---------------------------------------------------------------------------

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  findByIds(ids: readonly string[]): Promise<User[]>;
  findByEmail(email: string): Promise<User | null>;
  list(page: PageRequest): Promise<Paged<User>>;
  create(data: NewUser): Promise<User>;
  update(id: string, patch: UserPatch): Promise<User | null>;
  delete(id: string): Promise<boolean>;
}

export interface ProjectRepository {
  findById(id: string): Promise<Project | null>;
  /** Projects the user contributes to (authors are always contributors) */
  listForMember(userId: string, page: PageRequest): Promise<Paged<Project>>;
  /** Identifiers of every project the user authored or contributes to */
  listIdsForMember(userId: string): Promise<string[]>;
  /** Inserts the project and the author's contributor row atomically */
  create(data: NewProject): Promise<Project>;
  update(id: string, patch: ProjectPatch): Promise<Project | null>;
  delete(id: string): Promise<boolean>;
}

export interface ContributorRepository {
  findById(id: string): Promise<Contributor | null>;
  exists(projectId: string, userId: string): Promise<boolean>;
  listUserIds(projectId: string): Promise<string[]>;
  listByProject(projectId: string, page: PageRequest): Promise<Paged<Contributor>>;
  /** Contributors of every project the user authored */
  listForProjectAuthor(authorId: string, page: PageRequest): Promise<Paged<Contributor>>;
  create(data: NewContributor): Promise<Contributor>;
  delete(id: string): Promise<boolean>;
}

export interface IssueRepository {
  findById(id: string): Promise<Issue | null>;
  /** Issues of every project the user contributes to */
  listForMember(userId: string, page: PageRequest): Promise<Paged<Issue>>;
  listByProject(projectId: string, page: PageRequest): Promise<Paged<Issue>>;
  create(data: NewIssue): Promise<Issue>;
  update(id: string, patch: IssuePatch): Promise<Issue | null>;
  delete(id: string): Promise<boolean>;
}

export interface CommentRepository {
  findById(id: string): Promise<Comment | null>;
  /** Comments on issues of every project the user contributes to */
  listForMember(userId: string, page: PageRequest): Promise<Paged<Comment>>;
  listByIssue(issueId: string, page: PageRequest): Promise<Paged<Comment>>;
  create(data: NewComment): Promise<Comment>;
  update(id: string, patch: CommentPatch): Promise<Comment | null>;
  delete(id: string): Promise<boolean>;
}

export interface DataStore {
  readonly users: UserRepository;
  readonly projects: ProjectRepository;
  readonly contributors: ContributorRepository;
  readonly issues: IssueRepository;
  readonly comments: CommentRepository;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Raised by a data store when a write breaks a unique or foreign key rule.
 * The Action Bus reports it as a validation failure.
 */
export class ConstraintViolationError extends Error {
  public readonly constraint: string;

  constructor(constraint: string, message: string) {
    super(message);
    this.name = "ConstraintViolationError";
    this.constraint = constraint;
  }
}
