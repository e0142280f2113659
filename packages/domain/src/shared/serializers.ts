/**
 * Response Shaping
 *
 * Turns entities into the JSON payloads the API returns. Timestamps are
 * ISO-8601 strings, so a list page read back from the cache is the same
 * value the live query produced.
 */

import type {
  Comment,
  Contributor,
  DataStore,
  Issue,
  IssuePriority,
  IssueStatus,
  IssueTag,
  Project,
  ProjectType,
  User,
} from "@issuedesk/contracts";

/** How a related user appears inside another resource */
export interface UserRef {
  id: string;
  username: string | null;
}

export interface UserView {
  id: string;
  username: string;
  email: string | null;
  age: number | null;
  canBeContacted: boolean;
  canDataBeShared: boolean;
  createdTime: string;
}

export interface ProjectView {
  id: string;
  title: string;
  description: string;
  type: ProjectType;
  author: UserRef;
  createdTime: string;
}

export interface ContributorView {
  id: string;
  user: UserRef;
  project: string;
  createdTime: string;
}

export interface IssueView {
  id: string;
  title: string;
  description: string;
  priority: IssuePriority;
  tag: IssueTag;
  status: IssueStatus;
  project: string;
  author: UserRef;
  assignee: UserRef | null;
  createdTime: string;
}

export interface CommentView {
  id: string;
  description: string;
  issue: string;
  author: UserRef;
  createdTime: string;
}

/** Looks up the users an entity list refers to, in one query */
export async function usersById(
  store: DataStore,
  ids: Iterable<string>
): Promise<Map<string, User>> {
  const unique = Array.from(new Set(ids));
  const users = unique.length > 0 ? await store.users.findByIds(unique) : [];
  return new Map(users.map((user) => [user.id, user]));
}

function userRef(users: Map<string, User>, id: string): UserRef {
  return { id, username: users.get(id)?.username ?? null };
}

/**
 * @param masked - withhold email and age (another user who does not share data)
 */
export function serializeUser(user: User, masked = false): UserView {
  return {
    id: user.id,
    username: user.username,
    email: masked ? null : user.email,
    age: masked ? null : user.age,
    canBeContacted: user.canBeContacted,
    canDataBeShared: user.canDataBeShared,
    createdTime: user.createdTime.toISOString(),
  };
}

export function serializeProject(project: Project, users: Map<string, User>): ProjectView {
  return {
    id: project.id,
    title: project.title,
    description: project.description,
    type: project.type,
    author: userRef(users, project.authorId),
    createdTime: project.createdTime.toISOString(),
  };
}

export function serializeContributor(contributor: Contributor, users: Map<string, User>): ContributorView {
  return {
    id: contributor.id,
    user: userRef(users, contributor.userId),
    project: contributor.projectId,
    createdTime: contributor.createdTime.toISOString(),
  };
}

export function serializeIssue(issue: Issue, users: Map<string, User>): IssueView {
  return {
    id: issue.id,
    title: issue.title,
    description: issue.description,
    priority: issue.priority,
    tag: issue.tag,
    status: issue.status,
    project: issue.projectId,
    author: userRef(users, issue.authorId),
    assignee: issue.assigneeId ? userRef(users, issue.assigneeId) : null,
    createdTime: issue.createdTime.toISOString(),
  };
}

export function serializeComment(comment: Comment, users: Map<string, User>): CommentView {
  return {
    id: comment.id,
    description: comment.description,
    issue: comment.issueId,
    author: userRef(users, comment.authorId),
    createdTime: comment.createdTime.toISOString(),
  };
}
