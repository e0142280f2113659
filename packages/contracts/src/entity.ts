/**
 * Entity Model
 *
 * The five business objects IssueDesk manages and the tagged resource
 * variant they travel in through the platform.
 *
 * Entities carry foreign keys as plain identifiers (authorId, projectId).
 * Anything that needs the related object resolves it through the DataStore.
 */

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const PROJECT_TYPES = ["BACKEND", "FRONTEND", "IOS", "ANDROID"] as const;
export type ProjectType = (typeof PROJECT_TYPES)[number];

export const ISSUE_PRIORITIES = ["LOW", "MEDIUM", "HIGH"] as const;
export type IssuePriority = (typeof ISSUE_PRIORITIES)[number];

export const ISSUE_TAGS = ["BUG", "FEATURE", "TASK"] as const;
export type IssueTag = (typeof ISSUE_TAGS)[number];

export const ISSUE_STATUSES = ["TODO", "IN_PROGRESS", "FINISHED"] as const;
export type IssueStatus = (typeof ISSUE_STATUSES)[number];

/** Youngest age a user may declare */
export const MINIMUM_USER_AGE = 15;

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------

export interface User {
  id: string;
  username: string;
  email: string;
  /** Optional; when present it is at least MINIMUM_USER_AGE */
  age: number | null;
  canBeContacted: boolean;
  canDataBeShared: boolean;
  createdTime: Date;
}

export interface Project {
  id: string;
  title: string;
  description: string;
  type: ProjectType;
  authorId: string;
  createdTime: Date;
}

/** Membership of a user in a project. (userId, projectId) is unique. */
export interface Contributor {
  id: string;
  userId: string;
  projectId: string;
  createdTime: Date;
}

export interface Issue {
  id: string;
  title: string;
  description: string;
  priority: IssuePriority;
  tag: IssueTag;
  status: IssueStatus;
  projectId: string;
  authorId: string;
  assigneeId: string | null;
  createdTime: Date;
}

export interface Comment {
  id: string;
  description: string;
  issueId: string;
  authorId: string;
  createdTime: Date;
}

// ---------------------------------------------------------------------------
// Resources
// ---------------------------------------------------------------------------

/**
 * An entity tagged with its type. Permission predicates and cache
 * invalidation switch on `type` instead of probing the entity's shape.
 */
export type Resource =
  | { type: "user"; entity: User }
  | { type: "project"; entity: Project }
  | { type: "contributor"; entity: Contributor }
  | { type: "issue"; entity: Issue }
  | { type: "comment"; entity: Comment };

export type ResourceType = Resource["type"];

export type ResourceOf<T extends ResourceType> = Extract<Resource, { type: T }>;

export const RESOURCE_TYPES: readonly ResourceType[] = [
  "user",
  "project",
  "contributor",
  "issue",
  "comment",
];

/** URL segment for each resource type */
export const RESOURCE_PLURALS: Record<ResourceType, string> = {
  user: "users",
  project: "projects",
  contributor: "contributors",
  issue: "issues",
  comment: "comments",
};

/**
 * List endpoints served through the versioned cache.
 * The users list is always computed live.
 */
export const CACHED_LISTS = ["projects", "contributors", "issues", "comments"] as const;
export type CachedList = (typeof CACHED_LISTS)[number];

/** Returns the identifier of the user who authored the resource, if it has one */
export function authorIdOf(resource: Resource): string | null {
  switch (resource.type) {
    case "project":
    case "issue":
    case "comment":
      return resource.entity.authorId;
    case "user":
    case "contributor":
      return null;
  }
}
