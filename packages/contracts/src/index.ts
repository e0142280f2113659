/**
 * @issuedesk/contracts
 *
 * Public API - the shared boundary between platform and domain.
 * Both sides import from this package. Neither imports from the other.
 */

// Entities
export type {
  User,
  Project,
  Contributor,
  Issue,
  Comment,
  ProjectType,
  IssuePriority,
  IssueTag,
  IssueStatus,
  Resource,
  ResourceType,
  ResourceOf,
  CachedList,
} from "./entity.js";
export {
  PROJECT_TYPES,
  ISSUE_PRIORITIES,
  ISSUE_TAGS,
  ISSUE_STATUSES,
  MINIMUM_USER_AGE,
  RESOURCE_TYPES,
  RESOURCE_PLURALS,
  CACHED_LISTS,
  authorIdOf,
} from "./entity.js";

// Request / action context
export type {
  Actor,
  ActionKind,
  PathParams,
  BodyReferences,
  RequestContext,
  Logger,
  ActionContext,
} from "./context.js";
export { SAFE_ACTIONS, isSafeAction } from "./context.js";

// Actions
export type { ActionDefinition, AnyActionDefinition } from "./action.js";
export { defineAction } from "./action.js";

// Permissions
export type {
  PermissionContext,
  PermissionPredicate,
  PermissionRule,
  PredicateName,
} from "./permission.js";
export { PREDICATE_NAMES, definePredicate } from "./permission.js";

// Persistence
export type {
  PageRequest,
  Paged,
  NewUser,
  UserPatch,
  NewProject,
  ProjectPatch,
  NewContributor,
  NewIssue,
  IssuePatch,
  NewComment,
  CommentPatch,
  UserRepository,
  ProjectRepository,
  ContributorRepository,
  IssueRepository,
  CommentRepository,
  DataStore,
} from "./store.js";
export { ConstraintViolationError } from "./store.js";

// Cache
export type { CacheStore, CacheSetOptions } from "./cache.js";

// Authentication
export type { AuthProvider, AuthResult } from "./auth.js";
