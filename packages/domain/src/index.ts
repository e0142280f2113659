/**
 * @issuedesk/domain
 *
 * Exports every action IssueDesk serves, plus seed data.
 * The API server imports this to register everything with the platform.
 */

import type { AnyActionDefinition } from "@issuedesk/contracts";
import { userActions } from "./resources/user/user.actions.js";
import { projectActions } from "./resources/project/project.actions.js";
import { contributorActions } from "./resources/contributor/contributor.actions.js";
import { issueActions } from "./resources/issue/issue.actions.js";
import { commentActions } from "./resources/comment/comment.actions.js";

export { userActions, projectActions, contributorActions, issueActions, commentActions };
export { seedData, type SeedData } from "./seed.js";
export type { Page } from "./shared/paging.js";
export type {
  UserRef,
  UserView,
  ProjectView,
  ContributorView,
  IssueView,
  CommentView,
} from "./shared/serializers.js";

/** Every action, grouped by resource */
export const actions: AnyActionDefinition[] = [
  ...userActions,
  ...projectActions,
  ...contributorActions,
  ...issueActions,
  ...commentActions,
];
