/**
 * Authorization Engine
 *
 * Maps the permission rules actions declare onto the predicates that
 * implement them.
 */

import type {
  PermissionPredicate,
  PermissionRule,
  PredicateName,
} from "@issuedesk/contracts";
import {
  contributorGated,
  isAuthenticated,
  objectOnly,
  projectAuthorGated,
  resourceAuthorOrReadOnly,
  selfOrCreate,
} from "./predicates.js";

const PREDICATES: Record<PredicateName, PermissionPredicate> = {
  authenticated: isAuthenticated,
  "self-or-create": selfOrCreate,
  "project-author-gated": projectAuthorGated,
  "contributor-gated": contributorGated,
  "resource-author-or-read-only": resourceAuthorOrReadOnly,
};

export function getPredicate(name: PredicateName): PermissionPredicate {
  return PREDICATES[name];
}

/** Turns an action's rules into the predicates to evaluate, in order */
export function resolvePolicy(rules: readonly PermissionRule[]): PermissionPredicate[] {
  return rules.map((rule) => {
    const predicate = getPredicate(rule.predicate);
    return rule.objectOnly ? objectOnly(predicate) : predicate;
  });
}

export {
  contributorGated,
  isAuthenticated,
  objectOnly,
  projectAuthorGated,
  resourceAuthorOrReadOnly,
  selfOrCreate,
} from "./predicates.js";
export {
  isProjectMember,
  projectAudience,
  resolveOwningProject,
} from "./resolve-project.js";
