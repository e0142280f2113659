/**
 * Cache Keys
 *
 * Every cached list page is keyed by list, actor, page and the actor's
 * current version of that list:
 *
 *   issues_user_<actor>_version             the version counter
 *   issues_user_<actor>_page_2_v7           page 2 at version 7
 *   issues_project_<id>_user_<actor>_page_1_v7   a project-scoped page
 *
 * Bumping the counter orphans every page built under the old version;
 * orphans expire through their TTL.
 */

import type { CachedList } from "@issuedesk/contracts";

export function versionKey(list: CachedList, actorId: string): string {
  return `${list}_user_${actorId}_version`;
}

export function pageKey(
  list: CachedList,
  actorId: string,
  page: number,
  version: number,
  scope?: string
): string {
  const prefix = scope ? `${list}_${scope}` : list;
  return `${prefix}_user_${actorId}_page_${page}_v${version}`;
}

/** Parses a stored version counter. Anything unreadable counts as 0. */
export function parseVersion(raw: string | undefined): number {
  if (raw === undefined) return 0;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value >= 0 ? value : 0;
}
