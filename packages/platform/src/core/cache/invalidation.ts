/**
 * Cache Invalidation
 *
 * After a successful mutation the Action Bus asks the invalidator who
 * could have seen the changed object in a cached list, then bumps every
 * cached list version of each of those actors.
 *
 * The audience of an object is its owning project's author plus every
 * contributor. For a user it is the audience of every project the user
 * belongs to, since usernames appear in cached payloads.
 *
 * Bumps are best-effort: a failed increment is logged and reported, and
 * the mutation still succeeds. A stale page then lives at most one TTL.
 */

import {
  CACHED_LISTS,
  type CachedList,
  type DataStore,
  type Logger,
  type Resource,
} from "@issuedesk/contracts";
import { projectAudience, resolveOwningProject } from "../authorization/resolve-project.js";
import type { ListCache } from "./list-cache.js";

export interface InvalidationFailure {
  list: CachedList;
  actorId: string;
  error: string;
}

export interface InvalidationReport {
  /** Actors whose lists were bumped, in no particular order */
  audience: string[];
  bumped: number;
  failed: InvalidationFailure[];
}

/**
 * Everyone whose cached lists may include the resource.
 * Reads the current state of the store, so call it before a delete
 * to see what the delete will remove.
 */
export async function collectAudience(
  resource: Resource,
  store: DataStore
): Promise<Set<string>> {
  if (resource.type === "user") {
    const audience = new Set<string>([resource.entity.id]);
    for (const projectId of await store.projects.listIdsForMember(resource.entity.id)) {
      const project = await store.projects.findById(projectId);
      if (!project) continue;
      for (const userId of await projectAudience(store, project)) {
        audience.add(userId);
      }
    }
    return audience;
  }

  const project = await resolveOwningProject(resource, store);
  return project ? projectAudience(store, project) : new Set<string>();
}

export class CacheInvalidator {
  constructor(
    private readonly listCache: ListCache,
    private readonly logger: Logger
  ) {}

  /** Bumps every cached list of every actor in the audience */
  async invalidate(audience: Iterable<string>): Promise<InvalidationReport> {
    const actors = Array.from(new Set(audience));
    const bumps = actors.flatMap((actorId) =>
      CACHED_LISTS.map((list) => ({ list, actorId }))
    );

    const results = await Promise.allSettled(
      bumps.map(({ list, actorId }) => this.listCache.bumpVersion(list, actorId))
    );

    const failed: InvalidationFailure[] = [];
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        const { list, actorId } = bumps[index];
        const error =
          result.reason instanceof Error ? result.reason.message : String(result.reason);
        failed.push({ list, actorId, error });
        this.logger.error("Cache invalidation failed", { list, actorId, error });
      }
    });

    return { audience: actors, bumped: bumps.length - failed.length, failed };
  }
}
