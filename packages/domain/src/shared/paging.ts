/**
 * List Pages
 *
 * Every list action answers with the same envelope:
 * { count, page, pageSize, results }.
 */

import type { ActionContext, PageRequest, Paged } from "@issuedesk/contracts";

export interface Page<T> {
  /** Matching rows across all pages */
  count: number;
  page: number;
  pageSize: number;
  results: T[];
}

export function pageRequest({ request, pageSize }: ActionContext): PageRequest {
  return { limit: pageSize, offset: (request.page - 1) * pageSize };
}

export function toPage<T>(context: ActionContext, paged: Paged<unknown>, results: T[]): Page<T> {
  return {
    count: paged.total,
    page: context.request.page,
    pageSize: context.pageSize,
    results,
  };
}
