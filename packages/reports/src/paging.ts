/**
 * @cardflow/reports: Page-number pagination.
 *
 * A page past the end shows the last page; a page below 1 shows the first.
 * An empty list still has one (empty) page.
 */

import type { Page, PageRequest } from "./types.js";

export const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 500;

function clampInt(value: number | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(max, Math.max(min, Math.trunc(value)));
}

export function paginate<T>(
  items: readonly T[],
  request: PageRequest = {},
  defaultPageSize: number = DEFAULT_PAGE_SIZE,
): Page<T> {
  const pageSize = clampInt(request.pageSize, defaultPageSize, 1, MAX_PAGE_SIZE);
  const totalPages = Math.max(1, Math.ceil(items.length / pageSize));
  const page = clampInt(request.page, 1, 1, totalPages);
  const offset = (page - 1) * pageSize;

  return {
    items: items.slice(offset, offset + pageSize),
    page,
    pageSize,
    totalItems: items.length,
    totalPages,
  };
}
