/**
 * Page-number pagination envelope.
 *
 * List endpoints return { data, pagination: { page, pageSize, totalItems, totalPages } }.
 */

import type { Page } from "@cardflow/reports";

export interface PaginationMeta {
  readonly page: number;
  readonly pageSize: number;
  readonly totalItems: number;
  readonly totalPages: number;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

export function toPaginatedResponse<T>(page: Page<T>): PaginatedResponse<T> {
  const { items, ...pagination } = page;
  return { data: items, pagination };
}
