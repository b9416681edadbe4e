/**
 * Page, page size and sort parameters for list endpoints.
 *
 * Sort values come from a per-resource safelist; a leading `-` means
 * descending. Only safelisted values ever reach a store, so stores may
 * interpolate the derived column into SQL.
 *
 * @module marquee/data/pagination
 */

import type { FieldErrors } from "./versioned.ts";

export const MAX_PAGE = 10_000_000;
export const MAX_PAGE_SIZE = 100;

export interface PageRequest<S extends string> {
  page: number;
  pageSize: number;
  sort: S;
}

export interface PageDefaults<S extends string> {
  pageSize: number;
  sort: S;
  sortSafelist: readonly S[];
}

/** Raw query string values; absent and empty both mean "use the default" */
export interface PageQuery {
  page?: string;
  page_size?: string;
  sort?: string;
}

export type PageParse<S extends string> =
  | { ok: true; value: PageRequest<S> }
  | { ok: false; fields: FieldErrors };

const INTEGER_PATTERN = /^-?[0-9]+$/;

/**
 * Parse and range-check paging parameters.
 *
 * @example
 * ```typescript
 * const parsed = parsePageRequest({ page: "2", sort: "-year" }, MOVIE_PAGE_DEFAULTS);
 * if (!parsed.ok) throw new FailedValidationError(parsed.fields);
 * ```
 */
export function parsePageRequest<S extends string>(
  query: PageQuery,
  defaults: PageDefaults<S>,
): PageParse<S> {
  const fields: FieldErrors = {};

  const readInt = (key: "page" | "page_size", fallback: number): number => {
    const raw = query[key];
    if (raw === undefined || raw === "") return fallback;
    if (!INTEGER_PATTERN.test(raw) || !Number.isSafeInteger(Number(raw))) {
      fields[key] = "must be an integer value";
      return fallback;
    }
    return Number(raw);
  };

  const page = readInt("page", 1);
  const pageSize = readInt("page_size", defaults.pageSize);

  if (!("page" in fields)) {
    if (page < 1) fields.page = "must be greater than zero";
    else if (page > MAX_PAGE) fields.page = "must be a maximum of 10 million";
  }
  if (!("page_size" in fields)) {
    if (pageSize < 1) fields.page_size = "must be greater than zero";
    else if (pageSize > MAX_PAGE_SIZE) {
      fields.page_size = `must be a maximum of ${MAX_PAGE_SIZE}`;
    }
  }

  const rawSort = query.sort;
  const sort = rawSort === undefined || rawSort === ""
    ? defaults.sort
    : defaults.sortSafelist.find((s) => s === rawSort);
  if (sort === undefined) fields.sort = "invalid sort value";

  if (Object.keys(fields).length > 0 || sort === undefined) {
    return { ok: false, fields };
  }
  return { ok: true, value: { page, pageSize, sort } };
}

export function sortDirection(sort: string): "ASC" | "DESC" {
  return sort.startsWith("-") ? "DESC" : "ASC";
}

export function pageOffset(request: PageRequest<string>): number {
  return (request.page - 1) * request.pageSize;
}

export interface PageMetadata {
  currentPage: number;
  pageSize: number;
  firstPage: number;
  lastPage: number;
  totalRecords: number;
}

/**
 * Metadata for a listing response. Null when nothing matched.
 */
export function calculateMetadata(
  totalRecords: number,
  page: number,
  pageSize: number,
): PageMetadata | null {
  if (totalRecords === 0) return null;
  return {
    currentPage: page,
    pageSize,
    firstPage: 1,
    lastPage: Math.ceil(totalRecords / pageSize),
    totalRecords,
  };
}

/** Wire form; `{}` when there is no metadata */
export function toMetadataJson(
  metadata: PageMetadata | null,
): Record<string, number> {
  if (!metadata) return {};
  return {
    current_page: metadata.currentPage,
    page_size: metadata.pageSize,
    first_page: metadata.firstPage,
    last_page: metadata.lastPage,
    total_records: metadata.totalRecords,
  };
}
