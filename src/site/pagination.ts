/**
 * Listing pagination.
 */

/**
 * Number of listing pages for `total` items: ceil(total / pageSize), and
 * never fewer than one so the listing root always exists.
 */
export function totalPages(total: number, pageSize: number): number {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
  }
  return Math.max(1, Math.ceil(total / pageSize));
}

export interface PageSlice<T> {
  /** 1-based page number */
  page: number;
  totalPages: number;
  items: T[];
}

/**
 * Split items into consecutive pages, preserving order. Zero items give
 * one empty page.
 */
export function paginate<T>(items: readonly T[], pageSize: number): PageSlice<T>[] {
  const pages = totalPages(items.length, pageSize);
  return Array.from({ length: pages }, (_, i) => ({
    page: i + 1,
    totalPages: pages,
    items: items.slice(i * pageSize, (i + 1) * pageSize),
  }));
}
