import type { Page } from "./types";

/**
 * Slices one page out of `items`. The requested page is clamped into
 * [1, totalPages]; an empty set is a single empty page.
 */
export function paginate<T>(items: readonly T[], page: number, pageSize: number): Page<T> {
  const size = Math.max(1, Math.trunc(pageSize));
  const totalCount = items.length;
  const totalPages = totalCount === 0 ? 1 : Math.ceil(totalCount / size);
  const current = Math.min(Math.max(1, Math.trunc(page) || 1), totalPages);
  const start = (current - 1) * size;

  return {
    items: items.slice(start, start + size),
    page: current,
    pageSize: size,
    totalCount,
    totalPages,
    hasPrev: current > 1 && totalCount > 0,
    hasNext: current * size < totalCount,
  };
}
