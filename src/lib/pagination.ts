import type { Page } from "./types.js";

/**
 * Slice one page out of a list. Pages are 1-based; anything that is not a
 * number gives the first page and any number out of range gives the last.
 */
export function paginate<T>(items: T[], rawPage: string | undefined, pageSize: number): Page<T> {
  const numPages = Math.max(1, Math.ceil(items.length / pageSize));
  const requested = parseInt(rawPage ?? "", 10);
  let page = Number.isNaN(requested) ? 1 : requested;
  if (page < 1 || page > numPages) page = numPages;

  const start = (page - 1) * pageSize;
  return {
    items: items.slice(start, start + pageSize),
    page,
    numPages,
    totalCount: items.length,
  };
}
