import type { CursorPage } from "../types";

export type FetchCursorPage<T> = (
  token: string | null,
  pageSize: number
) => Promise<CursorPage<T>>;

export interface PaginationResult {
  pagesFetched: number;
  itemsFetched: number;
  finalToken: string | null;
}

export interface PaginationHooks<T> {
  onPage?: (page: CursorPage<T>, pageNumber: number) => void;
}

export interface PaginationOptions<T> {
  limit?: number;
  pageSize?: number;
  maxPageSize: number;
  hooks?: PaginationHooks<T>;
}

export function resolvePageSize(
  maxPageSize: number,
  pageSize?: number,
  limit?: number
): number {
  const requested = pageSize ?? limit ?? maxPageSize;
  return Math.max(1, Math.min(requested, maxPageSize));
}

/**
 * Drives a token-continued list operation page by page.
 *
 * The traversal ends when the service returns no token, returns the token it
 * was sent, or `limit` items have been emitted. The last page is truncated to
 * the limit.
 */
export async function* paginatePages<T>(
  fetchPage: FetchCursorPage<T>,
  options: PaginationOptions<T>
): AsyncGenerator<T[], PaginationResult, undefined> {
  const limit = options.limit;
  const pageSize = resolvePageSize(options.maxPageSize, options.pageSize, limit);

  let token: string | null = null;
  let pagesFetched = 0;
  let itemsFetched = 0;

  if (limit !== undefined && limit <= 0) {
    return { pagesFetched, itemsFetched, finalToken: token };
  }

  while (true) {
    const page = await fetchPage(token, pageSize);
    pagesFetched += 1;

    options.hooks?.onPage?.(page, pagesFetched);

    const remaining =
      limit === undefined ? page.items.length : limit - itemsFetched;
    const items =
      page.items.length > remaining ? page.items.slice(0, remaining) : page.items;
    itemsFetched += items.length;

    if (items.length > 0) {
      yield items;
    }

    const exhausted = !page.nextToken || page.nextToken === token;
    const capped = limit !== undefined && itemsFetched >= limit;

    if (exhausted || capped) {
      return { pagesFetched, itemsFetched, finalToken: page.nextToken };
    }

    token = page.nextToken;
  }
}

export async function* paginate<T>(
  fetchPage: FetchCursorPage<T>,
  options: PaginationOptions<T>
): AsyncGenerator<T, PaginationResult, undefined> {
  const pages = paginatePages(fetchPage, options);
  let next = await pages.next();

  while (!next.done) {
    yield* next.value;
    next = await pages.next();
  }

  return next.value;
}
