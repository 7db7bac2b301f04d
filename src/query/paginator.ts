import { UsageError } from '../errors.js';
import type { QueryPage, QueryResult } from '../types.js';

export const MAX_PAGE_SIZE = 1000;

export type PageFetcher<T> = (limit: number, offset: number) => Promise<QueryPage<T>>;

export interface PaginateOptions {
  pageSize: number;
  /** Stop once this many results have been requested. `null` pages until the end. */
  maxResults: number | null;
  signal?: AbortSignal;
}

export function assertPageSize(pageSize: number): void {
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new UsageError(`pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${pageSize}`);
  }
}

/**
 * Fetches pages in offset order, one at a time, and merges them into one
 * logical result. Stops when the service reports no more pages or when
 * `maxResults` has been reached.
 */
export async function paginate<T>(fetchPage: PageFetcher<T>, options: PaginateOptions): Promise<QueryResult<T>> {
  const { pageSize, maxResults, signal } = options;
  assertPageSize(pageSize);

  const items: T[] = [];
  let offset = 0;

  for (;;) {
    signal?.throwIfAborted();
    const page = await fetchPage(pageSize, offset);
    items.push(...page.items);
    offset += pageSize;
    if (!page.hasMore || (maxResults !== null && offset >= maxResults)) {
      signal?.throwIfAborted();
      const merged = maxResults !== null ? items.slice(0, maxResults) : items;
      return { ...page, items: merged, count: merged.length, offset: 0 };
    }
  }
}
