/**
 * Paginated Fetcher
 *
 * Walks a single AWS list/describe operation across its continuation tokens.
 * `paginate` is the lazy form; `fetchAll` drains it and, on failure, keeps the
 * records already received and flags the result as truncated.
 */

import { ScanAbortedError } from "../errors.js";

/**
 * Describes one paginated operation.
 *
 * AWS names the token differently per service (NextToken, Marker,
 * NextMarker, LastEvaluatedTableName, ContinuationToken); the accessors hide that.
 */
export type PaginationSpec<TPage, TItem> = {
  /** Label used in issues and logs, e.g. "ec2:DescribeInstances". */
  operation: string;
  /** Request one page. `token` is undefined for the first page. */
  fetchPage: (token: string | undefined, signal?: AbortSignal) => Promise<TPage>;
  /** Records carried by a page. */
  items: (page: TPage) => readonly TItem[] | undefined;
  /** Continuation token of a page; absent or empty ends the session. */
  nextToken: (page: TPage) => string | undefined;
};

export type PaginateOptions = {
  signal?: AbortSignal;
  /** Called after each page with the running page count. */
  onPage?: (pages: number) => void;
};

export type PaginatedResult<TItem> = {
  items: TItem[];
  pages: number;
  /** True when at least one page arrived before the session failed. */
  truncated: boolean;
  /** The failure that ended the session early, if any. */
  error?: unknown;
};

/**
 * Lazily yield every record of a paginated operation, in page order.
 *
 * Each call starts a new pagination session.
 */
export async function* paginate<TPage, TItem>(
  spec: PaginationSpec<TPage, TItem>,
  options: PaginateOptions = {},
): AsyncGenerator<TItem, void, undefined> {
  let token: string | undefined;
  let pages = 0;

  do {
    if (options.signal?.aborted) {
      throw new ScanAbortedError(spec.operation);
    }

    const page = await spec.fetchPage(token, options.signal);
    pages += 1;
    options.onPage?.(pages);

    for (const item of spec.items(page) ?? []) {
      yield item;
    }

    const next = spec.nextToken(page) || undefined;
    if (next !== undefined && next === token) {
      throw new Error(`${spec.operation} returned the same continuation token twice`);
    }
    token = next;
  } while (token);
}

/**
 * Drain a paginated operation into memory.
 *
 * Never throws for request failures: the error is returned alongside whatever
 * was fetched before it.
 */
export async function fetchAll<TPage, TItem>(
  spec: PaginationSpec<TPage, TItem>,
  options: PaginateOptions = {},
): Promise<PaginatedResult<TItem>> {
  const items: TItem[] = [];
  let pages = 0;

  try {
    for await (const item of paginate(spec, {
      ...options,
      onPage: (count) => {
        pages = count;
        options.onPage?.(count);
      },
    })) {
      items.push(item);
    }
    return { items, pages, truncated: false };
  } catch (error) {
    return { items, pages, truncated: pages > 0, error };
  }
}
