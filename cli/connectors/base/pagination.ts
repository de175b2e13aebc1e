/**
 * Link-header pagination shared by the search and listing fetchers.
 * Walks page=1,2,… and reports why it stopped alongside the items.
 */

import type { ApiFailure, ApiResult, StopReason } from './types.js';

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface PaginateResult<T> {
  items: T[];
  reason: StopReason;
  /** Pages whose items were collected. */
  pages: number;
}

export async function paginateLinks<T, R>(opts: {
  /** Issue the request for one 1-based page. */
  fetchPage: (page: number) => Promise<ApiResult<R>>;
  /** Extract the batch from a page body. */
  getItems: (data: R) => T[];
  maxPages?: number;
  /** Stop once this many items have been collected; the result is truncated to it. */
  maxItems?: number;
  /** Treat an empty batch as the end of the listing. */
  stopOnEmpty?: boolean;
  /** Fixed pause between consecutive successful pages. */
  delayMs: number;
  onPage?: (page: number, items: T[]) => void;
  onError?: (page: number, failure: ApiFailure) => void;
  sleepFn?: (ms: number) => Promise<void>;
}): Promise<PaginateResult<T>> {
  const {
    fetchPage,
    getItems,
    maxPages = Infinity,
    maxItems = Infinity,
    stopOnEmpty = false,
    delayMs,
    onPage,
    onError,
    sleepFn = sleep,
  } = opts;

  const items: T[] = [];
  let collected = 0;
  let page = 1;
  let reason: StopReason = 'page-cap';

  while (page <= maxPages) {
    const res = await fetchPage(page);
    if (!res.ok) {
      onError?.(page, res);
      reason = 'http-error';
      break;
    }

    const batch = getItems(res.data);
    if (stopOnEmpty && batch.length === 0) {
      reason = 'empty-page';
      break;
    }

    items.push(...batch);
    collected++;
    onPage?.(page, batch);

    if (items.length >= maxItems) {
      reason = 'item-cap';
      break;
    }
    if (!res.links.next) {
      reason = 'no-next-link';
      break;
    }
    if (page >= maxPages) {
      reason = 'page-cap';
      break;
    }

    page++;
    await sleepFn(delayMs);
  }

  return {
    items: Number.isFinite(maxItems) ? items.slice(0, maxItems) : items,
    reason,
    pages: collected,
  };
}
