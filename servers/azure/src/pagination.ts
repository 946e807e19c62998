/**
 * Helpers for draining Azure SDK paging iterators with a limit.
 */

import { ToolInputError } from "../../../src/index.js";
import type { AzurePagedResult, AzurePaginationOptions } from "./types.js";

export function validatePagination(pagination?: AzurePaginationOptions): void {
  if (!pagination) return;
  for (const field of ["limit", "offset"] as const) {
    const value = pagination[field];
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      throw new ToolInputError(`Invalid ${field}: ${value}. Must be a non-negative integer.`, { field });
    }
  }
}

/**
 * Collect mapped items, skipping `offset` and stopping after `limit`.
 * `hasMore` is set when at least one more item was available.
 */
export async function collectPaged<TRaw, TOut>(
  iterator: AsyncIterable<TRaw>,
  mapFn: (item: TRaw) => TOut,
  filterFn?: (item: TOut) => boolean,
  pagination?: AzurePaginationOptions,
): Promise<AzurePagedResult<TOut>> {
  validatePagination(pagination);
  const limit = pagination?.limit;
  const offset = pagination?.offset ?? 0;

  const items: TOut[] = [];
  let seen = 0;
  let hasMore = false;

  for await (const raw of iterator) {
    const mapped = mapFn(raw);
    if (filterFn && !filterFn(mapped)) continue;

    seen += 1;
    if (seen <= offset) continue;
    if (limit !== undefined && items.length >= limit) {
      hasMore = true;
      break;
    }
    items.push(mapped);
  }

  return { items, hasMore, totalCount: hasMore ? undefined : seen };
}

export async function collectAll<TRaw, TOut>(
  iterator: AsyncIterable<TRaw>,
  mapFn: (item: TRaw) => TOut,
  filterFn?: (item: TOut) => boolean,
): Promise<TOut[]> {
  return (await collectPaged(iterator, mapFn, filterFn)).items;
}
