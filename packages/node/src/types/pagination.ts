/**
 * Offset pagination.
 *
 * Wallets and events are append-only and ordered by creation, so an offset
 * into that order is stable. List endpoints return
 * { data, pagination: { offset, limit, total, hasMore } }.
 */

export interface PaginationMeta {
  readonly offset: number;
  readonly limit: number;
  readonly total: number;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

export function pageMeta(offset: number, limit: number, total: number): PaginationMeta {
  return { offset, limit, total, hasMore: offset + limit < total };
}

/**
 * Slice `items` to one page.
 */
export function paginate<T>(
  items: readonly T[],
  offset: number,
  limit: number,
): PaginatedResponse<T> {
  return {
    data: items.slice(offset, offset + limit),
    pagination: pageMeta(offset, limit, items.length),
  };
}
