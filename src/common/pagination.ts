export type PaginationQuery = {
  limit?: string;
  cursor?: string;
};

export type PaginationResult = {
  take: number;
  cursor?: string;
};

export type PaginatedResponse<T> = {
  items: T[];
  nextCursor: string | null;
  total?: number;
};

export function parsePagination(
  query: PaginationQuery,
  defaultLimit = 25,
  maxLimit = 100,
): PaginationResult {
  const requested = parseInt(query.limit ?? `${defaultLimit}`, 10);
  const limit = Math.min(
    Math.max(Number.isNaN(requested) ? defaultLimit : requested, 1),
    maxLimit,
  );
  const cursor = query.cursor?.trim() || undefined;
  return { take: limit, cursor };
}

export function buildPaginatedResponse<T extends { id: string | number }>(
  items: T[],
  limit: number,
  total?: number,
): PaginatedResponse<T> {
  const last = items[items.length - 1];
  const nextCursor =
    items.length >= limit && last !== undefined ? String(last.id) : null;
  return { items, nextCursor, total };
}
