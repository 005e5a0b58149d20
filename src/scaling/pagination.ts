/**
 * API Pagination Helper — offset/limit pagination for list endpoints
 *
 * ?page=1&limit=50. Default limit 50, max 200.
 */

export interface PaginationParams {
  page: number;
  limit: number;
  offset: number;
}

export interface PaginatedResponse<T> {
  items: T[];
  pagination: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
    hasMore: boolean;
  };
}

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 200;

function firstInt(value: unknown): number {
  const raw = Array.isArray(value) ? value[0] : value;
  return typeof raw === 'string' ? parseInt(raw, 10) : NaN;
}

/**
 * Extract pagination params from an Express request query
 */
export function parsePagination(query: Record<string, unknown>): PaginationParams {
  const page = Math.max(1, firstInt(query.page) || 1);
  const rawLimit = firstInt(query.limit) || DEFAULT_LIMIT;
  const limit = Math.min(Math.max(1, rawLimit), MAX_LIMIT);
  const offset = (page - 1) * limit;
  return { page, limit, offset };
}

export function paginate<T>(items: T[], params: PaginationParams): PaginatedResponse<T> {
  const total = items.length;
  const totalPages = Math.ceil(total / params.limit) || 1;
  const paged = items.slice(params.offset, params.offset + params.limit);

  return {
    items: paged,
    pagination: {
      page: params.page,
      limit: params.limit,
      total,
      totalPages,
      hasMore: params.page < totalPages,
    },
  };
}
