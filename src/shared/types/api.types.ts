/**
 * =============================================================================
 * API TYPES - SHARED CONTRACTS
 * =============================================================================
 *
 * Response envelope and value types shared by every module.
 * =============================================================================
 */

/**
 * Standard API response wrapper
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ApiMeta;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * API metadata (pagination)
 */
export interface ApiMeta {
  page: number;
  limit: number;
  total: number;
  hasMore: boolean;
}

export interface PaginationParams {
  page: number;
  limit: number;
}

/**
 * One page of rows plus the total before slicing
 */
export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
  hasMore: boolean;
}

/**
 * Location coordinates (decimal degrees)
 */
export interface Coordinates {
  latitude: number;
  longitude: number;
}

/**
 * Query-string parameters as they arrive from the HTTP layer.
 * Repeated keys are collapsed to their first value before reaching the engine.
 */
export type QueryParams = Readonly<Record<string, string | undefined>>;

/**
 * Helper to create success response
 */
export function successResponse<T>(data: T, meta?: ApiMeta): ApiResponse<T> {
  return {
    success: true,
    data,
    ...(meta && { meta })
  };
}

/**
 * Build the pagination meta block from a page
 */
export function pageMeta<T>(page: Page<T>): ApiMeta {
  return {
    page: page.page,
    limit: page.limit,
    total: page.total,
    hasMore: page.hasMore
  };
}

/**
 * Slice an already ordered list into one page
 */
export function paginate<T>(rows: readonly T[], { page, limit }: PaginationParams): Page<T> {
  const start = (page - 1) * limit;
  const items = rows.slice(start, start + limit);
  return {
    items,
    total: rows.length,
    page,
    limit,
    hasMore: start + items.length < rows.length
  };
}

/**
 * Row window for a store query
 */
export function pageWindow({ page, limit }: PaginationParams): { offset: number; limit: number } {
  return { offset: (page - 1) * limit, limit };
}

/**
 * Wrap rows the store already windowed, given the unwindowed total
 */
export function storePage<T>(items: T[], total: number, { page, limit }: PaginationParams): Page<T> {
  return {
    items,
    total,
    page,
    limit,
    hasMore: (page - 1) * limit + items.length < total
  };
}
