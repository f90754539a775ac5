/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared validation schemas and utilities.
 * Used across all modules for consistent validation.
 *
 * Request bodies are validated strictly (unknown fields rejected).
 * Query strings are not: the filter pipeline ignores what it cannot parse,
 * and only pagination is checked here.
 * =============================================================================
 */

import { z } from 'zod';
import { Request } from 'express';
import { ValidationError } from '../types/error.types';
import { PaginationParams, QueryParams } from '../types/api.types';
import { parseTimestamp } from '../query/filter-pipeline';
import { COORDINATE_BOUNDS, MAX_PAGE_SIZE } from '../../core/constants';
import { config } from '../../config/environment';

// ============================================================
// COMMON SCHEMAS
// ============================================================

export const latitudeSchema = z.number()
  .finite()
  .min(COORDINATE_BOUNDS.LATITUDE.MIN)
  .max(COORDINATE_BOUNDS.LATITUDE.MAX);

export const longitudeSchema = z.number()
  .finite()
  .min(COORDINATE_BOUNDS.LONGITUDE.MIN)
  .max(COORDINATE_BOUNDS.LONGITUDE.MAX);

/**
 * ISO-8601 timestamp, normalized to a UTC ISO string
 */
export const timestampSchema = z.string().transform((value, ctx) => {
  const parsed = parseTimestamp(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid ISO-8601 timestamp' });
    return z.NEVER;
  }
  return parsed.toISOString();
});

/**
 * Pagination schema
 */
export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(config.query.defaultPageSize)
});

// ============================================================
// HELPERS
// ============================================================

/**
 * Synchronous schema validation - validates data and returns parsed result
 * Throws ValidationError listing every failing field
 */
export function validateSchema<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const fields = result.error.errors.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message
    }));
    throw new ValidationError('Invalid request data', { fields });
  }
  return result.data;
}

/**
 * Flatten req.query to plain strings. Nested objects are dropped; a repeated
 * key keeps its first value.
 */
export function readQueryParams(query: Request['query']): QueryParams {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    const first = Array.isArray(value) ? value[0] : value;
    if (typeof first === 'string') {
      params[key] = first;
    }
  }
  return params;
}

export function readPagination(params: QueryParams): PaginationParams {
  return validateSchema(paginationSchema, { page: params.page || undefined, limit: params.limit || undefined });
}
