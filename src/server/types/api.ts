import { z } from 'zod';
import { listSearchesSchema, searchIdSchema, submitSearchSchema } from '../../control-plane/validators.js';

/**
 * Pagination query parameters
 */
export const paginationQuerySchema = listSearchesSchema;

export type PaginationQuery = z.infer<typeof paginationQuerySchema>;

/**
 * Search ID parameter
 */
export const searchIdParamsSchema = z.object({
  id: searchIdSchema,
});

export type SearchIdParams = z.infer<typeof searchIdParamsSchema>;

/**
 * Create search request body
 */
export const createSearchBodySchema = submitSearchSchema;

export type CreateSearchBody = z.input<typeof createSearchBodySchema>;

/**
 * Returned when a search is accepted for background execution
 */
export interface SearchAccepted {
  searchId: string;
  phase: string;
}

/**
 * Paginated response wrapper
 */
export interface PaginatedResponse<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}
