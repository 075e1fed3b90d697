import type { FastifyInstance, preHandlerAsyncHookHandler } from 'fastify';
import type { SearchStatus } from '../../types/index.js';
import { SearchNotFoundError, SubstrateError, ValidationError } from '../../errors/index.js';
import type { SearchService } from '../../control-plane/search-service.js';
import { createSuccessResponse, createErrorResponse, ErrorCode } from '../types.js';
import {
  paginationQuerySchema,
  searchIdParamsSchema,
  createSearchBodySchema,
  type PaginationQuery,
  type SearchIdParams,
  type CreateSearchBody,
  type SearchAccepted,
  type PaginatedResponse,
} from '../types/api.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('routes:searches');

/**
 * Register search API routes
 */
export function registerSearchRoutes(
  app: FastifyInstance,
  service: SearchService,
  auth: preHandlerAsyncHookHandler
): void {
  /**
   * GET /api/v1/searches - List searches, newest first
   */
  app.get<{
    Querystring: PaginationQuery;
  }>('/api/v1/searches', { preHandler: [auth] }, async (request, reply) => {
    const queryResult = paginationQuerySchema.safeParse(request.query);
    if (!queryResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid query parameters',
          { errors: queryResult.error.errors },
          request.id
        )
      );
    }

    const { limit, offset } = queryResult.data;

    try {
      const { items, total } = await service.list({ limit, offset });
      const response: PaginatedResponse<SearchStatus> = {
        items,
        total,
        limit,
        offset,
        hasMore: offset + items.length < total,
      };
      return reply.send(createSuccessResponse(response, request.id));
    } catch (error) {
      logger.error({ err: error, requestId: request.id }, 'Failed to list searches');
      return reply.status(500).send(
        createErrorResponse(ErrorCode.INTERNAL_ERROR, 'Failed to list searches', undefined, request.id)
      );
    }
  });

  /**
   * GET /api/v1/searches/:id - Search status, with the outcome once finished
   */
  app.get<{
    Params: SearchIdParams;
  }>('/api/v1/searches/:id', { preHandler: [auth] }, async (request, reply) => {
    const paramsResult = searchIdParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid search ID',
          { errors: paramsResult.error.errors },
          request.id
        )
      );
    }

    const { id } = paramsResult.data;

    try {
      const status = await service.getStatus(id);
      if (!status) {
        return reply.status(404).send(
          createErrorResponse(ErrorCode.NOT_FOUND, `Search not found: ${id}`, undefined, request.id)
        );
      }
      return reply.send(createSuccessResponse(status, request.id));
    } catch (error) {
      logger.error({ err: error, requestId: request.id, searchId: id }, 'Failed to get search');
      return reply.status(500).send(
        createErrorResponse(ErrorCode.INTERNAL_ERROR, 'Failed to get search', undefined, request.id)
      );
    }
  });

  /**
   * POST /api/v1/searches - Submit a search; it runs in the background
   */
  app.post<{
    Body: CreateSearchBody;
  }>('/api/v1/searches', { preHandler: [auth] }, async (request, reply) => {
    const bodyResult = createSearchBodySchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid request body',
          { errors: bodyResult.error.errors },
          request.id
        )
      );
    }

    try {
      const handle = service.submit(bodyResult.data.problem, bodyResult.data.config);
      const accepted: SearchAccepted = { searchId: handle.searchId, phase: 'initializing' };
      return reply.status(202).send(createSuccessResponse(accepted, request.id));
    } catch (error) {
      if (error instanceof ValidationError) {
        return reply.status(400).send(
          createErrorResponse(ErrorCode.BAD_REQUEST, error.message, { errors: error.issues }, request.id)
        );
      }
      logger.error({ err: error, requestId: request.id }, 'Failed to submit search');
      return reply.status(500).send(
        createErrorResponse(ErrorCode.INTERNAL_ERROR, 'Failed to submit search', undefined, request.id)
      );
    }
  });

  /**
   * POST /api/v1/searches/:id/resume - Continue an interrupted search
   */
  app.post<{
    Params: SearchIdParams;
  }>('/api/v1/searches/:id/resume', { preHandler: [auth] }, async (request, reply) => {
    const paramsResult = searchIdParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid search ID',
          { errors: paramsResult.error.errors },
          request.id
        )
      );
    }

    const { id } = paramsResult.data;

    try {
      const handle = await service.reopen(id);
      const status = await handle.status();
      const accepted: SearchAccepted = { searchId: id, phase: status?.phase ?? 'unknown' };
      return reply.status(202).send(createSuccessResponse(accepted, request.id));
    } catch (error) {
      if (error instanceof SearchNotFoundError) {
        return reply.status(404).send(
          createErrorResponse(ErrorCode.NOT_FOUND, error.message, undefined, request.id)
        );
      }
      if (error instanceof SubstrateError) {
        return reply.status(409).send(
          createErrorResponse(ErrorCode.CONFLICT, error.message, undefined, request.id)
        );
      }
      logger.error({ err: error, requestId: request.id, searchId: id }, 'Failed to resume search');
      return reply.status(500).send(
        createErrorResponse(ErrorCode.INTERNAL_ERROR, 'Failed to resume search', undefined, request.id)
      );
    }
  });
}
