import type { FastifyInstance } from 'fastify';
import { createSuccessResponse, type HealthStatus } from '../types.js';
import { VERSION } from '../../version.js';

/**
 * Register health check routes
 */
export function registerHealthRoutes(app: FastifyInstance): void {
  /**
   * GET /health - Basic health check
   */
  app.get('/health', async (request, reply) => {
    const response: HealthStatus = {
      status: 'ok',
      version: VERSION,
      timestamp: new Date().toISOString(),
    };
    return reply.send(createSuccessResponse(response, request.id));
  });
}
