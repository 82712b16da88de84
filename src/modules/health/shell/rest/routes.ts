/**
 * Health check routes
 *
 * - GET /health/live  - the process is up
 * - GET /health/ready - the metrics API answers, so summaries can be built
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { FastifyPluginAsync } from 'fastify';

/**
 * Factory function to create health routes with dependencies
 */
export const makeHealthRoutes = (deps: Partial<GetReadinessDeps> = {}): FastifyPluginAsync => {
  const { version, checkers = [], checkTimeoutMs } = deps;
  const startTime = Date.now();

  return async (fastify) => {
    // Never checks dependencies; that is the readiness probe's job
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      {
        schema: {
          response: {
            200: LivenessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        return reply.status(200).send({ status: 'ok' });
      }
    );

    // 503 when a critical dependency is down
    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);
        const timestamp = new Date().toISOString();

        const response = await getReadiness(
          { version, checkers, checkTimeoutMs },
          { uptime: uptimeSeconds, timestamp }
        );

        const httpStatus = response.status === 'unhealthy' ? 503 : 200;

        return reply.status(httpStatus).send(response);
      }
    );
  };
};
