/**
 * Report REST Routes
 */

import {
  ErrorResponseSchema,
  GenerateReportBodySchema,
  GeneratedReportResponseSchema,
  type GenerateReportBody,
} from './schemas.js';
import { getHttpStatusForError } from '../../core/errors.js';
import {
  generateDistrictReport,
  type GenerateDistrictReportDeps,
} from '../../core/usecases/generate-district-report.js';

import type { FastifyPluginAsync } from 'fastify';

export type MakeReportRoutesDeps = GenerateDistrictReportDeps;

export const makeReportRoutes = (deps: MakeReportRoutesDeps): FastifyPluginAsync => {
  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/reports - Generate and store a district report
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: GenerateReportBody }>(
      '/api/v1/reports',
      {
        schema: {
          body: GenerateReportBodySchema,
          response: {
            201: GeneratedReportResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
            502: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { date, district, layout } = request.body;
        const result = await generateDistrictReport(deps, {
          date,
          district,
          ...(layout !== undefined && { layout }),
        });

        if (result.isErr()) {
          return reply.status(getHttpStatusForError(result.error)).send({
            ok: false,
            error: result.error.type,
            message: result.error.message,
          });
        }

        return reply.status(201).send({ ok: true, data: result.value });
      }
    );
  };
};
