/**
 * Performance REST Routes
 *
 * Read-only endpoints over the hierarchy aggregation.
 */

import {
  ErrorResponseSchema,
  SummaryQuerySchema,
  SummaryResponseSchema,
  UnitsQuerySchema,
  UnitsResponseSchema,
  type RankedUnit,
  type SummaryQuery,
  type UnitsQuery,
} from './schemas.js';
import { toComponentMarks } from '../../core/components.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { toUnitPerformance } from '../../core/ranking.js';
import { buildPerformanceSummary } from '../../core/usecases/build-performance-summary.js';
import { listScopeUnits } from '../../core/usecases/list-scope-units.js';

import type { MetricSource } from '../../core/ports.js';
import type { ScoredUnit } from '../../core/types.js';
import type { FastifyPluginAsync } from 'fastify';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakePerformanceRoutesDeps {
  metricSource: MetricSource;
  logger: Logger;
  fetchConcurrency?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toRankedUnit = (unit: ScoredUnit, index: number): RankedUnit => ({
  rank: index + 1,
  ...toUnitPerformance(unit),
  componentMarks: toComponentMarks(unit),
});

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makePerformanceRoutes = (deps: MakePerformanceRoutesDeps): FastifyPluginAsync => {
  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/performance/summary - Nested state/district/block summary
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: SummaryQuery }>(
      '/api/v1/performance/summary',
      {
        schema: {
          querystring: SummaryQuerySchema,
          response: {
            200: SummaryResponseSchema,
            400: ErrorResponseSchema,
            502: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { date, district } = request.query;

        const result = await buildPerformanceSummary(deps, {
          date,
          ...(district !== undefined && { district }),
        });

        if (result.isErr()) {
          return reply.status(getHttpStatusForError(result.error)).send({
            ok: false,
            error: result.error.type,
            message: result.error.message,
          });
        }

        return reply.status(200).send({ ok: true, data: result.value.summary });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/performance/units - Ranked units of one scope
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: UnitsQuery }>(
      '/api/v1/performance/units',
      {
        schema: {
          querystring: UnitsQuerySchema,
          response: {
            200: UnitsResponseSchema,
            400: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { date, district, block } = request.query;

        if (block !== undefined && district === undefined) {
          return reply.status(400).send({
            ok: false,
            error: 'ValidationError',
            message: 'block requires district',
          });
        }

        const { level, units } = await listScopeUnits(deps, {
          date,
          ...(district !== undefined && { district }),
          ...(block !== undefined && { block }),
        });

        return reply.status(200).send({
          ok: true,
          data: { level, total: units.length, units: units.map(toRankedUnit) },
        });
      }
    );
  };
};
