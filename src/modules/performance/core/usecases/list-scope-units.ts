/**
 * List Scope Units Use Case
 *
 * Fetches all metric endpoints for one scope and turns the rows into a
 * scored, ranked list of units. Child levels (blocks, panchayats) also go
 * through the outlier filter.
 */

import { METRIC_ENDPOINTS } from '../endpoints.js';
import { mergeMetricResults, renameEndpointFields } from '../merge.js';
import { partitionOutliers } from '../outliers.js';
import { scoreUnits } from '../score.js';
import { levelForScope } from '../types.js';

import type { MetricSource } from '../ports.js';
import type { MetricRecord, MetricScope, ScoredUnit, UnitLevel } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ListScopeUnitsDeps {
  metricSource: MetricSource;
  logger: Logger;
  /**
   * Number of endpoints requested at once. Defaults to 1 (strictly sequential).
   */
  fetchConcurrency?: number;
}

export interface ScopeUnits {
  level: UnitLevel;
  units: ScoredUnit[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const chunk = <T>(values: readonly T[], size: number): T[][] => {
  const result: T[][] = [];
  for (let index = 0; index < values.length; index += size) {
    result.push(values.slice(index, index + size));
  }
  return result;
};

/**
 * Fetches every metric endpoint for a scope.
 *
 * Result sets come back in `METRIC_ENDPOINTS` order whatever order the
 * requests complete in. A failed endpoint is logged and contributes an empty
 * set, so one broken endpoint never aborts the aggregation. Endpoint field
 * renames are applied to each set.
 */
export async function fetchScopeMetrics(
  deps: ListScopeUnitsDeps,
  scope: MetricScope
): Promise<MetricRecord[][]> {
  const { metricSource, logger, fetchConcurrency = 1 } = deps;
  const resultSets: MetricRecord[][] = [];

  for (const batch of chunk(METRIC_ENDPOINTS, Math.max(1, fetchConcurrency))) {
    const results = await Promise.all(
      batch.map(async (endpoint) => ({
        endpoint,
        result: await metricSource.fetchMetric(endpoint, scope),
      }))
    );

    for (const { endpoint, result } of results) {
      if (result.isErr()) {
        logger.warn(
          { endpoint, scope, error: result.error },
          'Metric fetch failed, using empty result'
        );
        resultSets.push([]);
        continue;
      }
      resultSets.push(renameEndpointFields(endpoint, result.value));
    }
  }

  return resultSets;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Fetches, merges, scores and (for child levels) filters the units of a scope.
 */
export async function listScopeUnits(
  deps: ListScopeUnitsDeps,
  scope: MetricScope
): Promise<ScopeUnits> {
  const level = levelForScope(scope);
  const log = deps.logger.child({ usecase: 'listScopeUnits', level });

  const resultSets = await fetchScopeMetrics({ ...deps, logger: log }, scope);
  const scored = scoreUnits(mergeMetricResults(resultSets));

  if (level === 'district' || scope.district === undefined) {
    log.debug({ count: scored.length }, 'Scored state-level units');
    return { level, units: scored };
  }

  const { kept, excluded } = partitionOutliers(scored, {
    level,
    district: scope.district,
    ...(scope.block !== undefined && { block: scope.block }),
  });

  for (const { unit, reason } of excluded) {
    log.info(
      { unit: unit.group_name, marks: unit.overall_total_marks, reason },
      `Filtered out ${level}`
    );
  }

  log.debug({ count: kept.length, excluded: excluded.length }, 'Scored child units');
  return { level, units: kept };
}
