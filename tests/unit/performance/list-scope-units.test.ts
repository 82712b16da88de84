/**
 * Unit tests for listScopeUnits / fetchScopeMetrics
 */

import { ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import {
  METRIC_ENDPOINTS,
  createHttpStatusError,
  fetchScopeMetrics,
  listScopeUnits,
  type MetricSource,
} from '@/modules/performance/index.js';

import { makeTestLogger } from '../../fixtures/builders.js';
import { makeFakeMetricSource, scopeKey } from '../../fixtures/fakes.js';

const DATE = '2025-03-19';

describe('fetchScopeMetrics', () => {
  it('requests every endpoint once, in order, when sequential', async () => {
    const metricSource = makeFakeMetricSource();

    const resultSets = await fetchScopeMetrics(
      { metricSource, logger: makeTestLogger() },
      { date: DATE }
    );

    expect(resultSets).toHaveLength(15);
    expect(metricSource.calls.map((call) => call.endpoint)).toEqual([...METRIC_ENDPOINTS]);
  });

  it('substitutes an empty set for a failed endpoint', async () => {
    const metricSource = makeFakeMetricSource({
      [scopeKey({ date: DATE })]: {
        '/api/employment_workers/labour-engagement': createHttpStatusError(
          '/api/employment_workers/labour-engagement',
          500
        ),
        '/api/employment_workers/avg-persondays': [{ group_name: 'D_A', pd_marks: 5 }],
      },
    });

    const resultSets = await fetchScopeMetrics(
      { metricSource, logger: makeTestLogger() },
      { date: DATE }
    );

    expect(resultSets[0]).toEqual([]);
    expect(resultSets[1]).toEqual([{ group_name: 'D_A', pd_marks: 5 }]);
  });

  it('keeps the labour engagement ratio apart from later ratio fields', async () => {
    const metricSource = makeFakeMetricSource({
      [scopeKey({ date: DATE })]: {
        '/api/employment_workers/labour-engagement': [{ group_name: 'D_A', ratio: 0.9 }],
        '/api/employment_workers/labour-material-ratio': [{ group_name: 'D_A', ratio: 1.5 }],
      },
    });

    const { units } = await listScopeUnits(
      { metricSource, logger: makeTestLogger() },
      { date: DATE }
    );

    expect(units[0]?.['labour_engagement_ratio']).toBe(0.9);
    expect(units[0]?.['ratio']).toBe(1.5);
  });

  it('keeps endpoint order when requests finish out of order', async () => {
    const delayed: MetricSource = {
      async fetchMetric(endpoint) {
        const index = METRIC_ENDPOINTS.indexOf(endpoint);
        await new Promise((resolve) => setTimeout(resolve, (15 - index) * 2));
        return ok([{ group_name: 'A', shared: index }]);
      },
    };

    const { units } = await listScopeUnits(
      { metricSource: delayed, logger: makeTestLogger(), fetchConcurrency: 15 },
      { date: DATE }
    );

    expect(units[0]?.['shared']).toBe(14);
  });
});

describe('listScopeUnits', () => {
  it('derives the level from the scope', async () => {
    const metricSource = makeFakeMetricSource();
    const deps = { metricSource, logger: makeTestLogger() };

    expect((await listScopeUnits(deps, { date: DATE })).level).toBe('district');
    expect((await listScopeUnits(deps, { date: DATE, district: 'D_A' })).level).toBe('block');
    expect(
      (await listScopeUnits(deps, { date: DATE, district: 'D_A', block: 'BLK_1' })).level
    ).toBe('panchayat');
  });

  it('never filters districts at state scope', async () => {
    const metricSource = makeFakeMetricSource({
      [scopeKey({ date: DATE })]: {
        '/api/employment_workers/labour-engagement': [
          { group_name: 'D_A', marks: 80 },
          { group_name: 'D_B', marks: 78 },
          { group_name: 'D_C', marks: 76 },
          { group_name: 'D_D', marks: 74 },
          { group_name: 'D_E', marks: 1 },
        ],
      },
    });

    const { units } = await listScopeUnits(
      { metricSource, logger: makeTestLogger() },
      { date: DATE }
    );

    expect(units).toHaveLength(5);
  });

  it('filters blocks that echo their district', async () => {
    const scope = { date: DATE, district: 'D_A' };
    const metricSource = makeFakeMetricSource({
      [scopeKey(scope)]: {
        '/api/employment_workers/labour-engagement': [
          { group_name: 'BLK_1', marks: 40, registered_worker: 900 },
          { group_name: 'D_A', marks: 0, registered_worker: 0 },
        ],
      },
    });

    const { units } = await listScopeUnits({ metricSource, logger: makeTestLogger() }, scope);

    expect(units.map((unit) => unit.group_name)).toEqual(['BLK_1']);
  });

  it('scores and ranks the merged units', async () => {
    const scope = { date: DATE, district: 'D_A', block: 'BLK_1' };
    const metricSource = makeFakeMetricSource({
      [scopeKey(scope)]: {
        '/api/employment_workers/labour-engagement': [
          { group_name: 'P1', marks: 2 },
          { group_name: 'P2', marks: 4 },
        ],
        '/api/employment_workers/fra-beneficiaries': [{ group_name: 'P1', total_fra_marks: 3 }],
      },
    });

    const { units } = await listScopeUnits({ metricSource, logger: makeTestLogger() }, scope);

    expect(units.map((unit) => [unit.group_name, unit.overall_total_marks])).toEqual([
      ['P1', 5],
      ['P2', 4],
    ]);
  });
});
