/**
 * NREGS Dashboard Metric Source
 *
 * HTTP adapter for the dashboard's `employment_workers` endpoints.
 * One GET per call, no retries.
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import { describeError } from '@/common/types/errors.js';

import {
  createHttpStatusError,
  createInvalidPayloadError,
  createNetworkError,
  type MetricFetchError,
} from '../../core/errors.js';

import type { MetricEndpoint } from '../../core/endpoints.js';
import type { MetricSource } from '../../core/ports.js';
import type { MetricRecord, MetricScope } from '../../core/types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface NregsMetricSourceConfig {
  /** Dashboard origin, without trailing slash */
  baseUrl: string;
  /** Static key forwarded as `x-api-key` */
  apiKey?: string | undefined;
  /** Per-request timeout; the fetch default applies when omitted */
  timeoutMs?: number | undefined;
  logger: Logger;
  /** Injectable for tests */
  fetchFn?: typeof fetch;
}

const MetricResponseSchema = Type.Object({
  results: Type.Array(Type.Unknown()),
});

const isRecord = (value: unknown): value is MetricRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds the request URL for an endpoint and scope.
 */
export const buildMetricUrl = (baseUrl: string, endpoint: string, scope: MetricScope): string => {
  const params = new URLSearchParams({ date: scope.date });
  if (scope.district !== undefined) params.set('district', scope.district);
  if (scope.block !== undefined) params.set('block', scope.block);
  return `${baseUrl}${endpoint}?${params.toString()}`;
};

/**
 * Creates a metric source backed by the NREGS MP dashboard API.
 */
export const makeNregsMetricSource = (config: NregsMetricSourceConfig): MetricSource => {
  const { baseUrl, apiKey, timeoutMs, logger, fetchFn = fetch } = config;
  const log = logger.child({ component: 'NregsMetricSource' });

  const headers: Record<string, string> = { accept: 'application/json' };
  if (apiKey !== undefined && apiKey !== '') {
    headers['x-api-key'] = apiKey;
  }

  return {
    async fetchMetric(
      endpoint: MetricEndpoint,
      scope: MetricScope
    ): Promise<Result<MetricRecord[], MetricFetchError>> {
      const url = buildMetricUrl(baseUrl, endpoint, scope);
      log.info({ url }, 'Fetching metric data');

      let response: Response;
      try {
        response = await fetchFn(url, {
          method: 'GET',
          headers,
          ...(timeoutMs !== undefined && { signal: AbortSignal.timeout(timeoutMs) }),
        });
      } catch (error) {
        log.error({ endpoint, error: describeError(error) }, 'Metric request failed');
        return err(createNetworkError(endpoint, describeError(error)));
      }

      if (!response.ok) {
        log.error({ endpoint, statusCode: response.status }, 'Metric request returned error status');
        return err(createHttpStatusError(endpoint, response.status));
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        return err(createInvalidPayloadError(endpoint, `Invalid JSON: ${describeError(error)}`));
      }

      if (!Value.Check(MetricResponseSchema, payload)) {
        return err(createInvalidPayloadError(endpoint, 'Response has no results array'));
      }

      const records = payload.results.filter(isRecord);
      log.debug({ endpoint, count: records.length }, 'Fetched metric data');
      return ok(records);
    },
  };
};
