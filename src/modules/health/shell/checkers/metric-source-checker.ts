/**
 * Metrics API health checker
 *
 * Requests the state-level labour engagement metric for today and reports
 * unhealthy on any fetch error. An empty result still counts as healthy.
 */

import type { MetricSource } from '@/modules/performance/index.js';
import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

export interface MetricSourceHealthCheckerOptions {
  /** Name to identify this dependency in health check results */
  name?: string;
  /** Date probed; defaults to the current UTC date */
  today?: () => string;
}

const currentDate = (): string => new Date().toISOString().slice(0, 10);

export const makeMetricSourceHealthChecker = (
  metricSource: MetricSource,
  options: MetricSourceHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'metrics-api', today = currentDate } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    const result = await metricSource.fetchMetric('/api/employment_workers/labour-engagement', {
      date: today(),
    });
    const latencyMs = Date.now() - startTime;

    if (result.isErr()) {
      return {
        name,
        status: 'unhealthy',
        message: result.error.message,
        latencyMs,
        critical: true,
      };
    }

    return { name, status: 'healthy', latencyMs, critical: true };
  };
};
