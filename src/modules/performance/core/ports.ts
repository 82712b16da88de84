/**
 * Performance Module - Ports (Interfaces)
 *
 * Defines the interfaces for external dependencies.
 * Shell layer provides implementations.
 */

import type { MetricEndpoint } from './endpoints.js';
import type { MetricFetchError } from './errors.js';
import type { MetricRecord, MetricScope } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Source of raw dashboard rows.
 */
export interface MetricSource {
  /**
   * Fetches one endpoint's rows for a scope.
   *
   * A single attempt. Transport failures, non-success statuses and malformed
   * bodies come back as distinct error values; callers decide whether to
   * treat them as an empty result.
   */
  fetchMetric(
    endpoint: MetricEndpoint,
    scope: MetricScope
  ): Promise<Result<MetricRecord[], MetricFetchError>>;
}
