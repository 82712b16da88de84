/**
 * Test fakes and mocks
 */

import { ok, err, type Result } from 'neverthrow';

import { createReportStorageError } from '@/modules/report/index.js';

import type {
  MetricEndpoint,
  MetricFetchError,
  MetricRecord,
  MetricScope,
  MetricSource,
} from '@/modules/performance/index.js';
import type {
  ReportFile,
  ReportStorageError,
  ReportStore,
  TextGenerationError,
  TextGenerationRequest,
  TextGenerator,
} from '@/modules/report/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Metric Source
// ─────────────────────────────────────────────────────────────────────────────

export type FakeEndpointData = Partial<Record<MetricEndpoint, MetricRecord[] | MetricFetchError>>;

export interface FakeMetricSource extends MetricSource {
  /** Every request made, in order */
  calls: { endpoint: MetricEndpoint; scope: MetricScope }[];
}

/**
 * Key for a scope in fake metric data
 */
export const scopeKey = (scope: MetricScope): string =>
  [scope.date, scope.district ?? '', scope.block ?? ''].join('|');

/**
 * Creates a metric source answering from a table keyed by `scopeKey`.
 * Endpoints without data return an empty list.
 */
export const makeFakeMetricSource = (
  data: Record<string, FakeEndpointData> = {}
): FakeMetricSource => {
  const calls: FakeMetricSource['calls'] = [];

  return {
    calls,
    async fetchMetric(
      endpoint: MetricEndpoint,
      scope: MetricScope
    ): Promise<Result<MetricRecord[], MetricFetchError>> {
      calls.push({ endpoint, scope });

      const entry = data[scopeKey(scope)]?.[endpoint];
      if (entry === undefined) {
        return ok([]);
      }
      if (Array.isArray(entry)) {
        return ok(entry);
      }
      return err(entry);
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Text Generator
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeTextGenerator extends TextGenerator {
  requests: TextGenerationRequest[];
}

/**
 * Creates a text generator that answers through `respond`.
 * By default it echoes a short fixed analysis.
 */
export const makeFakeTextGenerator = (
  respond: (request: TextGenerationRequest) => Result<string, TextGenerationError> = () =>
    ok('Generated analysis.')
): FakeTextGenerator => {
  const requests: TextGenerationRequest[] = [];

  return {
    requests,
    async generate(request) {
      requests.push(request);
      return respond(request);
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Report Store
// ─────────────────────────────────────────────────────────────────────────────

export interface InMemoryReportStore extends ReportStore {
  files: Map<string, string>;
}

/**
 * Creates a report store keeping files in memory.
 * File names listed in `failFor` fail to save.
 */
export const makeInMemoryReportStore = (failFor: string[] = []): InMemoryReportStore => {
  const files = new Map<string, string>();

  return {
    files,
    async save(file: ReportFile): Promise<Result<string, ReportStorageError>> {
      if (failFor.includes(file.fileName)) {
        return err(createReportStorageError(file.fileName, `Disk full writing ${file.fileName}`));
      }
      files.set(file.fileName, file.content);
      return ok(`memory://${file.fileName}`);
    },
  };
};
