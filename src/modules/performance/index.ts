/**
 * Performance Module Public API
 *
 * Fetches NREGS dashboard metrics for a state, district or block scope,
 * merges them per unit, scores and grades every unit, filters broken
 * child rows and builds the nested state → district → block summary.
 */

// ============================================================================
// Core Types
// ============================================================================

export type {
  UnitLevel,
  MetricScope,
  MetricRecord,
  MergedUnit,
  Grade,
  ScoredUnit,
  ComponentKey,
  ScoreComponent,
  ComponentMarks,
  UnitPerformance,
  StateAverageComparison,
  RankedSlices,
  PanchayatList,
  BlockDetail,
  SelectedDistrict,
  SummaryMetadata,
  PerformanceSummary,
  HierarchySnapshot,
} from './core/types.js';

export { levelForScope } from './core/types.js';

export {
  METRIC_ENDPOINTS,
  MAX_MARKS,
  GRADE_THRESHOLDS,
  OUTLIER_MIN_UNITS,
  OUTLIER_SHORTFALL,
  type MetricEndpoint,
} from './core/endpoints.js';

// ============================================================================
// Errors
// ============================================================================

export type {
  MetricFetchError,
  HttpStatusError,
  NetworkError,
  InvalidPayloadError,
  PerformanceError,
  StateDataUnavailableError,
} from './core/errors.js';

export {
  createHttpStatusError,
  createNetworkError,
  createInvalidPayloadError,
  createStateDataUnavailableError,
  getHttpStatusForError,
} from './core/errors.js';

// ============================================================================
// Ports
// ============================================================================

export type { MetricSource } from './core/ports.js';

// ============================================================================
// Pure Logic
// ============================================================================

export {
  SCORE_COMPONENTS,
  readMark,
  readIndicator,
  componentTotal,
  toComponentMarks,
  findComponent,
} from './core/components.js';
export { mergeMetricResults, renameEndpointFields } from './core/merge.js';
export { scoreUnits, computeOverallMarks, gradeFor } from './core/score.js';
export { round2 } from './core/rounding.js';
export { filterOutliers, partitionOutliers, type OutlierScope } from './core/outliers.js';
export {
  rankedSlices,
  panchayatSlices,
  calculateAverageMarks,
  compareToStateAverage,
  findRankedUnit,
  toUnitPerformance,
} from './core/ranking.js';

// ============================================================================
// Use Cases
// ============================================================================

export {
  listScopeUnits,
  fetchScopeMetrics,
  type ListScopeUnitsDeps,
  type ScopeUnits,
} from './core/usecases/list-scope-units.js';

export {
  buildPerformanceSummary,
  type BuildPerformanceSummaryDeps,
  type BuildPerformanceSummaryInput,
  type BuildPerformanceSummaryResult,
} from './core/usecases/build-performance-summary.js';

// ============================================================================
// Shell
// ============================================================================

export {
  makeNregsMetricSource,
  buildMetricUrl,
  type NregsMetricSourceConfig,
} from './shell/repo/nregs-metric-source.js';

export {
  makePerformanceRoutes,
  type MakePerformanceRoutesDeps,
} from './shell/rest/routes.js';
