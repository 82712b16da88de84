/**
 * Health module exports
 */

// Routes
export { makeHealthRoutes } from './shell/rest/routes.js';

// Health checker factories
export {
  makeMetricSourceHealthChecker,
  type MetricSourceHealthCheckerOptions,
} from './shell/checkers/metric-source-checker.js';

// Use cases
export {
  getReadiness,
  mapCheckResults,
  determineOverallStatus,
  type GetReadinessDeps,
} from './core/usecases/get-readiness.js';

// Types
export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, LivenessResponse, ReadinessResponse } from './core/types.js';
