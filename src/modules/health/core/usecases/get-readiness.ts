import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse } from '../types.js';

/** Upper bound for a single checker before it counts as failed */
export const DEFAULT_CHECK_TIMEOUT_MS = 5000;

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
  checkTimeoutMs?: number | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * Runs a checker, rejecting when it takes longer than `timeoutMs`.
 */
const runWithTimeout = async (
  checker: HealthChecker,
  timeoutMs: number
): Promise<HealthCheckResult> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`Health check timed out after ${String(timeoutMs)}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([checker(), timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Maps settled checker promises to results.
 * Rejected checks (crash or timeout) count as critical failures.
 */
export const mapCheckResults = (
  results: PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] =>
  results.map((result) => {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    return {
      name: 'unknown',
      status: 'unhealthy',
      message: result.reason instanceof Error ? result.reason.message : 'Check failed',
      critical: true,
    };
  });

/**
 * - Any critical unhealthy → "unhealthy" (503)
 * - Any non-critical unhealthy → "degraded" (200)
 * - All healthy → "ok" (200)
 */
export const determineOverallStatus = (
  checks: HealthCheckResult[]
): 'ok' | 'degraded' | 'unhealthy' => {
  const unhealthy = checks.filter((c) => c.status === 'unhealthy');
  if (unhealthy.some((c) => c.critical !== false)) {
    return 'unhealthy';
  }
  return unhealthy.length > 0 ? 'degraded' : 'ok';
};

/**
 * Runs all health checkers in parallel and aggregates the results.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version, checkTimeoutMs = DEFAULT_CHECK_TIMEOUT_MS } = deps;
  const { uptime, timestamp } = input;

  const results = await Promise.allSettled(
    checkers.map((checker) => runWithTimeout(checker, checkTimeoutMs))
  );
  const checks = mapCheckResults(results);

  return {
    status: determineOverallStatus(checks),
    timestamp,
    uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
