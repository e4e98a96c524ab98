import { type HealthCheckResult, type ReadinessResponse } from './types.js';

/**
 * Maps settled promises from health checkers to standardized HealthCheckResults.
 * Rejected promises are treated as critical failures.
 */
export const mapCheckResults = (
  results: PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] => {
  return results.map((result) => {
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
};

/**
 * Overall status from individual checks.
 * - Any critical unhealthy → "unhealthy"
 * - Any non-critical unhealthy → "degraded"
 * - All healthy → "ok"
 *
 * Checks without a critical flag count as critical.
 */
export const determineOverallStatus = (
  checks: HealthCheckResult[]
): 'ok' | 'degraded' | 'unhealthy' => {
  if (checks.some((c) => c.status === 'unhealthy' && c.critical !== false)) {
    return 'unhealthy';
  }
  if (checks.some((c) => c.status === 'unhealthy')) {
    return 'degraded';
  }
  return 'ok';
};

/**
 * pure business logic to determine system readiness.
 * Aggregates individual check results into a global status.
 */
export const evaluateReadiness = (
  checks: HealthCheckResult[],
  uptime: number,
  timestamp: string,
  version?: string
): ReadinessResponse => {
  return {
    status: determineOverallStatus(checks),
    timestamp,
    uptime,
    checks,
    ...(version !== undefined && { version }),
  };
};
