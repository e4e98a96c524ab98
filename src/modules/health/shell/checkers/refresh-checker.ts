/**
 * Refresh health checker
 *
 * Reports the outcome of the most recent refresh run. Non-critical:
 * stale data can still be served after a failed run.
 */

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';
import type { RefreshStatus } from '@/modules/refresh/index.js';

export interface RefreshHealthCheckerOptions {
  /** Name to identify this check in health check results (default: 'refresh') */
  name?: string;
}

/**
 * Creates a health checker over the refresh orchestrator's status.
 *
 * @example
 * ```typescript
 * const checker = makeRefreshHealthChecker(orchestrator);
 * const result = await checker();
 * // { name: 'refresh', status: 'healthy', message: 'idle', critical: false }
 * ```
 */
export const makeRefreshHealthChecker = (
  source: { getStatus(): RefreshStatus },
  options: RefreshHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'refresh' } = options;

  return (): Promise<HealthCheckResult> => {
    const { state, lastRun } = source.getStatus();

    if (lastRun === null) {
      return Promise.resolve({ name, status: 'healthy', message: state, critical: false });
    }

    if (lastRun.state === 'failed') {
      const reason = lastRun.error?.message ?? 'unknown error';
      return Promise.resolve({
        name,
        status: 'unhealthy',
        message: `Last refresh ${lastRun.runId} failed: ${reason}`,
        critical: false,
      });
    }

    const suffix = lastRun.degraded ? ' (degraded)' : '';
    return Promise.resolve({
      name,
      status: 'healthy',
      message: `Last refresh ${lastRun.runId} succeeded at ${lastRun.finishedAt}${suffix}`,
      critical: false,
    });
  };
};
