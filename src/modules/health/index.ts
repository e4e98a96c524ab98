/**
 * Health module exports
 */

// Routes
export { makeHealthRoutes } from './shell/rest/routes.js';

// Health checker factories
export {
  makeDbHealthChecker,
  makeRefreshHealthChecker,
  type DbHealthCheckerOptions,
  type RefreshHealthCheckerOptions,
} from './shell/checkers/index.js';

// Use cases
export { getReadiness, type GetReadinessDeps } from './core/usecases/get-readiness.js';

// Types
export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, LivenessResponse, ReadinessResponse } from './core/types.js';
