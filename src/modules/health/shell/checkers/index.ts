/**
 * Health checker factories
 *
 * Creates health checkers for the database and the refresh pipeline.
 */

export { makeDbHealthChecker, type DbHealthCheckerOptions } from './db-checker.js';
export { makeRefreshHealthChecker, type RefreshHealthCheckerOptions } from './refresh-checker.js';
