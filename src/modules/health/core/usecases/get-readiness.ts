import { evaluateReadiness, mapCheckResults } from '../logic.js';

import type { HealthChecker } from '../ports.js';
import type { ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * Use case to determine system readiness.
 * Executes all health checkers and aggregates the results.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;

  // Run all health checkers in parallel
  const results = await Promise.allSettled(checkers.map((checker) => checker()));

  return evaluateReadiness(mapCheckResults(results), input.uptime, input.timestamp, version);
}
