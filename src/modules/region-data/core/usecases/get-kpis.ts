import { err, ok, type Result } from 'neverthrow';

import type { RegionDataError } from '../errors.js';
import type { RegionDataRepository } from '../ports.js';
import type { Kpis } from '../types.js';

export interface GetKpisDeps {
  repo: Pick<RegionDataRepository, 'getKpis'>;
}

/**
 * Headline figures for the dashboard summary.
 */
export async function getKpis(deps: GetKpisDeps): Promise<Result<Kpis, RegionDataError>> {
  const result = await deps.repo.getKpis();
  if (result.isErr()) return err(result.error);
  return ok(result.value);
}
