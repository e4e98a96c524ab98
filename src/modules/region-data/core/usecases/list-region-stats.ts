import { err, ok, type Result } from 'neverthrow';

import { normalizePage, normalizeRegionCode, normalizeYear } from './normalize-query.js';

import type { RegionDataError } from '../errors.js';
import type { RegionDataRepository } from '../ports.js';
import type { Page, RawQueryInput } from '../types.js';
import type { RegionStatsRecord } from '@/modules/transform/index.js';

export interface ListRegionStatsDeps {
  repo: Pick<RegionDataRepository, 'listRegionStats'>;
}

/**
 * Lists derived region statistics, ordered by region code then year.
 */
export async function listRegionStats(
  deps: ListRegionStatsDeps,
  input: RawQueryInput
): Promise<Result<Page<RegionStatsRecord>, RegionDataError>> {
  const page = normalizePage(input);
  if (page.isErr()) return err(page.error);

  const year = normalizeYear(input.year);
  if (year.isErr()) return err(year.error);

  const regionCode = normalizeRegionCode(input.regionCode);
  if (regionCode.isErr()) return err(regionCode.error);

  const result = await deps.repo.listRegionStats({
    ...page.value,
    ...(year.value !== undefined && { year: year.value }),
    ...(regionCode.value !== undefined && { regionCode: regionCode.value }),
  });
  if (result.isErr()) return err(result.error);

  return ok({ items: result.value, ...page.value });
}
