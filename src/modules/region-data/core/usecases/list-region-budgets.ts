import { err, ok, type Result } from 'neverthrow';

import { normalizePage, normalizeRegionCode, normalizeYear } from './normalize-query.js';

import type { RegionDataError } from '../errors.js';
import type { RegionDataRepository } from '../ports.js';
import type { Page, RawQueryInput, RegionBudget } from '../types.js';

export interface ListRegionBudgetsDeps {
  repo: Pick<RegionDataRepository, 'listRegionBudgets'>;
}

/**
 * Lists cleaned regional budget rows.
 */
export async function listRegionBudgets(
  deps: ListRegionBudgetsDeps,
  input: RawQueryInput
): Promise<Result<Page<RegionBudget>, RegionDataError>> {
  const page = normalizePage(input);
  if (page.isErr()) return err(page.error);

  const year = normalizeYear(input.year);
  if (year.isErr()) return err(year.error);

  const regionCode = normalizeRegionCode(input.regionCode);
  if (regionCode.isErr()) return err(regionCode.error);

  const result = await deps.repo.listRegionBudgets({
    ...page.value,
    ...(year.value !== undefined && { year: year.value }),
    ...(regionCode.value !== undefined && { regionCode: regionCode.value }),
  });
  if (result.isErr()) return err(result.error);

  return ok({ items: result.value, ...page.value });
}
