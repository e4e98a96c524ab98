import { err, ok, type Result } from 'neverthrow';

import { normalizeMonth, normalizePage, normalizeRegionCode } from './normalize-query.js';

import type { RegionDataError } from '../errors.js';
import type { RegionDataRepository } from '../ports.js';
import type { EmploymentMonth, Page, RawQueryInput } from '../types.js';

export interface ListEmploymentDeps {
  repo: Pick<RegionDataRepository, 'listEmployment'>;
}

/**
 * Lists monthly regional employment figures.
 */
export async function listEmployment(
  deps: ListEmploymentDeps,
  input: RawQueryInput
): Promise<Result<Page<EmploymentMonth>, RegionDataError>> {
  const page = normalizePage(input);
  if (page.isErr()) return err(page.error);

  const regionCode = normalizeRegionCode(input.regionCode);
  if (regionCode.isErr()) return err(regionCode.error);

  const month = normalizeMonth(input.month);
  if (month.isErr()) return err(month.error);

  const result = await deps.repo.listEmployment({
    ...page.value,
    ...(regionCode.value !== undefined && { regionCode: regionCode.value }),
    ...(month.value !== undefined && { month: month.value }),
  });
  if (result.isErr()) return err(result.error);

  return ok({ items: result.value, ...page.value });
}
