import { err, ok, type Result } from 'neverthrow';

import {
  normalizeDepartmentCode,
  normalizePage,
  normalizeRegionCode,
  normalizeSearch,
} from './normalize-query.js';

import type { RegionDataError } from '../errors.js';
import type { RegionDataRepository } from '../ports.js';
import type { Commune, Page, RawQueryInput } from '../types.js';

export interface ListCommunesDeps {
  repo: Pick<RegionDataRepository, 'listCommunes'>;
}

/**
 * Lists communes, optionally within one region or department and by name.
 */
export async function listCommunes(
  deps: ListCommunesDeps,
  input: RawQueryInput
): Promise<Result<Page<Commune>, RegionDataError>> {
  const page = normalizePage(input);
  if (page.isErr()) return err(page.error);

  const regionCode = normalizeRegionCode(input.regionCode);
  if (regionCode.isErr()) return err(regionCode.error);

  const departmentCode = normalizeDepartmentCode(input.departmentCode);
  if (departmentCode.isErr()) return err(departmentCode.error);

  const search = normalizeSearch(input.search);
  if (search.isErr()) return err(search.error);

  const result = await deps.repo.listCommunes({
    ...page.value,
    ...(regionCode.value !== undefined && { regionCode: regionCode.value }),
    ...(departmentCode.value !== undefined && { departmentCode: departmentCode.value }),
    ...(search.value !== undefined && { search: search.value }),
  });
  if (result.isErr()) return err(result.error);

  return ok({ items: result.value, ...page.value });
}
