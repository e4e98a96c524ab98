/**
 * Query input validation shared by the region data use cases.
 */

import { err, ok, type Result } from 'neverthrow';

import { formatText, parseDate } from '@/modules/cleaning/index.js';

import { createInvalidQueryError, type InvalidQueryError } from '../errors.js';
import {
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  MAX_SEARCH_LENGTH,
  type PageQuery,
  type RawQueryInput,
} from '../types.js';

const MIN_YEAR = 1900;
const MAX_YEAR = 2100;
const DEPARTMENT_CODE = /^(\d{2,3}|2[AB])$/;

export const normalizePage = (input: RawQueryInput): Result<PageQuery, InvalidQueryError> => {
  const limit = input.limit ?? DEFAULT_PAGE_LIMIT;
  const offset = input.offset ?? 0;

  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_LIMIT) {
    return err(
      createInvalidQueryError('limit', `limit must be between 1 and ${String(MAX_PAGE_LIMIT)}`)
    );
  }
  if (!Number.isInteger(offset) || offset < 0) {
    return err(createInvalidQueryError('offset', 'offset must be a non-negative integer'));
  }

  return ok({ limit, offset });
};

export const normalizeYear = (
  year: number | undefined
): Result<number | undefined, InvalidQueryError> => {
  if (year === undefined) {
    return ok(undefined);
  }
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    return err(
      createInvalidQueryError(
        'year',
        `year must be an integer between ${String(MIN_YEAR)} and ${String(MAX_YEAR)}`
      )
    );
  }
  return ok(year);
};

/**
 * Accepts INSEE region codes with or without leading zeros.
 *
 * @example normalizeRegionCode('011') // ok('11')
 */
export const normalizeRegionCode = (
  raw: string | undefined
): Result<string | undefined, InvalidQueryError> => {
  if (raw === undefined || raw.trim() === '') {
    return ok(undefined);
  }
  const code = formatText(raw.trim(), 'region-code');
  return code === null
    ? err(createInvalidQueryError('regionCode', `'${raw}' is not a region code`))
    : ok(code);
};

export const normalizeDepartmentCode = (
  raw: string | undefined
): Result<string | undefined, InvalidQueryError> => {
  if (raw === undefined || raw.trim() === '') {
    return ok(undefined);
  }
  const code = raw.trim().toUpperCase();
  return DEPARTMENT_CODE.test(code)
    ? ok(code)
    : err(createInvalidQueryError('departmentCode', `'${raw}' is not a department code`));
};

/**
 * Maps any date within a month to the month's first day.
 *
 * @example normalizeMonth('2024-03') // ok('2024-03-01')
 */
export const normalizeMonth = (
  raw: string | undefined
): Result<string | undefined, InvalidQueryError> => {
  if (raw === undefined || raw.trim() === '') {
    return ok(undefined);
  }
  const date = parseDate(raw);
  return date === null
    ? err(createInvalidQueryError('month', `'${raw}' is not a month (YYYY-MM)`))
    : ok(`${date.slice(0, 7)}-01`);
};

/**
 * Trims a free-text search term; blank means no search.
 */
export const normalizeSearch = (
  raw: string | undefined
): Result<string | undefined, InvalidQueryError> => {
  const term = raw?.trim() ?? '';
  if (term === '') {
    return ok(undefined);
  }
  if (term.length > MAX_SEARCH_LENGTH) {
    return err(
      createInvalidQueryError(
        'search',
        `search must be at most ${String(MAX_SEARCH_LENGTH)} characters`
      )
    );
  }
  return ok(term);
};
