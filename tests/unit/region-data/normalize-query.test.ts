import { describe, expect, it } from 'vitest';

import {
  DEFAULT_PAGE_LIMIT,
  normalizeDepartmentCode,
  normalizeMonth,
  normalizePage,
  normalizeRegionCode,
  normalizeYear,
} from '@/modules/region-data/index.js';

describe('normalizePage', () => {
  it('applies defaults', () => {
    expect(normalizePage({})._unsafeUnwrap()).toEqual({ limit: DEFAULT_PAGE_LIMIT, offset: 0 });
  });

  it('rejects out-of-range limits', () => {
    expect(normalizePage({ limit: 0 })._unsafeUnwrapErr()).toEqual({
      type: 'InvalidQuery',
      message: 'limit must be between 1 and 1000',
      field: 'limit',
    });
    expect(normalizePage({ limit: 1001 }).isErr()).toBe(true);
    expect(normalizePage({ limit: 1000 }).isOk()).toBe(true);
  });

  it('rejects negative offsets', () => {
    expect(normalizePage({ offset: -1 })._unsafeUnwrapErr().field).toBe('offset');
  });
});

describe('normalizeYear', () => {
  it('passes through absent and valid years', () => {
    expect(normalizeYear(undefined)._unsafeUnwrap()).toBeUndefined();
    expect(normalizeYear(2023)._unsafeUnwrap()).toBe(2023);
  });

  it('rejects years out of range', () => {
    expect(normalizeYear(1899)._unsafeUnwrapErr().message).toBe(
      'year must be an integer between 1900 and 2100'
    );
    expect(normalizeYear(2023.5).isErr()).toBe(true);
  });
});

describe('normalizeRegionCode', () => {
  it('canonicalizes leading zeros', () => {
    expect(normalizeRegionCode('011')._unsafeUnwrap()).toBe('11');
    expect(normalizeRegionCode('1')._unsafeUnwrap()).toBe('01');
  });

  it('treats blank input as absent', () => {
    expect(normalizeRegionCode('  ')._unsafeUnwrap()).toBeUndefined();
  });

  it('rejects non-numeric codes', () => {
    expect(normalizeRegionCode('IDF')._unsafeUnwrapErr()).toEqual({
      type: 'InvalidQuery',
      message: "'IDF' is not a region code",
      field: 'regionCode',
    });
  });
});

describe('normalizeDepartmentCode', () => {
  it('accepts metropolitan, overseas and Corsican codes', () => {
    expect(normalizeDepartmentCode('75')._unsafeUnwrap()).toBe('75');
    expect(normalizeDepartmentCode('974')._unsafeUnwrap()).toBe('974');
    expect(normalizeDepartmentCode('2a')._unsafeUnwrap()).toBe('2A');
  });

  it('rejects anything else', () => {
    expect(normalizeDepartmentCode('7')._unsafeUnwrapErr().field).toBe('departmentCode');
  });
});

describe('normalizeMonth', () => {
  it('maps any date within a month to its first day', () => {
    expect(normalizeMonth('2024-03')._unsafeUnwrap()).toBe('2024-03-01');
    expect(normalizeMonth('2024-03-17')._unsafeUnwrap()).toBe('2024-03-01');
    expect(normalizeMonth('17/03/2024')._unsafeUnwrap()).toBe('2024-03-01');
  });

  it('rejects unparseable months', () => {
    expect(normalizeMonth('March')._unsafeUnwrapErr().message).toBe(
      "'March' is not a month (YYYY-MM)"
    );
  });
});
