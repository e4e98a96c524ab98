import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  coerceValue,
  formatText,
  isMissingToken,
  normalizeNumericText,
  parseDate,
  parseDecimal,
  parseInteger,
  toMonthStart,
} from '@/modules/cleaning/index.js';

import type { ColumnSpec } from '@/modules/dataset-registry/index.js';

const column = (overrides: Partial<ColumnSpec>): ColumnSpec => ({
  name: 'field',
  type: 'text',
  aliases: [],
  required: false,
  onMissing: 'null',
  ...overrides,
});

describe('isMissingToken', () => {
  it('treats blanks and placeholder tokens as missing', () => {
    for (const token of [undefined, '', '  ', 'NA', 'n/a', 'N.D.', 'null', 'NaN', '-']) {
      expect(isMissingToken(token)).toBe(true);
    }
  });

  it('keeps real values', () => {
    expect(isMissingToken('0')).toBe(false);
    expect(isMissingToken('Corse')).toBe(false);
  });
});

describe('normalizeNumericText', () => {
  it('handles French and English separators', () => {
    expect(normalizeNumericText('1 234,5')).toBe('1234.5');
    expect(normalizeNumericText('1.234.567,89')).toBe('1234567.89');
    expect(normalizeNumericText('1,234,567.25')).toBe('1234567.25');
    expect(normalizeNumericText('1,234,567')).toBe('1234567');
    expect(normalizeNumericText('12.5')).toBe('12.5');
  });
});

describe('parseDecimal', () => {
  it('keeps full precision', () => {
    expect(parseDecimal('0,1')?.plus('0.2').toString()).toBe('0.3');
    expect(parseDecimal('123456789012345678,12')?.toString()).toBe('123456789012345678.12');
  });

  it('accepts exponents and signs', () => {
    expect(parseDecimal('-1.5e3')?.toNumber()).toBe(-1500);
  });

  it('rejects non-numeric text', () => {
    expect(parseDecimal('abc')).toBeNull();
    expect(parseDecimal('12abc')).toBeNull();
  });
});

describe('parseInteger', () => {
  it('accepts whole numbers only', () => {
    expect(parseInteger('2023')).toBe(2023);
    expect(parseInteger('2 165 423')).toBe(2165423);
    expect(parseInteger('12,5')).toBeNull();
  });

  it('rejects values beyond the safe integer range', () => {
    expect(parseInteger('9007199254740993')).toBeNull();
  });
});

describe('parseDate', () => {
  it('normalizes supported formats to YYYY-MM-DD', () => {
    expect(parseDate('2023-01-31')).toBe('2023-01-31');
    expect(parseDate('2023-1-5T00:00:00')).toBe('2023-01-05');
    expect(parseDate('2023-03')).toBe('2023-03-01');
    expect(parseDate('31/12/2023')).toBe('2023-12-31');
  });

  it('rejects impossible dates', () => {
    expect(parseDate('2023-02-29')).toBeNull();
    expect(parseDate('2023-13')).toBeNull();
    expect(parseDate('janvier 2023')).toBeNull();
  });

  it('accepts leap days', () => {
    expect(parseDate('29/02/2024')).toBe('2024-02-29');
  });
});

describe('formatText', () => {
  it('canonicalizes region codes', () => {
    expect(formatText('011', 'region-code')).toBe('11');
    expect(formatText('1', 'region-code')).toBe('01');
    expect(formatText('84', 'region-code')).toBe('84');
    expect(formatText('IDF', 'region-code')).toBeNull();
  });

  it('canonicalizes INSEE commune codes', () => {
    expect(formatText('1001', 'insee-code')).toBe('01001');
    expect(formatText('2a004', 'insee-code')).toBe('2A004');
    expect(formatText('750560', 'insee-code')).toBeNull();
  });
});

describe('coerceValue', () => {
  it('reports missing values without applying a policy', () => {
    expect(coerceValue(column({ type: 'decimal', onMissing: 'zero' }), 'n/a')).toEqual({
      kind: 'missing',
    });
    expect(coerceValue(column({}), undefined)).toEqual({ kind: 'missing' });
  });

  it('coerces each semantic type', () => {
    expect(coerceValue(column({ type: 'integer' }), ' 2023 ')).toEqual({
      kind: 'value',
      value: 2023,
    });
    expect(coerceValue(column({ type: 'decimal' }), '1 000,50')).toEqual({
      kind: 'value',
      value: new Decimal('1000.5'),
    });
    expect(coerceValue(column({ type: 'date' }), '2023-01')).toEqual({
      kind: 'value',
      value: '2023-01-01',
    });
    expect(coerceValue(column({ type: 'text' }), '  Corse ')).toEqual({
      kind: 'value',
      value: 'Corse',
    });
  });

  it('truncates dates on month-precision columns to the first of the month', () => {
    const monthly = column({ type: 'date', precision: 'month' });

    expect(coerceValue(monthly, '2023-01-31')).toEqual({ kind: 'value', value: '2023-01-01' });
    expect(coerceValue(monthly, '15/02/2023')).toEqual({ kind: 'value', value: '2023-02-01' });
    expect(coerceValue(column({ type: 'date' }), '2023-01-31')).toEqual({
      kind: 'value',
      value: '2023-01-31',
    });
    expect(toMonthStart('2024-12-09')).toBe('2024-12-01');
  });

  it('explains why a value is invalid', () => {
    expect(coerceValue(column({ type: 'integer' }), 'abc')).toEqual({
      kind: 'invalid',
      reason: "'abc' is not an integer",
    });
    expect(coerceValue(column({ type: 'text', format: 'region-code' }), 'IDF')).toEqual({
      kind: 'invalid',
      reason: "'IDF' is not a valid region-code",
    });
  });
});
