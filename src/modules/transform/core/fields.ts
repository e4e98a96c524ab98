/**
 * Typed accessors over CleanRecord fields.
 */

import { Decimal } from 'decimal.js';

import type { CleanRecord } from '@/modules/cleaning/index.js';

export const textField = (record: CleanRecord, name: string): string | null => {
  const value = record[name];
  return typeof value === 'string' && value !== '' ? value : null;
};

export const integerField = (record: CleanRecord, name: string): number | null => {
  const value = record[name];
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
};

export const decimalField = (record: CleanRecord, name: string): Decimal | null => {
  const value = record[name];
  if (Decimal.isDecimal(value)) {
    return value;
  }
  return typeof value === 'number' ? new Decimal(value) : null;
};

/**
 * Adds a value to a running sum where null means "no contribution".
 */
export const addNullable = (sum: Decimal | null, value: Decimal | null): Decimal | null => {
  if (value === null) {
    return sum;
  }
  return sum === null ? value : sum.plus(value);
};
