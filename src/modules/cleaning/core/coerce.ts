/**
 * Value coercion from raw CSV text to semantic types.
 *
 * Pure functions; no column knows about any other.
 */

import { Decimal } from 'decimal.js';

import type { FieldValue } from './types.js';
import type { ColumnSpec, TextFormat } from '@/modules/dataset-registry/index.js';

export type CoercionOutcome =
  | { readonly kind: 'value'; readonly value: FieldValue }
  | { readonly kind: 'missing' }
  | { readonly kind: 'invalid'; readonly reason: string };

const MISSING_TOKENS = new Set(['', 'na', 'n/a', 'nd', 'n.d.', 'null', 'nan', '-']);

/**
 * True for empty cells and the placeholder tokens publishers use for "no data".
 */
export const isMissingToken = (raw: string | undefined): boolean =>
  raw === undefined || MISSING_TOKENS.has(raw.trim().toLowerCase());

// ─────────────────────────────────────────────────────────────────────────────
// Numbers
// ─────────────────────────────────────────────────────────────────────────────

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Normalizes French and English number formatting to a plain decimal string.
 *
 * @example normalizeNumericText('1 234,5')   // '1234.5'
 * @example normalizeNumericText('1.234.567,89') // '1234567.89'
 * @example normalizeNumericText('1,234,567')  // '1234567'
 */
export const normalizeNumericText = (raw: string): string => {
  const compact = raw.trim().replace(/\s/g, '');
  const lastComma = compact.lastIndexOf(',');
  const lastDot = compact.lastIndexOf('.');

  if (lastComma !== -1 && lastDot !== -1) {
    return lastComma > lastDot
      ? compact.replace(/\./g, '').replace(',', '.')
      : compact.replace(/,/g, '');
  }

  if (lastComma !== -1) {
    const commas = compact.split(',').length - 1;
    return commas === 1 ? compact.replace(',', '.') : compact.replace(/,/g, '');
  }

  return compact;
};

export const parseDecimal = (raw: string): Decimal | null => {
  const text = normalizeNumericText(raw);
  return NUMBER_PATTERN.test(text) ? new Decimal(text) : null;
};

export const parseInteger = (raw: string): number | null => {
  const value = parseDecimal(raw);
  if (value === null || !value.isInteger() || value.abs().gt(Number.MAX_SAFE_INTEGER)) {
    return null;
  }
  return value.toNumber();
};

// ─────────────────────────────────────────────────────────────────────────────
// Dates
// ─────────────────────────────────────────────────────────────────────────────

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/;
const ISO_MONTH = /^(\d{4})-(\d{1,2})$/;
const FRENCH_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

const formatDate = (year: number, month: number, day: number): string | null => {
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
};

/**
 * Parses `YYYY-MM-DD` (optionally with a time part), `YYYY-MM` and
 * `DD/MM/YYYY` into `YYYY-MM-DD`. A month alone maps to its first day.
 */
export const parseDate = (raw: string): string | null => {
  const text = raw.trim();

  const iso = ISO_DATE.exec(text);
  if (iso !== null) {
    return formatDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const month = ISO_MONTH.exec(text);
  if (month !== null) {
    return formatDate(Number(month[1]), Number(month[2]), 1);
  }

  const french = FRENCH_DATE.exec(text);
  if (french !== null) {
    return formatDate(Number(french[3]), Number(french[2]), Number(french[1]));
  }

  return null;
};

/**
 * First day of the month of a `YYYY-MM-DD` date.
 */
export const toMonthStart = (date: string): string => `${date.slice(0, 7)}-01`;

// ─────────────────────────────────────────────────────────────────────────────
// Text
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Applies a canonical identifier format.
 *
 * @example formatText('011', 'region-code')  // '11'
 * @example formatText('1', 'region-code')    // '01'
 * @example formatText('2a004', 'insee-code') // '2A004'
 */
export const formatText = (text: string, format: TextFormat): string | null => {
  switch (format) {
    case 'region-code': {
      if (!/^\d{1,3}$/.test(text)) {
        return null;
      }
      const stripped = text.replace(/^0+(?=\d)/, '');
      return stripped.padStart(2, '0');
    }
    case 'insee-code': {
      const upper = text.toUpperCase();
      if (!/^(\d{1,5}|\d[AB]\d{3})$/.test(upper)) {
        return null;
      }
      return upper.padStart(5, '0');
    }
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Coerces one raw value to its column's semantic type.
 * Missing values are reported as such and left to the missing-value policy.
 */
export const coerceValue = (column: ColumnSpec, raw: string | undefined): CoercionOutcome => {
  if (raw === undefined || isMissingToken(raw)) {
    return { kind: 'missing' };
  }

  const text = raw.trim();

  switch (column.type) {
    case 'integer': {
      const value = parseInteger(text);
      return value === null
        ? { kind: 'invalid', reason: `'${text}' is not an integer` }
        : { kind: 'value', value };
    }
    case 'decimal': {
      const value = parseDecimal(text);
      return value === null
        ? { kind: 'invalid', reason: `'${text}' is not a number` }
        : { kind: 'value', value };
    }
    case 'date': {
      const value = parseDate(text);
      if (value === null) {
        return { kind: 'invalid', reason: `'${text}' is not a date` };
      }
      return { kind: 'value', value: column.precision === 'month' ? toMonthStart(value) : value };
    }
    case 'text': {
      if (column.format === undefined) {
        return { kind: 'value', value: text };
      }
      const value = formatText(text, column.format);
      return value === null
        ? { kind: 'invalid', reason: `'${text}' is not a valid ${column.format}` }
        : { kind: 'value', value };
    }
  }
};
