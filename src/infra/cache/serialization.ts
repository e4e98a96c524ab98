/**
 * JSON serialization for cache values that keeps Decimal and Date instances.
 *
 * Cached values are stored as strings so callers always receive a fresh copy
 * and can never mutate what another reader will see.
 */

import { Decimal } from 'decimal.js';

import { CacheError } from './ports.js';

const DECIMAL_MARKER = '__decimal__';
const DATE_MARKER = '__date__';

const isRecord = (val: unknown): val is Record<string, unknown> =>
  val !== null && typeof val === 'object';

/**
 * Replace Decimal and Date instances with marked objects.
 * Must run before JSON.stringify, which would call their toJSON first.
 */
const encodeSpecial = (value: unknown): unknown => {
  if (Decimal.isDecimal(value)) {
    return { [DECIMAL_MARKER]: value.toString() };
  }

  if (value instanceof Date) {
    return { [DATE_MARKER]: value.toISOString() };
  }

  if (Array.isArray(value)) {
    return value.map(encodeSpecial);
  }

  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = encodeSpecial(val);
    }
    return result;
  }

  return value;
};

const decodeSpecial = (_key: string, val: unknown): unknown => {
  if (!isRecord(val)) {
    return val;
  }

  const decimal = val[DECIMAL_MARKER];
  if (typeof decimal === 'string') {
    return new Decimal(decimal);
  }

  const date = val[DATE_MARKER];
  if (typeof date === 'string') {
    return new Date(date);
  }

  return val;
};

/**
 * Serialize a value to a JSON string.
 */
export const serialize = (value: unknown): string => {
  return JSON.stringify(encodeSpecial(value));
};

/**
 * Deserialize a JSON string produced by `serialize`.
 */
export const deserialize = (
  json: string
): { ok: true; value: unknown } | { ok: false; error: CacheError } => {
  try {
    const value: unknown = JSON.parse(json, decodeSpecial);
    return { ok: true, value };
  } catch (cause) {
    return {
      ok: false,
      error: CacheError.serialization('Failed to deserialize cached value', cause),
    };
  }
};
