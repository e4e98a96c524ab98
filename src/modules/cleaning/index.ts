/**
 * Cleaning Module - Public API
 *
 * Normalizes, coerces and deduplicates raw rows into CleanRecords.
 */

export type {
  FieldValue,
  CleanRecord,
  CleaningReport,
  CleanOutput,
} from './core/types.js';
export { MAX_REPORTED_FAILURES } from './core/types.js';

export {
  coerceValue,
  isMissingToken,
  normalizeNumericText,
  parseDecimal,
  parseInteger,
  parseDate,
  toMonthStart,
  formatText,
  type CoercionOutcome,
} from './core/coerce.js';

export { cleanRecords, cleanDataset, naturalKeyOf } from './core/clean.js';
