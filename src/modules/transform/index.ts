/**
 * Transform Module - Public API
 *
 * Joins clean datasets into per-region statistics.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  RegionStatsRecord,
  TransformSource,
  TransformInput,
  TransformReport,
  TransformOutput,
} from './core/types.js';
export { MAX_EXCLUDED_SAMPLES } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic
// ─────────────────────────────────────────────────────────────────────────────

export { transformRegions, perCapita, cleanBudgetLabel } from './core/transform.js';
export { addNullable, decimalField, integerField, textField } from './core/fields.js';
