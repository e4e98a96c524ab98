/**
 * Region Data REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { MAX_PAGE_LIMIT, MAX_SEARCH_LENGTH } from '../../core/types.js';

const PageFields = {
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_PAGE_LIMIT })),
  offset: Type.Optional(Type.Integer({ minimum: 0 })),
};

const RegionCode = Type.String({
  minLength: 1,
  maxLength: 3,
  description: 'INSEE region code, e.g. 11 for Île-de-France',
});

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const RegionYearQuerySchema = Type.Object(
  {
    year: Type.Optional(Type.Integer({ minimum: 1900, maximum: 2100 })),
    regionCode: Type.Optional(RegionCode),
    ...PageFields,
  },
  { additionalProperties: false }
);

export type RegionYearQuery = Static<typeof RegionYearQuerySchema>;

export const CommunesQuerySchema = Type.Object(
  {
    regionCode: Type.Optional(RegionCode),
    departmentCode: Type.Optional(Type.String({ minLength: 2, maxLength: 3 })),
    search: Type.Optional(
      Type.String({ maxLength: MAX_SEARCH_LENGTH, description: 'Part of the commune name' })
    ),
    ...PageFields,
  },
  { additionalProperties: false }
);

export type CommunesQueryString = Static<typeof CommunesQuerySchema>;

export const EmploymentQuerySchema = Type.Object(
  {
    regionCode: Type.Optional(RegionCode),
    month: Type.Optional(Type.String({ description: 'YYYY-MM' })),
    ...PageFields,
  },
  { additionalProperties: false }
);

export type EmploymentQueryString = Static<typeof EmploymentQuerySchema>;
