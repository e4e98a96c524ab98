import { describe, expect, it } from 'vitest';

import {
  DATASET_IDS,
  DATASET_SPECS,
  createDatasetRegistry,
  isDatasetId,
  makeRegionReference,
  validateDatasetSpec,
  type DatasetSpec,
} from '@/modules/dataset-registry/index.js';

const makeSpec = (overrides: Partial<DatasetSpec> = {}): DatasetSpec => ({
  id: 'communes',
  displayName: 'Communes',
  description: 'Test communes',
  publisher: 'Test Publisher',
  source: { kind: 'url', url: 'https://files.test/communes.csv' },
  columns: [
    { name: 'commune_code', type: 'text', aliases: [], required: true, onMissing: 'reject' },
    { name: 'population', type: 'integer', aliases: [], required: false, onMissing: 'zero' },
  ],
  targetTable: 'communes',
  naturalKey: ['commune_code'],
  duplicatePolicy: 'keep-last',
  refreshCadence: 'yearly',
  ...overrides,
});

describe('Dataset registry', () => {
  it('lists the built-in datasets in refresh order', () => {
    const registry = createDatasetRegistry();

    expect(registry.listDatasets().map((spec) => spec.id)).toEqual([
      'region_budgets',
      'communes',
      'regional_employment',
    ]);
  });

  it('registers every known dataset id', () => {
    expect(DATASET_SPECS.map((spec) => spec.id)).toEqual([...DATASET_IDS]);
  });

  it('looks datasets up by id', () => {
    const result = createDatasetRegistry().getDataset('regional_employment');

    expect(result._unsafeUnwrap().targetTable).toBe('region_employment');
  });

  it('returns DatasetNotFound for unknown ids', () => {
    const result = createDatasetRegistry().getDataset('unknown');

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'DatasetNotFound',
      message: "Dataset with id 'unknown' not found",
      datasetId: 'unknown',
    });
  });

  it('accepts every built-in spec', () => {
    for (const spec of DATASET_SPECS) {
      expect(validateDatasetSpec(spec).isOk()).toBe(true);
    }
  });

  it('rejects a natural key column that tolerates missing values', () => {
    const spec = makeSpec({ naturalKey: ['population'] });

    expect(validateDatasetSpec(spec)._unsafeUnwrapErr()).toEqual([
      "natural key column 'population' must be required and reject missing values",
    ]);
  });

  it('rejects an undeclared key column and a zero default on text', () => {
    const spec = makeSpec({
      naturalKey: ['code'],
      columns: [
        { name: 'commune_code', type: 'text', aliases: [], required: true, onMissing: 'zero' },
      ],
    });

    expect(validateDatasetSpec(spec)._unsafeUnwrapErr()).toEqual([
      "natural key column 'code' is not declared",
      "column 'commune_code' defaults to zero but is not numeric",
    ]);
  });

  it('rejects a date precision on a non-date column', () => {
    const spec = makeSpec({
      columns: [
        { name: 'commune_code', type: 'text', aliases: [], required: true, onMissing: 'reject' },
        {
          name: 'population',
          type: 'integer',
          aliases: [],
          required: false,
          onMissing: 'zero',
          precision: 'month',
        },
      ],
    });

    expect(validateDatasetSpec(spec)._unsafeUnwrapErr()).toEqual([
      "column 'population' has a date precision but is integer",
    ]);
  });

  it('refuses to register the same id twice', () => {
    expect(() => createDatasetRegistry([makeSpec(), makeSpec()])).toThrow(
      "Dataset 'communes' is registered twice"
    );
  });

  it('refuses to register an inconsistent spec', () => {
    expect(() => createDatasetRegistry([makeSpec({ naturalKey: [] })])).toThrow(
      "Invalid dataset spec 'communes': natural key must name at least one column"
    );
  });

  it('guards dataset ids', () => {
    expect(isDatasetId('communes')).toBe(true);
    expect(isDatasetId('region_employment')).toBe(false);
  });
});

describe('Region reference', () => {
  it('holds the 18 current regions', () => {
    const reference = makeRegionReference();

    expect(reference.size).toBe(18);
    expect(reference.get('11')).toBe('Île-de-France');
    expect(reference.get('23')).toBeUndefined();
  });
});
