import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  recordToRegionStats,
  recordToSourceEntry,
  regionStatsToRecord,
  sourceEntryToRecord,
} from '@/modules/storage/index.js';

import { makeCleaningReport, makeSourceMetadata } from '../../fixtures/builders.js';

import type { RegionStatsRecord } from '@/modules/transform/index.js';

const stats: RegionStatsRecord = {
  regionCode: '11',
  regionName: 'Île-de-France',
  year: 2023,
  population: 500,
  communeCount: 1,
  totalRevenue: new Decimal(1000),
  totalExpenditure: new Decimal(800),
  debt: null,
  revenuePerCapita: new Decimal('2.00'),
  expenditurePerCapita: new Decimal('1.60'),
  debtPerCapita: null,
  salaryMass: null,
  partialUnemploymentBase: null,
  employmentMonths: null,
};

describe('region stats mapping', () => {
  it('stores statistics under snake_case columns with the run id', () => {
    const record = regionStatsToRecord(stats, 'run-1');

    expect(record['region_code']).toBe('11');
    expect(record['revenue_per_capita']).toEqual(new Decimal('2'));
    expect(record['salary_mass']).toBeNull();
    expect(record['run_id']).toBe('run-1');
  });

  it('reads back what it stored', () => {
    expect(recordToRegionStats(regionStatsToRecord(stats, 'run-1'))).toEqual(stats);
  });

  it('reads decimals stored as text', () => {
    const parsed = recordToRegionStats({ region_code: '11', year: 2023, debt: '12.34' });

    expect(parsed?.debt?.toString()).toBe('12.34');
    expect(parsed?.population).toBeNull();
  });

  it('skips rows without their key fields', () => {
    expect(recordToRegionStats({ region_code: '11', year: null })).toBeNull();
  });
});

describe('dataset source mapping', () => {
  it('combines metadata and cleaning counts', () => {
    const metadata = makeSourceMetadata('communes');
    const report = makeCleaningReport('communes', {
      totalRows: 10,
      keptRows: 7,
      rejectedRows: 2,
      duplicateRows: 1,
    });

    const entry = recordToSourceEntry(sourceEntryToRecord(metadata, report, 'run-1'));

    expect(entry).toEqual({
      ...metadata,
      totalRows: 10,
      keptRows: 7,
      rejectedRows: 2,
      duplicateRows: 1,
      runId: 'run-1',
    });
  });

  it('skips rows with an unknown dataset id', () => {
    const record = {
      ...sourceEntryToRecord(makeSourceMetadata('communes'), makeCleaningReport('communes'), 'r'),
      dataset_id: 'elections',
    };

    expect(recordToSourceEntry(record)).toBeNull();
  });
});
