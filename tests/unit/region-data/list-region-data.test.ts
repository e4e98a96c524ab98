import { Decimal } from 'decimal.js';
import { err } from 'neverthrow';
import { beforeEach, describe, expect, it } from 'vitest';

import { createDatabaseError } from '@/common/types/errors.js';
import {
  getKpis,
  listCommunes,
  listEmployment,
  listRegionBudgets,
  listRegionStats,
  makeRegionDataRepo,
  type RegionDataRepository,
} from '@/modules/region-data/index.js';
import {
  makeMemoryStorageGateway,
  TABLE_DEFINITIONS,
  type MemoryStorageGateway,
} from '@/modules/storage/index.js';

import { makeTestLogger } from '../../fixtures/builders.js';

const budget = (year: number, regionCode: string, recettes: string) => ({
  year,
  region_code: regionCode,
  region_name: `REG ${regionCode}`,
  recettes: new Decimal(recettes),
  depenses: null,
  dette: null,
});

const stats = (regionCode: string, year: number) => ({
  region_code: regionCode,
  region_name: null,
  year,
  population: 500,
  revenue_per_capita: new Decimal('2.00'),
  run_id: 'run-1',
});

describe('region data use cases', () => {
  let storage: MemoryStorageGateway;
  let repo: RegionDataRepository;

  beforeEach(async () => {
    storage = makeMemoryStorageGateway({ logger: makeTestLogger() });
    repo = makeRegionDataRepo({ storage });

    await storage.upsertBatch(
      'region_budgets',
      [budget(2023, '11', '1000'), budget(2022, '11', '900'), budget(2023, '53', '400')],
      ['year', 'region_code']
    );
    await storage.upsertBatch(
      'region_stats',
      [stats('53', 2023), stats('11', 2023), stats('11', 2022)],
      TABLE_DEFINITIONS.region_stats.naturalKey
    );
    await storage.upsertBatch(
      'communes',
      [
        {
          commune_code: '75056',
          commune_name: 'Paris',
          region_code: '11',
          department_code: '75',
          population: 500,
        },
        {
          commune_code: '35238',
          commune_name: 'Rennes',
          region_code: '53',
          department_code: '35',
          population: 220,
        },
        {
          commune_code: '2A004',
          commune_name: 'Ajaccio',
          region_code: '94',
          department_code: '2A',
          population: 70,
        },
      ],
      ['commune_code']
    );
    await storage.upsertBatch(
      'region_employment',
      [
        { region_code: '11', month: '2023-01-01', salary_mass: new Decimal('100') },
        { region_code: '11', month: '2023-02-01', salary_mass: new Decimal('110') },
      ],
      ['region_code', 'month']
    );
  });

  it('lists region stats ordered by region then year', async () => {
    const page = (await listRegionStats({ repo }, {}))._unsafeUnwrap();

    expect(page.limit).toBe(100);
    expect(page.offset).toBe(0);
    expect(page.items.map((s) => [s.regionCode, s.year])).toEqual([
      ['11', 2022],
      ['11', 2023],
      ['53', 2023],
    ]);
    expect(page.items[0]?.revenuePerCapita?.toFixed(2)).toBe('2.00');
  });

  it('filters region stats by year and canonical region code', async () => {
    const page = (await listRegionStats({ repo }, { year: 2023, regionCode: '011' }))._unsafeUnwrap();

    expect(page.items.map((s) => [s.regionCode, s.year])).toEqual([['11', 2023]]);
  });

  it('pages budget rows', async () => {
    const page = (await listRegionBudgets({ repo }, { limit: 1, offset: 1 }))._unsafeUnwrap();

    expect(page.items).toHaveLength(1);
    expect(page.items[0]?.regionCode).toBe('11');
    expect(page.items[0]?.year).toBe(2023);
    expect(page.items[0]?.recettes?.toString()).toBe('1000');
  });

  it('filters communes by department', async () => {
    const page = (await listCommunes({ repo }, { departmentCode: '2a' }))._unsafeUnwrap();

    expect(page.items.map((c) => c.communeCode)).toEqual(['2A004']);
  });

  it('searches communes by part of their name, ignoring case', async () => {
    const page = (await listCommunes({ repo }, { search: ' REN ' }))._unsafeUnwrap();

    expect(page.items.map((c) => c.communeName)).toEqual(['Rennes']);
  });

  it('combines the name search with the other filters', async () => {
    const page = (
      await listCommunes({ repo }, { search: 'a', regionCode: '94' })
    )._unsafeUnwrap();

    expect(page.items.map((c) => c.communeCode)).toEqual(['2A004']);
  });

  it('treats a blank search as no search', async () => {
    const page = (await listCommunes({ repo }, { search: '   ' }))._unsafeUnwrap();

    expect(page.items).toHaveLength(3);
  });

  it('rejects an overlong search term', async () => {
    const result = await listCommunes({ repo }, { search: 'x'.repeat(101) });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'InvalidQuery',
      message: 'search must be at most 100 characters',
      field: 'search',
    });
  });

  it('summarises communes and budgets', async () => {
    const kpis = (await getKpis({ repo }))._unsafeUnwrap();

    expect(kpis).toEqual({
      totalCommunes: 3,
      totalRegions: 2,
      totalPopulation: 790,
      budgetYearRange: { min: 2022, max: 2023 },
    });
  });

  it('reports an empty year range before any refresh', async () => {
    const empty = makeRegionDataRepo({
      storage: makeMemoryStorageGateway({ logger: makeTestLogger() }),
    });

    const kpis = (await getKpis({ repo: empty }))._unsafeUnwrap();

    expect(kpis).toEqual({
      totalCommunes: 0,
      totalRegions: 0,
      totalPopulation: 0,
      budgetYearRange: { min: null, max: null },
    });
  });

  it('filters employment by month', async () => {
    const page = (await listEmployment({ repo }, { month: '2023-02' }))._unsafeUnwrap();

    expect(page.items).toHaveLength(1);
    expect(page.items[0]?.salaryMass?.toString()).toBe('110');
  });

  it('rejects invalid input before reading', async () => {
    const calls: unknown[] = [];
    const spyRepo: Pick<RegionDataRepository, 'listRegionStats'> = {
      listRegionStats: async (query) => {
        calls.push(query);
        return repo.listRegionStats(query);
      },
    };

    const result = await listRegionStats({ repo: spyRepo }, { regionCode: 'IDF' });

    expect(result._unsafeUnwrapErr().type).toBe('InvalidQuery');
    expect(calls).toEqual([]);
  });

  it('propagates repository errors', async () => {
    const failing: Pick<RegionDataRepository, 'listCommunes'> = {
      listCommunes: async () => err(createDatabaseError('Read failed')),
    };

    const result = await listCommunes({ repo: failing }, {});

    expect(result._unsafeUnwrapErr().type).toBe('DatabaseError');
  });
});
