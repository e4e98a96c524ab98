/**
 * Region Data Module - Ports
 */

import type {
  Commune,
  CommunesQuery,
  EmploymentMonth,
  EmploymentQuery,
  Kpis,
  RegionBudget,
  RegionBudgetsQuery,
  RegionStatsQuery,
} from './types.js';
import type { DatabaseError } from '@/common/types/errors.js';
import type { DatasetSourceEntry } from '@/modules/storage/index.js';
import type { RegionStatsRecord } from '@/modules/transform/index.js';
import type { Result } from 'neverthrow';

/**
 * Read access to the refreshed tables.
 */
export interface RegionDataRepository {
  listRegionStats(query: RegionStatsQuery): Promise<Result<RegionStatsRecord[], DatabaseError>>;
  listRegionBudgets(query: RegionBudgetsQuery): Promise<Result<RegionBudget[], DatabaseError>>;
  listCommunes(query: CommunesQuery): Promise<Result<Commune[], DatabaseError>>;
  listEmployment(query: EmploymentQuery): Promise<Result<EmploymentMonth[], DatabaseError>>;
  listDatasetSources(): Promise<Result<DatasetSourceEntry[], DatabaseError>>;
  getKpis(): Promise<Result<Kpis, DatabaseError>>;
}
