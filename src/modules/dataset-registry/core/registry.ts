/**
 * Dataset Registry
 *
 * Static catalog of the open-data extracts the refresh pipeline pulls.
 * Specs are immutable and defined at process start.
 *
 * Column aliases are compared after header normalization (lower case,
 * no diacritics, non-alphanumerics collapsed to `_`), so `Code Région`
 * and `code_region` both match the alias `code_region`.
 */

import { err, ok, type Result } from 'neverthrow';

import { createDatasetNotFoundError, type DatasetNotFoundError } from '@/common/types/errors.js';

import type { ColumnSpec, DatasetSpec } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Specs
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Regional budget accounts, one row per region per fiscal year.
 * Source: DGFiP via data.gouv.fr (2008 onwards).
 */
const REGION_BUDGETS: DatasetSpec = {
  id: 'region_budgets',
  displayName: 'Comptes individuels des régions',
  description: 'Revenue, expenditure and outstanding debt of each region per fiscal year.',
  publisher: 'DGFiP',
  source: {
    kind: 'data-gouv',
    slug: 'comptes-individuels-des-regions-fichier-global-a-compter-de-2008',
  },
  delimiter: ';',
  columns: [
    {
      name: 'year',
      type: 'integer',
      aliases: ['exer', 'exercice', 'annee'],
      required: true,
      onMissing: 'reject',
    },
    {
      name: 'region_code',
      type: 'text',
      aliases: ['reg', 'code_region', 'reg_code'],
      required: true,
      onMissing: 'reject',
      format: 'region-code',
    },
    {
      name: 'region_name',
      type: 'text',
      aliases: ['lbudg', 'libelle_budget', 'nom_region', 'region'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'recettes',
      type: 'decimal',
      aliases: ['recettes_totales', 'rec_totales', 'total_revenue'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'depenses',
      type: 'decimal',
      aliases: ['depenses_totales', 'dep_totales', 'total_expenditure'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'dette',
      type: 'decimal',
      aliases: ['encours_de_dette', 'encours_dette', 'debt'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'operating_revenue',
      type: 'decimal',
      aliases: ['rec_totales_f', 'recettes_fonctionnement'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'operating_expenditure',
      type: 'decimal',
      aliases: ['dep_totales_f', 'depenses_fonctionnement'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'investment_revenue',
      type: 'decimal',
      aliases: ['rec_totales_i', 'recettes_investissement'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'investment_expenditure',
      type: 'decimal',
      aliases: ['dep_totales_i', 'depenses_investissement'],
      required: false,
      onMissing: 'null',
    },
  ],
  targetTable: 'region_budgets',
  naturalKey: ['year', 'region_code'],
  duplicatePolicy: 'keep-last',
  refreshCadence: 'yearly',
};

/**
 * Communes with their department and region attachment and legal population.
 * The region columns are the commune→region mapping used by the transformer.
 */
const COMMUNES: DatasetSpec = {
  id: 'communes',
  displayName: 'Communes et villes de France',
  description: 'Commune reference with population, area and administrative attachment.',
  publisher: 'data.gouv.fr',
  source: {
    kind: 'data-gouv',
    slug: 'communes-et-villes-de-france-en-csv-excel-json-parquet-et-feather',
  },
  delimiter: ',',
  columns: [
    {
      name: 'commune_code',
      type: 'text',
      aliases: ['code_insee', 'code_commune_insee', 'codgeo', 'com'],
      required: true,
      onMissing: 'reject',
      format: 'insee-code',
    },
    {
      name: 'commune_name',
      type: 'text',
      aliases: ['nom_standard', 'nom_commune', 'libgeo', 'nom'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'region_code',
      type: 'text',
      aliases: ['reg_code', 'code_region', 'reg'],
      required: false,
      onMissing: 'null',
      format: 'region-code',
    },
    {
      name: 'region_name',
      type: 'text',
      aliases: ['reg_nom', 'nom_region', 'region'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'department_code',
      type: 'text',
      aliases: ['dep_code', 'code_departement', 'dep'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'department_name',
      type: 'text',
      aliases: ['dep_nom', 'nom_departement'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'population',
      type: 'integer',
      aliases: ['pmun', 'ptot', 'pop'],
      required: true,
      onMissing: 'reject',
    },
    {
      name: 'area_km2',
      type: 'decimal',
      aliases: ['superficie_km2', 'superficie', 'surface'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'density',
      type: 'decimal',
      aliases: ['densite'],
      required: false,
      onMissing: 'null',
    },
  ],
  targetTable: 'communes',
  naturalKey: ['commune_code'],
  duplicatePolicy: 'keep-last',
  refreshCadence: 'yearly',
};

/**
 * Monthly private-sector payroll and partial-unemployment base per region.
 * Source: Urssaf. Months without partial unemployment are published blank.
 */
const REGIONAL_EMPLOYMENT: DatasetSpec = {
  id: 'regional_employment',
  displayName: 'Masse salariale et assiette chômage partiel par région',
  description: 'Monthly gross payroll and partial-unemployment base of the private sector.',
  publisher: 'Urssaf',
  source: {
    kind: 'data-gouv',
    slug: 'masse-salariale-et-assiette-chomage-partiel-mensuelles-du-secteur-prive-par-region',
  },
  delimiter: ';',
  columns: [
    {
      name: 'region_code',
      type: 'text',
      aliases: ['code_region', 'reg', 'reg_code'],
      required: true,
      onMissing: 'reject',
      format: 'region-code',
    },
    {
      name: 'region_name',
      type: 'text',
      aliases: ['region', 'nom_region', 'libelle_region'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'month',
      type: 'date',
      aliases: ['mois', 'dernier_jour_du_mois', 'periode', 'date'],
      required: true,
      onMissing: 'reject',
      precision: 'month',
    },
    {
      name: 'salary_mass',
      type: 'decimal',
      aliases: ['masse_salariale_brute', 'masse_salariale'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'partial_unemployment_base',
      type: 'decimal',
      aliases: ['assiette_chomage_partiel', 'assiette_du_chomage_partiel', 'chomage_partiel'],
      required: false,
      onMissing: 'zero',
    },
    {
      name: 'salary_yoy_change',
      type: 'decimal',
      aliases: ['glissement_annuel_masse_salariale', 'evolution_annuelle'],
      required: false,
      onMissing: 'null',
    },
    {
      name: 'partial_unemployment_share',
      type: 'decimal',
      aliases: ['part_chomage_partiel', 'part_de_l_assiette_chomage_partiel'],
      required: false,
      onMissing: 'null',
    },
  ],
  targetTable: 'region_employment',
  naturalKey: ['region_code', 'month'],
  duplicatePolicy: 'reject-all',
  refreshCadence: 'monthly',
};

/**
 * All registered datasets, in refresh order.
 */
export const DATASET_SPECS: readonly DatasetSpec[] = [REGION_BUDGETS, COMMUNES, REGIONAL_EMPLOYMENT];

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

const isNumeric = (column: ColumnSpec): boolean =>
  column.type === 'integer' || column.type === 'decimal';

/**
 * Checks a spec for internal consistency.
 * @returns The spec, or the list of problems found
 */
export const validateDatasetSpec = (spec: DatasetSpec): Result<DatasetSpec, string[]> => {
  const problems: string[] = [];
  const byName = new Map(spec.columns.map((column) => [column.name, column]));

  if (byName.size !== spec.columns.length) {
    problems.push('column names must be unique');
  }

  if (spec.naturalKey.length === 0) {
    problems.push('natural key must name at least one column');
  }

  for (const keyColumn of spec.naturalKey) {
    const column = byName.get(keyColumn);
    if (column === undefined) {
      problems.push(`natural key column '${keyColumn}' is not declared`);
    } else if (!column.required || column.onMissing !== 'reject') {
      problems.push(`natural key column '${keyColumn}' must be required and reject missing values`);
    }
  }

  for (const column of spec.columns) {
    if (column.onMissing === 'zero' && !isNumeric(column)) {
      problems.push(`column '${column.name}' defaults to zero but is not numeric`);
    }
    if (column.format !== undefined && column.type !== 'text') {
      problems.push(`column '${column.name}' has a text format but is ${column.type}`);
    }
    if (column.precision !== undefined && column.type !== 'date') {
      problems.push(`column '${column.name}' has a date precision but is ${column.type}`);
    }
  }

  return problems.length === 0 ? ok(spec) : err(problems);
};

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export interface DatasetRegistry {
  /** Datasets in registration order */
  listDatasets(): readonly DatasetSpec[];
  getDataset(id: string): Result<DatasetSpec, DatasetNotFoundError>;
}

/**
 * Creates a registry over the given specs.
 * @throws Error if a spec is inconsistent or an id is registered twice
 */
export const createDatasetRegistry = (
  specs: readonly DatasetSpec[] = DATASET_SPECS
): DatasetRegistry => {
  const byId = new Map<string, DatasetSpec>();

  for (const spec of specs) {
    const validation = validateDatasetSpec(spec);
    if (validation.isErr()) {
      throw new Error(`Invalid dataset spec '${spec.id}': ${validation.error.join('; ')}`);
    }
    if (byId.has(spec.id)) {
      throw new Error(`Dataset '${spec.id}' is registered twice`);
    }
    byId.set(spec.id, spec);
  }

  const ordered = [...specs];

  return {
    listDatasets: () => ordered,
    getDataset: (id) => {
      const spec = byId.get(id);
      return spec === undefined ? err(createDatasetNotFoundError(id)) : ok(spec);
    },
  };
};
