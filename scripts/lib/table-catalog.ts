import type { DatasetName } from './types';

export type SqlColumnType = 'text' | 'longText' | 'int' | 'float' | 'date';

export interface ColumnSpec {
  name: string;
  type: SqlColumnType;
  nullable: boolean;
}

export interface ForeignKeySpec {
  columns: string[];
  parent: string;
  parentColumns: string[];
}

export interface TableSpec {
  name: string;
  columns: ColumnSpec[];
  primaryKey: string[];
  foreignKeys: ForeignKeySpec[];
}

export interface DatasetCatalog {
  dataset: DatasetName;
  /** parents before children */
  tables: TableSpec[];
}

const col = (name: string, type: SqlColumnType): ColumnSpec => ({ name, type, nullable: true });
const req = (name: string, type: SqlColumnType): ColumnSpec => ({ name, type, nullable: false });
const fk = (columns: string[], parent: string, parentColumns: string[] = columns): ForeignKeySpec => ({
  columns,
  parent,
  parentColumns,
});

const ASCOR: DatasetCatalog = {
  dataset: 'ascor',
  tables: [
    {
      name: 'country',
      columns: [
        req('country_name', 'text'),
        col('iso', 'text'),
        col('region', 'text'),
        col('bank_lending_group', 'text'),
        col('imf_category', 'text'),
        col('un_party_type', 'text'),
      ],
      primaryKey: ['country_name'],
      foreignKeys: [],
    },
    {
      name: 'assessment_elements',
      columns: [req('code', 'text'), col('text', 'longText'), col('response_type', 'text'), col('type', 'text')],
      primaryKey: ['code'],
      foreignKeys: [],
    },
    {
      name: 'benchmarks',
      columns: [
        req('benchmark_id', 'int'),
        col('publication_date', 'date'),
        col('emissions_metric', 'text'),
        col('emissions_boundary', 'text'),
        col('units', 'text'),
        col('benchmark_type', 'text'),
        col('country_name', 'text'),
      ],
      primaryKey: ['benchmark_id'],
      foreignKeys: [fk(['country_name'], 'country')],
    },
    {
      name: 'benchmark_values',
      columns: [req('year', 'int'), req('benchmark_id', 'int'), req('value', 'float')],
      primaryKey: ['year', 'benchmark_id'],
      foreignKeys: [fk(['benchmark_id'], 'benchmarks')],
    },
    {
      name: 'assessment_results',
      columns: [
        req('assessment_id', 'int'),
        req('code', 'text'),
        col('response', 'longText'),
        req('assessment_date', 'date'),
        col('publication_date', 'date'),
        col('source', 'longText'),
        col('year', 'int'),
        req('country_name', 'text'),
      ],
      primaryKey: ['assessment_id', 'code'],
      foreignKeys: [fk(['country_name'], 'country'), fk(['code'], 'assessment_elements')],
    },
    {
      name: 'assessment_trends',
      columns: [
        req('trend_id', 'int'),
        req('country_name', 'text'),
        col('emissions_metric', 'text'),
        col('emissions_boundary', 'text'),
        col('units', 'text'),
        col('assessment_date', 'date'),
        col('publication_date', 'date'),
        col('last_historical_year', 'int'),
      ],
      primaryKey: ['trend_id', 'country_name'],
      foreignKeys: [fk(['country_name'], 'country')],
    },
    {
      name: 'trend_values',
      columns: [req('trend_id', 'int'), req('country_name', 'text'), req('year', 'int'), req('value', 'float')],
      primaryKey: ['trend_id', 'country_name', 'year'],
      foreignKeys: [fk(['trend_id', 'country_name'], 'assessment_trends')],
    },
    {
      name: 'value_per_year',
      columns: [req('year', 'int'), req('value', 'float'), req('trend_id', 'int'), req('country_name', 'text')],
      primaryKey: ['year', 'trend_id', 'country_name'],
      foreignKeys: [fk(['trend_id', 'country_name'], 'assessment_trends')],
    },
  ],
};

const CP_KEY = ['assessment_date', 'company_name', 'version', 'is_regional'];
const SECTOR_BENCHMARK_KEY = ['benchmark_id', 'sector_name', 'scenario_name'];

const TPI: DatasetCatalog = {
  dataset: 'tpi',
  tables: [
    {
      name: 'company',
      columns: [
        req('company_name', 'text'),
        req('version', 'text'),
        col('geography', 'text'),
        col('isin', 'longText'),
        col('ca100_focus', 'text'),
        col('size_classification', 'text'),
        col('geography_code', 'text'),
        col('sedol', 'longText'),
        col('sector_name', 'text'),
      ],
      primaryKey: ['company_name', 'version'],
      foreignKeys: [],
    },
    {
      name: 'sector_benchmark',
      columns: [
        req('benchmark_id', 'text'),
        req('sector_name', 'text'),
        req('scenario_name', 'text'),
        col('region', 'text'),
        col('release_date', 'date'),
        col('unit', 'text'),
      ],
      primaryKey: SECTOR_BENCHMARK_KEY,
      foreignKeys: [],
    },
    {
      name: 'company_answer',
      columns: [
        req('question_code', 'text'),
        req('company_name', 'text'),
        req('version', 'text'),
        col('question_text', 'longText'),
        col('response', 'longText'),
      ],
      primaryKey: ['question_code', 'company_name', 'version'],
      foreignKeys: [fk(['company_name', 'version'], 'company')],
    },
    {
      name: 'mq_assessment',
      columns: [
        req('assessment_date', 'date'),
        req('company_name', 'text'),
        req('version', 'text'),
        req('tpi_cycle', 'int'),
        col('publication_date', 'date'),
        col('level', 'float'),
        col('performance_change', 'text'),
      ],
      primaryKey: ['assessment_date', 'company_name', 'version', 'tpi_cycle'],
      foreignKeys: [fk(['company_name', 'version'], 'company')],
    },
    {
      name: 'cp_assessment',
      columns: [
        req('assessment_date', 'date'),
        req('company_name', 'text'),
        req('version', 'text'),
        req('is_regional', 'text'),
        col('publication_date', 'date'),
        col('assumptions', 'longText'),
        col('cp_unit', 'text'),
        col('projection_cutoff', 'date'),
        col('benchmark_id', 'text'),
      ],
      primaryKey: CP_KEY,
      foreignKeys: [fk(['company_name', 'version'], 'company')],
    },
    {
      name: 'cp_alignment',
      columns: [
        req('cp_alignment_year', 'int'),
        col('cp_alignment_value', 'text'),
        req('assessment_date', 'date'),
        req('company_name', 'text'),
        req('version', 'text'),
        req('is_regional', 'text'),
      ],
      primaryKey: ['cp_alignment_year', ...CP_KEY],
      foreignKeys: [fk(CP_KEY, 'cp_assessment')],
    },
    {
      name: 'cp_projection',
      columns: [
        req('cp_projection_year', 'int'),
        col('cp_projection_value', 'float'),
        req('assessment_date', 'date'),
        req('company_name', 'text'),
        req('version', 'text'),
        req('is_regional', 'text'),
      ],
      primaryKey: ['cp_projection_year', ...CP_KEY],
      foreignKeys: [fk(CP_KEY, 'cp_assessment')],
    },
    {
      name: 'benchmark_projection',
      columns: [
        req('benchmark_projection_year', 'int'),
        col('benchmark_projection_attribute', 'float'),
        req('benchmark_id', 'text'),
        req('sector_name', 'text'),
        req('scenario_name', 'text'),
      ],
      primaryKey: ['benchmark_projection_year', ...SECTOR_BENCHMARK_KEY],
      foreignKeys: [fk(SECTOR_BENCHMARK_KEY, 'sector_benchmark')],
    },
  ],
};

export const CATALOGS: Record<DatasetName, DatasetCatalog> = {
  ascor: ASCOR,
  tpi: TPI,
};

export function loadOrder(dataset: DatasetName): string[] {
  return CATALOGS[dataset].tables.map(table => table.name);
}

export function getTableSpec(dataset: DatasetName, name: string): TableSpec {
  const spec = CATALOGS[dataset].tables.find(table => table.name === name);
  if (!spec) {
    throw new Error(`Unknown ${dataset} table: ${name}`);
  }
  return spec;
}

export function parentsOf(table: TableSpec): string[] {
  return [...new Set(table.foreignKeys.map(key => key.parent))];
}
