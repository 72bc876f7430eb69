import type { RawTable, Relation } from '../../lib/types';
import { describeColumns, presentColumns } from '../../lib/columns';
import { meltYears } from '../../lib/melt';
import { parseNumber } from '../../lib/coerce';
import { reader } from '../shared';
import type { BenchmarkProjectionRow, SectorBenchmarkRow } from './types';

const BENCHMARK_COLUMNS = {
  benchmark_id: 'benchmark_id',
  sector_name: 'sector_name',
  scenario_name: 'scenario_name',
  region: 'region',
  release_date: 'release_date',
  unit: 'unit',
} as const;

const BENCHMARK_KEY = { benchmark_id: 'benchmark_id', sector_name: 'sector_name', scenario_name: 'scenario_name' } as const;

export interface SectorBenchmarkRelations {
  benchmarks: Relation<SectorBenchmarkRow>;
  projections: Relation<BenchmarkProjectionRow>;
}

export function reshapeSectorBenchmarks(raw: RawTable): SectorBenchmarkRelations {
  const shape = describeColumns(raw.columns);
  const read = reader(shape);

  const benchmarks = raw.rows.map(row => ({
    benchmark_id: read.text(row, 'benchmark_id'),
    sector_name: read.text(row, 'sector_name'),
    scenario_name: read.text(row, 'scenario_name'),
    region: read.text(row, 'region'),
    release_date: read.date(row, 'release_date'),
    unit: read.text(row, 'unit'),
  }));

  const projections = meltYears<BenchmarkProjectionRow>(raw.rows, shape.years, (row, year, cell) => {
    const value = parseNumber(cell);
    if (value === null) return null;
    return {
      benchmark_projection_year: year,
      benchmark_projection_attribute: value,
      benchmark_id: read.text(row, 'benchmark_id'),
      sector_name: read.text(row, 'sector_name'),
      scenario_name: read.text(row, 'scenario_name'),
    };
  });

  return {
    benchmarks: {
      name: 'sector_benchmark',
      columns: presentColumns(shape, BENCHMARK_COLUMNS),
      rows: benchmarks,
      sourceFile: raw.sourceFile,
    },
    projections: {
      name: 'benchmark_projection',
      columns: ['benchmark_projection_year', 'benchmark_projection_attribute', ...presentColumns(shape, BENCHMARK_KEY)],
      rows: projections,
      sourceFile: raw.sourceFile,
    },
  };
}
