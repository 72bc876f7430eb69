import type { RawTable, Relation } from '../../lib/types';
import { describeColumns, presentColumns } from '../../lib/columns';
import { meltYears } from '../../lib/melt';
import { parseNumber } from '../../lib/coerce';
import { reader } from '../shared';
import type { BenchmarkRow, BenchmarkValueRow } from './types';

const BENCHMARK_COLUMNS = {
  id: 'benchmark_id',
  publication_date: 'publication_date',
  emissions_metric: 'emissions_metric',
  emissions_boundary: 'emissions_boundary',
  units: 'units',
  benchmark_type: 'benchmark_type',
  country: 'country_name',
} as const;

export interface BenchmarkRelations {
  benchmarks: Relation<BenchmarkRow>;
  /** every yearly value of the export; restrict to accepted benchmarks before loading */
  values: Relation<BenchmarkValueRow>;
}

/**
 * One benchmark per row, plus one value per (benchmark, year column) with a numeric cell.
 */
export function reshapeBenchmarks(raw: RawTable): BenchmarkRelations {
  const shape = describeColumns(raw.columns);
  const read = reader(shape);

  const benchmarks = raw.rows.map(row => ({
    benchmark_id: read.integer(row, 'id'),
    publication_date: read.date(row, 'publication_date'),
    emissions_metric: read.text(row, 'emissions_metric'),
    emissions_boundary: read.text(row, 'emissions_boundary'),
    units: read.text(row, 'units'),
    benchmark_type: read.text(row, 'benchmark_type'),
    country_name: read.text(row, 'country'),
  }));

  const values = meltYears<BenchmarkValueRow>(raw.rows, shape.years, (row, year, cell) => {
    const value = parseNumber(cell);
    return value === null ? null : { year, benchmark_id: read.integer(row, 'id'), value };
  });

  return {
    benchmarks: {
      name: 'benchmarks',
      columns: presentColumns(shape, BENCHMARK_COLUMNS),
      rows: benchmarks,
      sourceFile: raw.sourceFile,
    },
    values: {
      name: 'benchmark_values',
      columns: ['year', ...presentColumns(shape, { id: 'benchmark_id' }), 'value'],
      rows: values,
      sourceFile: raw.sourceFile,
    },
  };
}
