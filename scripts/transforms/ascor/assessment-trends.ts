import type { RawTable, Relation } from '../../lib/types';
import { RoleColumn, describeColumns, findSibling, presentColumns } from '../../lib/columns';
import { meltYears } from '../../lib/melt';
import { parseInteger, parseNumber } from '../../lib/coerce';
import { reader } from '../shared';
import type { AssessmentTrendRow, TrendValueRow, ValuePerYearRow } from './types';

const TREND_COLUMNS = {
  id: 'trend_id',
  country: 'country_name',
  emissions_metric: 'emissions_metric',
  emissions_boundary: 'emissions_boundary',
  units: 'units',
  assessment_date: 'assessment_date',
  publication_date: 'publication_date',
  last_historical_year: 'last_historical_year',
} as const;

const TREND_KEY = { id: 'trend_id', country: 'country_name' } as const;

/** historical emissions metric whose latest value feeds `trend_values` */
export const TREND_METRIC_CODE = 'EP1.a.i';

export const VALUE_PER_YEAR_RANGE = { min: 2021, max: 2030 };

export interface TrendRelations {
  trends: Relation<AssessmentTrendRow>;
  valuePerYear: Relation<ValuePerYearRow>;
  trendValues: Relation<TrendValueRow>;
}

function trendMetric(columns: readonly RoleColumn[]): RoleColumn | undefined {
  return columns.find(c => c.role === 'metric' && c.code.toLowerCase() === TREND_METRIC_CODE.toLowerCase());
}

/**
 * Trends export → trend headers, the 2021–2030 yearly pathway and the single
 * (year, value) pair of the EP1.a.i metric. The two series are separate derivations.
 */
export function reshapeAssessmentTrends(raw: RawTable): TrendRelations {
  const shape = describeColumns(raw.columns, { yearRange: VALUE_PER_YEAR_RANGE });
  const read = reader(shape);
  const keyColumns = presentColumns(shape, TREND_KEY);

  const trends = raw.rows.map(row => ({
    trend_id: read.integer(row, 'id'),
    country_name: read.text(row, 'country'),
    emissions_metric: read.text(row, 'emissions_metric'),
    emissions_boundary: read.text(row, 'emissions_boundary'),
    units: read.text(row, 'units'),
    assessment_date: read.date(row, 'assessment_date'),
    publication_date: read.date(row, 'publication_date'),
    last_historical_year: read.integer(row, 'last_historical_year'),
  }));

  const valuePerYear = meltYears<ValuePerYearRow>(raw.rows, shape.years, (row, year, cell) => {
    const value = parseNumber(cell);
    if (value === null) return null;
    return { year, value, trend_id: read.integer(row, 'id'), country_name: read.text(row, 'country') };
  });

  const metric = trendMetric(shape.roleCoded);
  const metricYear = metric ? findSibling(shape, 'year', metric) : undefined;
  const trendValues: TrendValueRow[] = [];
  if (metric && metricYear) {
    for (const row of raw.rows) {
      const year = parseInteger(row[metricYear] ?? null);
      const value = parseNumber(row[metric.header] ?? null);
      if (year === null || value === null) continue;
      trendValues.push({ trend_id: read.integer(row, 'id'), country_name: read.text(row, 'country'), year, value });
    }
  }

  return {
    trends: {
      name: 'assessment_trends',
      columns: presentColumns(shape, TREND_COLUMNS),
      rows: trends,
      sourceFile: raw.sourceFile,
    },
    valuePerYear: {
      name: 'value_per_year',
      columns: ['year', 'value', ...keyColumns],
      rows: valuePerYear,
      sourceFile: raw.sourceFile,
    },
    trendValues: {
      name: 'trend_values',
      columns: metric && metricYear ? [...keyColumns, 'year', 'value'] : keyColumns,
      rows: trendValues,
      sourceFile: raw.sourceFile,
    },
  };
}
