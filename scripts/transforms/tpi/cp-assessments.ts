import type { RawTable, Relation, Row } from '../../lib/types';
import { describeColumns, presentColumns } from '../../lib/columns';
import { meltYears } from '../../lib/melt';
import { parseNumber, parseYearOrDate, toText } from '../../lib/coerce';
import { Reshaped, reader, unionColumns } from '../shared';
import type { CpAlignmentRow, CpAssessmentRow, CpProjectionRow } from './types';

export type RegionalFlag = '0' | '1';

/** One `CP_Assessments*.csv` export; regional files carry flag `1` */
export interface CpSource {
  table: RawTable;
  isRegional: RegionalFlag;
}

export interface CpRelations {
  assessments: Relation<CpAssessmentRow>;
  alignments: Relation<CpAlignmentRow>;
  projections: Relation<CpProjectionRow>;
}

const ALIGNMENT_PREFIX = 'carbon_performance_alignment_';

const ASSESSMENT_COLUMNS = {
  company_name: 'company_name',
  assessment_date: 'assessment_date',
  publication_date: 'publication_date',
  assumptions: 'assumptions',
  cp_unit: 'cp_unit',
  history_to_projection_cutoff_year: 'projection_cutoff',
  benchmark_id: 'benchmark_id',
} as const;

const CHILD_KEY = ['assessment_date', 'company_name', 'version', 'is_regional'];

/**
 * Carbon-performance exports → assessments, `Carbon Performance Alignment YYYY` values and
 * bare-year projections. Every row is stamped with the configured CP version and the file's
 * regional flag. Assessments without a date are dropped and reported.
 */
export function reshapeCpAssessments(sources: readonly CpSource[], version: string): Reshaped<CpRelations> {
  const assessments: CpAssessmentRow[] = [];
  const alignments: CpAlignmentRow[] = [];
  const projections: CpProjectionRow[] = [];
  const warnings: string[] = [];
  const assessmentColumns: string[][] = [];
  const files: string[] = [];

  for (const { table, isRegional } of sources) {
    const shape = describeColumns(table.columns, { yearPrefixes: [ALIGNMENT_PREFIX] });
    const read = reader(shape);
    const keyOf = (row: Row) => ({
      assessment_date: read.date(row, 'assessment_date'),
      company_name: read.text(row, 'company_name'),
      version,
      is_regional: isRegional,
    });
    assessmentColumns.push(presentColumns(shape, ASSESSMENT_COLUMNS, ['version', 'is_regional']));
    if (table.sourceFile) files.push(table.sourceFile);

    let undated = 0;
    for (const row of table.rows) {
      const key = keyOf(row);
      if (key.assessment_date === null) {
        undated++;
        continue;
      }
      assessments.push({
        ...key,
        publication_date: read.date(row, 'publication_date'),
        assumptions: read.text(row, 'assumptions'),
        cp_unit: read.text(row, 'cp_unit'),
        projection_cutoff: parseYearOrDate(read.text(row, 'history_to_projection_cutoff_year')),
        benchmark_id: read.text(row, 'benchmark_id'),
      });
    }
    if (undated > 0) {
      warnings.push(`Dropped ${undated} CP assessment row(s) without an assessment date (is_regional ${isRegional})`);
    }

    alignments.push(
      ...meltYears<CpAlignmentRow>(table.rows, shape.prefixedYears, (row, year, cell) => {
        const value = toText(cell);
        return value === null ? null : { cp_alignment_year: year, cp_alignment_value: value, ...keyOf(row) };
      })
    );
    projections.push(
      ...meltYears<CpProjectionRow>(table.rows, shape.years, (row, year, cell) => {
        const value = parseNumber(cell);
        return value === null ? null : { cp_projection_year: year, cp_projection_value: value, ...keyOf(row) };
      })
    );
  }

  const sourceFile = files.length > 0 ? files.join(', ') : null;
  return {
    value: {
      assessments: {
        name: 'cp_assessment',
        columns: unionColumns(...assessmentColumns),
        rows: assessments,
        sourceFile,
      },
      alignments: {
        name: 'cp_alignment',
        columns: ['cp_alignment_year', 'cp_alignment_value', ...CHILD_KEY],
        rows: alignments,
        sourceFile,
      },
      projections: {
        name: 'cp_projection',
        columns: ['cp_projection_year', 'cp_projection_value', ...CHILD_KEY],
        rows: projections,
        sourceFile,
      },
    },
    warnings,
  };
}
