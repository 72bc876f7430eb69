import type { RawTable, Relation } from '../../lib/types';
import { describeColumns, findSibling, presentColumns } from '../../lib/columns';
import { parseInteger, toText } from '../../lib/coerce';
import { reader } from '../shared';
import type { AssessmentResultRow } from './types';

const IDENTITY_COLUMNS = {
  id: 'assessment_id',
  country: 'country_name',
  assessment_date: 'assessment_date',
  publication_date: 'publication_date',
} as const;

/**
 * Un-pivot the assessment results export: every `area`, `indicator` and `metric` column
 * becomes one row per assessment, with its optional `year …` and `source …` siblings.
 */
export function reshapeAssessmentResults(raw: RawTable): Relation<AssessmentResultRow> {
  const shape = describeColumns(raw.columns);
  const read = reader(shape);

  const responseColumns = shape.roleCoded.map(column => ({
    column,
    yearHeader: findSibling(shape, 'year', column),
    sourceHeader: findSibling(shape, 'source', column),
  }));

  const rows: AssessmentResultRow[] = [];
  for (const row of raw.rows) {
    const assessmentId = read.integer(row, 'id');
    const countryName = read.text(row, 'country');
    const assessmentDate = read.date(row, 'assessment_date');
    const publicationDate = read.date(row, 'publication_date');

    for (const { column, yearHeader, sourceHeader } of responseColumns) {
      rows.push({
        assessment_id: assessmentId,
        code: column.code,
        response: toText(row[column.header] ?? null),
        assessment_date: assessmentDate,
        publication_date: publicationDate,
        source: sourceHeader === undefined ? null : toText(row[sourceHeader] ?? null),
        year: yearHeader === undefined ? null : parseInteger(row[yearHeader] ?? null),
        country_name: countryName,
      });
    }
  }

  return {
    name: 'assessment_results',
    columns: [...presentColumns(shape, IDENTITY_COLUMNS), 'code', 'response', 'source', 'year'],
    rows,
    sourceFile: raw.sourceFile,
  };
}
