import type { RawTable, Relation } from '../../lib/types';
import { describeColumns } from '../../lib/columns';
import { parseLevel, toText } from '../../lib/coerce';
import { Reshaped, reader } from '../shared';
import { cycleVersion } from './companies';
import type { CompanyAnswerRow, MqAssessmentRow } from './types';

/** One `MQ_Assessments_Methodology_<n>_*.csv` export */
export interface MqSource {
  table: RawTable;
  cycle: number;
}

function sourceFiles(sources: readonly MqSource[]): string | null {
  const files = sources.map(s => s.table.sourceFile).filter((file): file is string => file !== null);
  return files.length > 0 ? files.join(', ') : null;
}

/**
 * Survey answers from the `code|text` question columns of every methodology file.
 * Blank responses are dropped; a repeated (question, company, version) keeps the last answer.
 */
export function reshapeCompanyAnswers(sources: readonly MqSource[]): Relation<CompanyAnswerRow> {
  const answers = new Map<string, CompanyAnswerRow>();

  for (const { table, cycle } of sources) {
    const shape = describeColumns(table.columns);
    const read = reader(shape);
    const version = cycleVersion(cycle);

    for (const question of shape.questions) {
      for (const row of table.rows) {
        const response = toText(row[question.header] ?? null);
        if (response === null) continue;
        const companyName = read.text(row, 'company_name');
        const key = JSON.stringify([question.code, companyName, version]);
        answers.delete(key);
        answers.set(key, {
          question_code: question.code,
          company_name: companyName,
          version,
          question_text: question.text,
          response,
        });
      }
    }
  }

  return {
    name: 'company_answer',
    columns: ['question_code', 'company_name', 'version', 'question_text', 'response'],
    rows: [...answers.values()],
    sourceFile: sourceFiles(sources),
  };
}

/**
 * Management-quality assessments, tagged with their methodology cycle. Rows without an
 * assessment date are dropped; unreadable levels become null. Both are reported as warnings.
 */
export function reshapeMqAssessments(sources: readonly MqSource[]): Reshaped<Relation<MqAssessmentRow>> {
  const rows: MqAssessmentRow[] = [];
  const warnings: string[] = [];

  for (const { table, cycle } of sources) {
    const shape = describeColumns(table.columns);
    const read = reader(shape);
    const version = cycleVersion(cycle);
    let undated = 0;

    for (const row of table.rows) {
      const companyName = read.text(row, 'company_name');
      const assessmentDate = read.date(row, 'assessment_date');
      if (assessmentDate === null) {
        undated++;
        continue;
      }

      const rawLevel = read.text(row, 'level');
      const level = parseLevel(rawLevel);
      if (!level.ok) {
        warnings.push(`Unreadable MQ level "${rawLevel}" for ${companyName} (cycle ${cycle}); stored as null`);
      }

      rows.push({
        assessment_date: assessmentDate,
        company_name: companyName,
        version,
        tpi_cycle: cycle,
        publication_date: read.date(row, 'publication_date'),
        level: level.value,
        performance_change: read.text(row, 'performance_compared_to_previous_year'),
      });
    }

    if (undated > 0) {
      warnings.push(`Dropped ${undated} MQ assessment row(s) without an assessment date (cycle ${cycle})`);
    }
  }

  return {
    value: {
      name: 'mq_assessment',
      columns: ['assessment_date', 'company_name', 'version', 'tpi_cycle', 'publication_date', 'level', 'performance_change'],
      rows,
      sourceFile: sourceFiles(sources),
    },
    warnings,
  };
}
