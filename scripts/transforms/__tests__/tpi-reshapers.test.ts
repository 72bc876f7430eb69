/**
 * Unit Tests for the TPI reshapers
 */

import * as path from 'path';
import { readSource, tableFromMatrix } from '../../lib/source-reader';
import { companyFileVersion, CompanySource, orderCompanySources, reshapeCompanies } from '../tpi/companies';
import { MqSource, reshapeCompanyAnswers, reshapeMqAssessments } from '../tpi/mq-assessments';
import { reshapeCpAssessments } from '../tpi/cp-assessments';
import { reshapeSectorBenchmarks } from '../tpi/sector-benchmarks';
import { FIXTURE_DATA_DIR } from '../../__tests__/helpers/fakes';

const TPI_DIR = path.join(FIXTURE_DATA_DIR, 'TPI_sector_data_15012024');
const load = (file: string) => readSource(path.join(TPI_DIR, file));
const day = (year: number, month: number, date: number) => new Date(Date.UTC(year, month - 1, date));

async function mqSources(): Promise<MqSource[]> {
  return [{ table: await load('MQ_Assessments_Methodology_1_15012024.csv'), cycle: 1 }];
}

describe('companyFileVersion', () => {
  it('reads the version from the file name', () => {
    expect(companyFileVersion('/data/Company_Latest_Assessments_5.0.csv', '4.0')).toBe('5.0');
    expect(companyFileVersion('/data/Company_Latest_Assessments.csv', '4.0')).toBe('4.0');
  });

  it('reads the version ahead of a date suffix', () => {
    expect(companyFileVersion('/data/Company_Latest_Assessments_5.0_08032025.csv', '4.0')).toBe('5.0');
    expect(companyFileVersion('/data/Company_Latest_Assessments_08032025.csv', '4.0')).toBe('4.0');
  });
});

describe('reshapeCompanies', () => {
  async function sources(): Promise<CompanySource[]> {
    return [
      { kind: 'mq', table: await load('MQ_Assessments_Methodology_1_15012024.csv'), cycle: 1 },
      { kind: 'latest', table: await load('Company_Latest_Assessments.csv'), version: '4.0' },
      { kind: 'latest', table: await load('Company_Latest_Assessments_5.0.csv'), version: '5.0' },
    ];
  }

  it('orders latest files by descending version, then MQ cycles', async () => {
    const ordered = orderCompanySources(await sources());
    expect(ordered.map(s => (s.kind === 'latest' ? s.version : `cycle ${s.cycle}`))).toEqual(['5.0', '4.0', 'cycle 1']);
  });

  it('merges every source, one row per company and version', async () => {
    const companies = reshapeCompanies(await sources());

    expect(companies.rows.map(row => [row.company_name, row.version])).toEqual([
      ['Acme Steel', '5.0'],
      ['Borealis Power', '5.0'],
      ['Acme Steel', '4.0'],
      ['Acme Steel', '1.0'],
      ['Borealis Power', '1.0'],
    ]);
    expect(companies.rows[0]).toEqual({
      company_name: 'Acme Steel',
      version: '5.0',
      geography: 'Germany',
      isin: 'DE0001',
      ca100_focus: 'Yes',
      size_classification: 'Large',
      geography_code: 'DE',
      sedol: 'S001',
      sector_name: 'Steel',
    });
    expect(companies.rows[3].geography).toBeNull();
  });

  it('keeps repeats inside one file for validation to report', () => {
    const table = tableFromMatrix([['Company Name'], ['Acme Steel'], ['Acme Steel']], null);
    const companies = reshapeCompanies([{ kind: 'latest', table, version: '5.0' }]);
    expect(companies.rows).toHaveLength(2);
  });
});

describe('reshapeCompanyAnswers', () => {
  it('keeps non-blank answers, the last one per question and company', async () => {
    const answers = reshapeCompanyAnswers(await mqSources());

    expect(answers.rows).toEqual([
      {
        question_code: 'Q1L0',
        company_name: 'Acme Steel',
        version: '1.0',
        question_text: 'Does the company acknowledge climate change?',
        response: 'Yes',
      },
      {
        question_code: 'Q1L0',
        company_name: 'Borealis Power',
        version: '1.0',
        question_text: 'Does the company acknowledge climate change?',
        response: 'Yes',
      },
      {
        question_code: 'Q2L1',
        company_name: 'Acme Steel',
        version: '1.0',
        question_text: 'Does the company have a climate policy?',
        response: 'No',
      },
    ]);
  });
});

describe('reshapeMqAssessments', () => {
  it('parses STAR levels and reports unreadable ones', async () => {
    const { value, warnings } = reshapeMqAssessments(await mqSources());

    expect(value.rows[0]).toEqual({
      assessment_date: day(2023, 1, 15),
      company_name: 'Acme Steel',
      version: '1.0',
      tpi_cycle: 1,
      publication_date: day(2023, 2, 1),
      level: 3,
      performance_change: 'Up',
    });
    expect(value.rows.map(row => row.level)).toEqual([3, 4, null]);
    expect(warnings).toEqual(['Unreadable MQ level "abc" for Borealis Power (cycle 1); stored as null']);
  });

  it('drops rows without an assessment date', () => {
    const table = tableFromMatrix([['Company Name', 'Level', 'Assessment Date'], ['Acme Steel', '2', '']], null);
    const { value, warnings } = reshapeMqAssessments([{ table, cycle: 2 }]);
    expect(value.rows).toEqual([]);
    expect(warnings).toEqual(['Dropped 1 MQ assessment row(s) without an assessment date (cycle 2)']);
  });
});

describe('reshapeCpAssessments', () => {
  it('stamps version and regional flag on every derived row', async () => {
    const { value, warnings } = reshapeCpAssessments(
      [
        { table: await load('CP_Assessments_15012024.csv'), isRegional: '0' },
        { table: await load('CP_Assessments_Regional_15012024.csv'), isRegional: '1' },
      ],
      '5.0'
    );

    expect(warnings).toEqual([]);
    expect(value.assessments.rows[0]).toEqual({
      assessment_date: day(2023, 1, 15),
      company_name: 'Acme Steel',
      version: '5.0',
      is_regional: '0',
      publication_date: day(2023, 2, 1),
      assumptions: 'Base case',
      cp_unit: 'tCO2/t',
      projection_cutoff: day(2021, 1, 1),
      benchmark_id: 'B1',
    });
    expect(value.assessments.rows.map(row => [row.company_name, row.is_regional])).toEqual([
      ['Acme Steel', '0'],
      ['Ghost Corp', '0'],
      ['Acme Steel', '1'],
    ]);
    expect(value.alignments.rows.map(row => [row.company_name, row.cp_alignment_year, row.cp_alignment_value, row.is_regional])).toEqual([
      ['Acme Steel', 2025, 'Below 2 Degrees', '0'],
      ['Ghost Corp', 2025, 'Not Aligned', '0'],
      ['Acme Steel', 2035, '1.5 Degrees', '0'],
      ['Ghost Corp', 2035, 'Not Aligned', '0'],
      ['Acme Steel', 2035, '2 Degrees', '1'],
    ]);
    expect(value.projections.rows).toHaveLength(7);
    expect(value.projections.rows[6]).toEqual({
      cp_projection_year: 2030,
      cp_projection_value: 1.3,
      assessment_date: day(2023, 1, 15),
      company_name: 'Acme Steel',
      version: '5.0',
      is_regional: '1',
    });
  });

  it('drops undated assessments', () => {
    const table = tableFromMatrix([['Company Name', 'Assessment Date', '2025'], ['Acme Steel', 'n/a', '1.0']], null);
    const { value, warnings } = reshapeCpAssessments([{ table, isRegional: '0' }], '5.0');
    expect(value.assessments.rows).toEqual([]);
    expect(warnings).toEqual(['Dropped 1 CP assessment row(s) without an assessment date (is_regional 0)']);
  });
});

describe('reshapeSectorBenchmarks', () => {
  it('melts the projection years per scenario', async () => {
    const { benchmarks, projections } = reshapeSectorBenchmarks(await load('Sector_Benchmarks_15012024.csv'));

    expect(benchmarks.rows[1]).toEqual({
      benchmark_id: 'B1',
      sector_name: 'Steel',
      scenario_name: 'Below 2 Degrees',
      region: 'Global',
      release_date: day(2022, 12, 1),
      unit: 'tCO2/t',
    });
    expect(projections.rows.map(row => [row.scenario_name, row.benchmark_projection_year, row.benchmark_projection_attribute])).toEqual([
      ['1.5 Degrees', 2020, 1.8],
      ['Below 2 Degrees', 2020, 1.8],
      ['1.5 Degrees', 2030, 1.2],
      ['Below 2 Degrees', 2030, 1.4],
      ['1.5 Degrees', 2050, 0.2],
    ]);
  });
});
