/**
 * Unit Tests for the ASCOR reshapers
 *
 * Runs each reshaper over the fixture exports and checks the long-format rows.
 */

import * as path from 'path';
import { readSource, tableFromMatrix } from '../../lib/source-reader';
import { reshapeCountries, reshapeIndicators } from '../ascor/countries';
import { reshapeBenchmarks } from '../ascor/benchmarks';
import { reshapeAssessmentResults } from '../ascor/assessment-results';
import { reshapeAssessmentTrends } from '../ascor/assessment-trends';
import { FIXTURE_DATA_DIR } from '../../__tests__/helpers/fakes';

const ASCOR_DIR = path.join(FIXTURE_DATA_DIR, 'ASCOR_assessments_15012024');
const load = (file: string) => readSource(path.join(ASCOR_DIR, file));
const day = (year: number, month: number, date: number) => new Date(Date.UTC(year, month - 1, date));

describe('reshapeCountries', () => {
  it('renames the country metadata columns', async () => {
    const countries = reshapeCountries(await load('ASCOR_countries.csv'));

    expect(countries.columns).toEqual(['country_name', 'iso', 'region', 'bank_lending_group', 'imf_category', 'un_party_type']);
    expect(countries.rows[0]).toEqual({
      country_name: 'France',
      iso: 'FRA',
      region: 'Europe',
      bank_lending_group: 'High-income economies',
      imf_category: 'Advanced economies',
      un_party_type: 'Annex I',
    });
  });
});

describe('reshapeIndicators', () => {
  it('fills a blank response type', async () => {
    const elements = reshapeIndicators(await load('ASCOR_indicators.csv'));

    expect(elements.rows.map(row => [row.code, row.response_type])).toEqual([
      ['EP.1', 'Not specified'],
      ['EP.1.a', 'Yes/No'],
      ['EP1.a.i', 'MtCO2e'],
    ]);
  });
});

describe('reshapeBenchmarks', () => {
  it('melts numeric year cells and skips "No data"', async () => {
    const { benchmarks, values } = reshapeBenchmarks(await load('ASCOR_benchmarks.csv'));

    expect(benchmarks.rows[0]).toEqual({
      benchmark_id: 10,
      publication_date: day(2023, 3, 1),
      emissions_metric: 'Absolute',
      emissions_boundary: 'Production',
      units: 'MtCO2e',
      benchmark_type: 'National 1.5C',
      country_name: 'France',
    });
    expect(values.columns).toEqual(['year', 'benchmark_id', 'value']);
    expect(values.rows).toEqual([
      { year: 2023, benchmark_id: 10, value: 400 },
      { year: 2023, benchmark_id: 11, value: 50 },
      { year: 2024, benchmark_id: 10, value: 380 },
      { year: 2024, benchmark_id: 11, value: 45 },
      { year: 2025, benchmark_id: 11, value: 40 },
    ]);
  });
});

describe('reshapeAssessmentResults', () => {
  it('emits one row per response column with its year and source', async () => {
    const results = reshapeAssessmentResults(await load('ASCOR_assessments_results.csv'));

    expect(results.columns).toEqual([
      'assessment_id',
      'country_name',
      'assessment_date',
      'publication_date',
      'code',
      'response',
      'source',
      'year',
    ]);
    expect(results.rows).toHaveLength(6);
    expect(results.rows.slice(0, 2)).toEqual([
      {
        assessment_id: 1,
        code: 'EP.1',
        response: 'Partial',
        assessment_date: day(2023, 1, 31),
        publication_date: day(2023, 2, 15),
        source: null,
        year: null,
        country_name: 'France',
      },
      {
        assessment_id: 1,
        code: 'EP.1.a',
        response: 'Yes',
        assessment_date: day(2023, 1, 31),
        publication_date: day(2023, 2, 15),
        source: 'https://example.org/fr',
        year: 2022,
        country_name: 'France',
      },
    ]);
  });

  it('ignores role words without a dotted code', () => {
    const results = reshapeAssessmentResults(
      tableFromMatrix([['Id', 'Country', 'area summary', 'indicator EP.2.a'], ['1', 'France', 'x', 'Yes']], null)
    );
    expect(results.rows.map(row => row.code)).toEqual(['EP.2.a']);
  });
});

describe('reshapeAssessmentTrends', () => {
  it('derives the pathway and the latest metric value separately', async () => {
    const { trends, valuePerYear, trendValues } = reshapeAssessmentTrends(
      await load('ASCOR_assessments_results_trends_pathways.csv')
    );

    expect(trends.rows[0]).toEqual({
      trend_id: 1,
      country_name: 'France',
      emissions_metric: 'Absolute',
      emissions_boundary: 'Production',
      units: 'MtCO2e',
      assessment_date: day(2023, 1, 31),
      publication_date: day(2023, 2, 15),
      last_historical_year: 2021,
    });
    expect(valuePerYear.rows).toEqual([
      { year: 2021, value: 403.5, trend_id: 1, country_name: 'France' },
      { year: 2021, value: 10, trend_id: 2, country_name: 'Atlantis' },
      { year: 2022, value: 9, trend_id: 2, country_name: 'Atlantis' },
      { year: 2030, value: 300, trend_id: 1, country_name: 'France' },
      { year: 2030, value: 8, trend_id: 2, country_name: 'Atlantis' },
    ]);
    expect(trendValues.rows).toEqual([
      { trend_id: 1, country_name: 'France', year: 2021, value: 403.5 },
      { trend_id: 2, country_name: 'Atlantis', year: 2021, value: 10 },
    ]);
  });

  it('produces no trend values without the metric column', () => {
    const { trendValues } = reshapeAssessmentTrends(tableFromMatrix([['Id', 'Country', '2021'], ['1', 'France', '5']], null));
    expect(trendValues.rows).toEqual([]);
    expect(trendValues.columns).toEqual(['trend_id', 'country_name']);
  });

  it('gives the same output on a second run over the same input', async () => {
    const raw = await load('ASCOR_assessments_results_trends_pathways.csv');
    expect(reshapeAssessmentTrends(raw)).toEqual(reshapeAssessmentTrends(raw));
  });
});
