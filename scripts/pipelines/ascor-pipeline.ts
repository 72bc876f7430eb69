import { KeySet } from '../lib/referential-filter';
import { reshapeCountries, reshapeIndicators } from '../transforms/ascor/countries';
import { reshapeBenchmarks } from '../transforms/ascor/benchmarks';
import { reshapeAssessmentResults } from '../transforms/ascor/assessment-results';
import { reshapeAssessmentTrends } from '../transforms/ascor/assessment-trends';
import { BasePipeline, PipelineStep } from './base-pipeline';

export const ASCOR_FILES = {
  countries: 'ASCOR_countries.*',
  benchmarks: 'ASCOR_benchmarks.*',
  indicators: 'ASCOR_indicators.*',
  results: 'ASCOR_assessments_results.*',
  trends: 'ASCOR_assessments_results_trends_pathways.*',
} as const;

/**
 * Country assessments. Countries and assessment elements are the reference sets every
 * other relation is filtered against.
 */
export class AscorPipeline extends BasePipeline {
  readonly dataset = 'ascor' as const;

  protected directoryPattern(): string {
    return this.deps.config.sources.ascorDirectoryPattern;
  }

  protected buildSteps(dir: string): PipelineStep[] {
    let countries = new KeySet();
    let elements = new KeySet();

    return [
      {
        name: 'country',
        run: async () => {
          const relation = reshapeCountries(await this.readLatest(dir, 'countries export', ASCOR_FILES.countries));
          countries = KeySet.from(relation.rows, row => [row.country_name]);
          return { relations: [relation], warnings: [] };
        },
      },
      {
        name: 'assessment_elements',
        run: async () => {
          const relation = reshapeIndicators(await this.readLatest(dir, 'indicators export', ASCOR_FILES.indicators));
          elements = KeySet.from(relation.rows, row => [row.code]);
          return { relations: [relation], warnings: [] };
        },
      },
      {
        name: 'benchmarks',
        run: async () => {
          const warnings: string[] = [];
          const raw = await this.readLatest(dir, 'benchmarks export', ASCOR_FILES.benchmarks);
          const { benchmarks, values } = reshapeBenchmarks(raw);
          const accepted = this.keep(benchmarks, countries, row => [row.country_name], 'country', warnings);
          const ids = KeySet.from(accepted.rows, row => [row.benchmark_id]);
          return {
            relations: [accepted, this.keep(values, ids, row => [row.benchmark_id], 'benchmarks', warnings)],
            warnings,
          };
        },
      },
      {
        name: 'assessment_results',
        run: async () => {
          const warnings: string[] = [];
          const raw = await this.readLatest(dir, 'assessment results export', ASCOR_FILES.results);
          const byCountry = this.keep(reshapeAssessmentResults(raw), countries, row => [row.country_name], 'country', warnings);
          const relation = this.keep(byCountry, elements, row => [row.code], 'assessment_elements', warnings);
          return { relations: [relation], warnings };
        },
      },
      {
        name: 'assessment_trends',
        run: async () => {
          const warnings: string[] = [];
          const raw = await this.readLatest(dir, 'trends and pathways export', ASCOR_FILES.trends);
          const { trends, valuePerYear, trendValues } = reshapeAssessmentTrends(raw);
          const accepted = this.keep(trends, countries, row => [row.country_name], 'country', warnings);
          const trendKeys = KeySet.from(accepted.rows, row => [row.trend_id, row.country_name]);
          return {
            relations: [
              accepted,
              this.keep(trendValues, trendKeys, row => [row.trend_id, row.country_name], 'assessment_trends', warnings),
              this.keep(valuePerYear, trendKeys, row => [row.trend_id, row.country_name], 'assessment_trends', warnings),
            ],
            warnings,
          };
        },
      },
    ];
  }
}
