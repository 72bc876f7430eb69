import { KeySet } from '../lib/referential-filter';
import { FileCategory, ResolveOptions, nameMatches, resolveAllFiles, resolveCategorizedFiles, resolveNumberedFiles } from '../lib/file-resolver';
import { readSource } from '../lib/source-reader';
import { CompanySource, companyFileVersion, reshapeCompanies } from '../transforms/tpi/companies';
import { MqSource, reshapeCompanyAnswers, reshapeMqAssessments } from '../transforms/tpi/mq-assessments';
import { CpSource, RegionalFlag, reshapeCpAssessments } from '../transforms/tpi/cp-assessments';
import { reshapeSectorBenchmarks } from '../transforms/tpi/sector-benchmarks';
import type { CompanyRow } from '../transforms/tpi/types';
import { BasePipeline, PipelineStep } from './base-pipeline';

export const TPI_FILES = {
  companies: 'Company_Latest_Assessments*.csv',
  mq: 'MQ_Assessments_Methodology_*.csv',
  cp: 'CP_Assessments*.csv',
  sectorBenchmarks: 'Sector_Benchmarks_*.csv',
} as const;

/** regional exports first; everything else under CP_Assessments is the standard set */
export const CP_CATEGORIES: ReadonlyArray<FileCategory<RegionalFlag>> = [
  { category: '1', matchers: [nameMatches(/^CP_Assessments_Regional/i)] },
  { category: '0', matchers: [nameMatches(/^CP_Assessments/i)] },
];

const companyKey = (row: { company_name: string | null; version: string }) => [row.company_name, row.version];

/**
 * Company assessments: company metadata across methodology versions, MQ answers and
 * levels per cycle, carbon-performance assessments and sector benchmark pathways.
 */
export class TpiPipeline extends BasePipeline {
  readonly dataset = 'tpi' as const;

  protected directoryPattern(): string {
    return this.deps.config.sources.tpiDirectoryPattern;
  }

  private get resolveOptions(): ResolveOptions {
    return { dateFormats: this.deps.config.sources.dateFormats };
  }

  protected buildSteps(dir: string): PipelineStep[] {
    const { versions } = this.deps.config;
    let mqSources: MqSource[] = [];
    let companies = new KeySet();

    return [
      {
        name: 'company',
        run: async () => {
          const latestFiles = this.required(resolveAllFiles(dir, TPI_FILES.companies), 'company latest assessments');
          const mqFiles = this.required(
            resolveNumberedFiles(dir, TPI_FILES.mq, undefined, this.resolveOptions),
            'MQ methodology exports'
          );

          const sources: CompanySource[] = [];
          for (const file of latestFiles) {
            const version = companyFileVersion(file, versions.legacyCompanyVersion);
            sources.push({ kind: 'latest', table: await readSource(file), version });
          }
          mqSources = [];
          for (const file of mqFiles) {
            const table = await readSource(file.path);
            mqSources.push({ table, cycle: file.number });
            sources.push({ kind: 'mq', table, cycle: file.number });
          }
          this.deps.logger.info(
            `company: ${latestFiles.length} latest-assessment file(s), ${mqSources.length} MQ methodology cycle(s)`
          );

          const relation = reshapeCompanies(sources);
          companies = KeySet.from<CompanyRow>(relation.rows, companyKey);
          return { relations: [relation], warnings: [] };
        },
      },
      {
        name: 'sector_benchmark',
        run: async () => {
          const warnings: string[] = [];
          const raw = await this.readLatest(dir, 'sector benchmarks export', TPI_FILES.sectorBenchmarks);
          const { benchmarks, projections } = reshapeSectorBenchmarks(raw);
          const keys = KeySet.from(benchmarks.rows, row => [row.benchmark_id, row.sector_name, row.scenario_name]);
          return {
            relations: [
              benchmarks,
              this.keep(projections, keys, row => [row.benchmark_id, row.sector_name, row.scenario_name], 'sector_benchmark', warnings),
            ],
            warnings,
          };
        },
      },
      {
        name: 'company_answer',
        run: async () => {
          const warnings: string[] = [];
          const relation = this.keep(reshapeCompanyAnswers(mqSources), companies, companyKey, 'company', warnings);
          return { relations: [relation], warnings };
        },
      },
      {
        name: 'mq_assessment',
        run: async () => {
          const reshaped = reshapeMqAssessments(mqSources);
          const warnings = [...reshaped.warnings];
          const relation = this.keep(reshaped.value, companies, companyKey, 'company', warnings);
          return { relations: [relation], warnings };
        },
      },
      {
        name: 'cp_assessment',
        run: async () => {
          const files = this.required(
            resolveCategorizedFiles(dir, TPI_FILES.cp, CP_CATEGORIES, this.resolveOptions),
            'CP assessment exports'
          );
          const sources: CpSource[] = [];
          for (const { category } of CP_CATEGORIES) {
            const file = files[category];
            if (file) sources.push({ table: await readSource(file), isRegional: category });
          }

          const reshaped = reshapeCpAssessments(sources, versions.cpVersion);
          const warnings = [...reshaped.warnings];
          const { assessments, alignments, projections } = reshaped.value;
          const accepted = this.keep(assessments, companies, companyKey, 'company', warnings);
          const cpKey = (row: { assessment_date: Date | null; company_name: string | null; version: string; is_regional: string }) => [
            row.assessment_date,
            row.company_name,
            row.version,
            row.is_regional,
          ];
          const cpKeys = KeySet.from(accepted.rows, cpKey);
          return {
            relations: [
              accepted,
              this.keep(alignments, cpKeys, cpKey, 'cp_assessment', warnings),
              this.keep(projections, cpKeys, cpKey, 'cp_assessment', warnings),
            ],
            warnings,
          };
        },
      },
    ];
  }
}
