export interface FormatRule {
  column: string;
  pattern: RegExp;
  /** e.g. `version formats` → "Found 2 invalid version formats in company" */
  label: string;
}

export interface RangeRule {
  column: string;
  min: number;
  max: number;
  label: string;
}

export interface EntityRules {
  /** children may legitimately come out empty (a benchmark with no yearly values) */
  allowEmpty?: boolean;
  required: string[];
  uniqueKey?: string[];
  formats?: FormatRule[];
  ranges?: RangeRule[];
  /** columns that must hold a valid date on every row */
  dates?: string[];
}

const VERSION: FormatRule = { column: 'version', pattern: /^\d+\.\d+$/, label: 'version formats' };
const year = (column: string, label: string): RangeRule => ({ column, min: 2000, max: 2100, label });

export const VALIDATION_RULES: Record<string, EntityRules> = {
  // ASCOR
  country: {
    required: ['country_name', 'iso'],
    uniqueKey: ['country_name'],
    formats: [{ column: 'iso', pattern: /^[A-Z]{2,3}$/, label: 'ISO codes' }],
  },
  assessment_elements: {
    required: ['code', 'text', 'response_type', 'type'],
    uniqueKey: ['code'],
    formats: [{ column: 'code', pattern: /^[A-Za-z0-9.]+$/, label: 'assessment element codes' }],
  },
  benchmarks: {
    required: ['benchmark_id', 'publication_date', 'emissions_metric'],
    uniqueKey: ['benchmark_id'],
  },
  benchmark_values: {
    allowEmpty: true,
    required: ['year', 'benchmark_id', 'value'],
    uniqueKey: ['year', 'benchmark_id'],
    ranges: [year('year', 'benchmark value years')],
  },
  assessment_results: {
    required: ['assessment_id', 'code', 'assessment_date', 'country_name'],
    uniqueKey: ['assessment_id', 'code'],
    dates: ['assessment_date'],
  },
  assessment_trends: {
    required: ['trend_id', 'country_name', 'emissions_metric'],
    uniqueKey: ['trend_id', 'country_name'],
  },
  trend_values: {
    allowEmpty: true,
    required: ['trend_id', 'country_name', 'year', 'value'],
    uniqueKey: ['trend_id', 'country_name', 'year'],
    ranges: [year('year', 'trend value years')],
  },
  value_per_year: {
    allowEmpty: true,
    required: ['year', 'value', 'trend_id', 'country_name'],
    uniqueKey: ['year', 'trend_id', 'country_name'],
    ranges: [year('year', 'yearly value years')],
  },

  // TPI
  company: {
    required: ['company_name', 'version', 'geography', 'sector_name'],
    uniqueKey: ['company_name', 'version'],
    formats: [VERSION],
  },
  company_answer: {
    required: ['question_code', 'company_name', 'version', 'response'],
    uniqueKey: ['question_code', 'company_name', 'version'],
    formats: [{ column: 'question_code', pattern: /^[A-Za-z0-9.]+$/, label: 'question codes' }, VERSION],
  },
  mq_assessment: {
    required: ['assessment_date', 'company_name', 'version', 'tpi_cycle'],
    uniqueKey: ['assessment_date', 'company_name', 'version', 'tpi_cycle'],
    formats: [VERSION],
    ranges: [{ column: 'tpi_cycle', min: 1, max: 5, label: 'TPI cycle values' }],
    dates: ['assessment_date'],
  },
  cp_assessment: {
    required: ['assessment_date', 'company_name', 'version', 'is_regional'],
    uniqueKey: ['assessment_date', 'company_name', 'version', 'is_regional'],
    formats: [VERSION],
    dates: ['assessment_date'],
  },
  cp_alignment: {
    allowEmpty: true,
    required: ['cp_alignment_year', 'cp_alignment_value', 'assessment_date', 'company_name'],
    uniqueKey: ['cp_alignment_year', 'assessment_date', 'company_name', 'version', 'is_regional'],
    ranges: [year('cp_alignment_year', 'alignment years')],
  },
  cp_projection: {
    allowEmpty: true,
    required: ['cp_projection_year', 'cp_projection_value', 'assessment_date', 'company_name'],
    uniqueKey: ['cp_projection_year', 'assessment_date', 'company_name', 'version', 'is_regional'],
    ranges: [year('cp_projection_year', 'projection years')],
  },
  sector_benchmark: {
    required: ['benchmark_id', 'sector_name', 'scenario_name'],
    uniqueKey: ['benchmark_id', 'sector_name', 'scenario_name'],
  },
  benchmark_projection: {
    allowEmpty: true,
    required: ['benchmark_projection_year', 'benchmark_projection_attribute'],
    uniqueKey: ['benchmark_projection_year', 'benchmark_id', 'sector_name', 'scenario_name'],
    ranges: [year('benchmark_projection_year', 'benchmark projection years')],
  },
};
