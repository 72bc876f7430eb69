export type CompanyRow = {
  company_name: string | null;
  version: string;
  geography: string | null;
  isin: string | null;
  ca100_focus: string | null;
  size_classification: string | null;
  geography_code: string | null;
  sedol: string | null;
  sector_name: string | null;
};

export type CompanyAnswerRow = {
  question_code: string;
  company_name: string | null;
  version: string;
  question_text: string;
  response: string;
};

export type MqAssessmentRow = {
  assessment_date: Date | null;
  company_name: string | null;
  version: string;
  tpi_cycle: number;
  publication_date: Date | null;
  level: number | null;
  performance_change: string | null;
};

export type CpAssessmentRow = {
  assessment_date: Date | null;
  company_name: string | null;
  version: string;
  is_regional: string;
  publication_date: Date | null;
  assumptions: string | null;
  cp_unit: string | null;
  projection_cutoff: Date | null;
  benchmark_id: string | null;
};

export type CpAlignmentRow = {
  cp_alignment_year: number;
  cp_alignment_value: string;
  assessment_date: Date | null;
  company_name: string | null;
  version: string;
  is_regional: string;
};

export type CpProjectionRow = {
  cp_projection_year: number;
  cp_projection_value: number;
  assessment_date: Date | null;
  company_name: string | null;
  version: string;
  is_regional: string;
};

export type SectorBenchmarkRow = {
  benchmark_id: string | null;
  sector_name: string | null;
  scenario_name: string | null;
  region: string | null;
  release_date: Date | null;
  unit: string | null;
};

export type BenchmarkProjectionRow = {
  benchmark_projection_year: number;
  benchmark_projection_attribute: number;
  benchmark_id: string | null;
  sector_name: string | null;
  scenario_name: string | null;
};
