export type CountryRow = {
  country_name: string | null;
  iso: string | null;
  region: string | null;
  bank_lending_group: string | null;
  imf_category: string | null;
  un_party_type: string | null;
};

export type AssessmentElementRow = {
  code: string | null;
  text: string | null;
  response_type: string | null;
  type: string | null;
};

export type BenchmarkRow = {
  benchmark_id: number | null;
  publication_date: Date | null;
  emissions_metric: string | null;
  emissions_boundary: string | null;
  units: string | null;
  benchmark_type: string | null;
  country_name: string | null;
};

export type BenchmarkValueRow = {
  year: number;
  benchmark_id: number | null;
  value: number;
};

export type AssessmentResultRow = {
  assessment_id: number | null;
  code: string;
  response: string | null;
  assessment_date: Date | null;
  publication_date: Date | null;
  source: string | null;
  year: number | null;
  country_name: string | null;
};

export type AssessmentTrendRow = {
  trend_id: number | null;
  country_name: string | null;
  emissions_metric: string | null;
  emissions_boundary: string | null;
  units: string | null;
  assessment_date: Date | null;
  publication_date: Date | null;
  last_historical_year: number | null;
};

export type TrendValueRow = {
  trend_id: number | null;
  country_name: string | null;
  year: number;
  value: number;
};

export type ValuePerYearRow = {
  year: number;
  value: number;
  trend_id: number | null;
  country_name: string | null;
};
