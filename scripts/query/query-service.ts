import { groupBy, sortBy, uniq } from 'lodash';
import { QueryParameterError } from '../lib/errors';
import { QueryExecutor, ResultRow, asDate, asNumber, asText } from './query-executor';

export const MAX_PAGE_SIZE = 100;

/** alignment years surfaced by the company list and the CP comparison */
export const CP_COMPARISON_YEARS = [2025, 2035] as const;

export interface PageRequest {
  page: number;
  pageSize: number;
}

export interface Page<T> {
  page: number;
  pageSize: number;
  total: number;
  items: T[];
}

export interface CompanyFilters {
  sector?: string;
  geography?: string;
  version?: string;
}

export interface CountryFilters {
  region?: string;
}

export interface CompanySummary {
  companyName: string;
  version: string | null;
  geography: string | null;
  sector: string | null;
  latestMqDate: Date | null;
  managementQuality: number | null;
  cpAlignment2035: string | null;
}

export interface CompanyHistoryEntry {
  assessmentDate: Date | null;
  tpiCycle: number | null;
  level: number | null;
  performanceChange: string | null;
  cpAlignment2035: string | null;
}

export interface CompanyHistory {
  companyName: string;
  geography: string | null;
  sector: string | null;
  assessments: CompanyHistoryEntry[];
}

export interface LatestMqAssessment {
  companyName: string;
  sector: string | null;
  geography: string | null;
  assessmentDate: Date | null;
  assessmentYear: number | null;
  tpiCycle: number | null;
  level: number | null;
}

export interface CpComparison {
  companyName: string;
  latestAssessmentYear: number;
  previousAssessmentYear: number;
  alignments: Array<{ year: number; latest: string | null; previous: string | null }>;
}

export interface CountrySummary {
  countryName: string;
  iso: string | null;
  region: string | null;
  bankLendingGroup: string | null;
  imfCategory: string | null;
  unPartyType: string | null;
}

export interface CountryAssessmentResult {
  assessmentId: number | null;
  code: string | null;
  elementText: string | null;
  elementType: string | null;
  responseType: string | null;
  response: string | null;
  source: string | null;
  year: number | null;
  assessmentDate: Date | null;
  publicationDate: Date | null;
}

export interface CountryAssessment {
  country: CountrySummary;
  results: CountryAssessmentResult[];
}

export function validatePage(request: PageRequest): void {
  if (!Number.isInteger(request.page) || request.page < 1) {
    throw new QueryParameterError('page', `page must be an integer >= 1 (got ${request.page})`);
  }
  if (!Number.isInteger(request.pageSize) || request.pageSize < 1 || request.pageSize > MAX_PAGE_SIZE) {
    throw new QueryParameterError(
      'pageSize',
      `pageSize must be an integer between 1 and ${MAX_PAGE_SIZE} (got ${request.pageSize})`
    );
  }
}

export function pageOffset(request: PageRequest): number {
  return (request.page - 1) * request.pageSize;
}

function requireName(parameter: string, value: string): string {
  const trimmed = value.trim();
  if (trimmed === '') {
    throw new QueryParameterError(parameter, `${parameter} must not be empty`);
  }
  return trimmed;
}

function totalOf(rows: readonly ResultRow[]): number {
  return asNumber(rows[0]?.total) ?? 0;
}

function toCountry(row: ResultRow): CountrySummary {
  return {
    countryName: asText(row.country_name) ?? '',
    iso: asText(row.iso),
    region: asText(row.region),
    bankLendingGroup: asText(row.bank_lending_group),
    imfCategory: asText(row.imf_category),
    unPartyType: asText(row.un_party_type),
  };
}

/**
 * Read-only, parameterized queries over the loaded ASCOR and TPI relations.
 */
export class QueryService {
  constructor(
    private readonly executor: QueryExecutor,
    private readonly schemas: { ascor: string; tpi: string }
  ) {}

  private tpi(table: string): string {
    return `[${this.schemas.tpi}].[${table}]`;
  }

  private ascor(table: string): string {
    return `[${this.schemas.ascor}].[${table}]`;
  }

  /**
   * One row per company (its highest version) with the latest MQ level and 2035 CP alignment.
   */
  async listCompanies(request: PageRequest, filters: CompanyFilters = {}): Promise<Page<CompanySummary>> {
    validatePage(request);
    const params = {
      sector: filters.sector ?? null,
      geography: filters.geography ?? null,
      version: filters.version ?? null,
    };
    const where = `
      WHERE (@sector IS NULL OR c.sector_name = @sector)
        AND (@geography IS NULL OR c.geography = @geography)
        AND (@version IS NULL OR c.version = @version)`;

    const count = await this.executor.query(
      `SELECT COUNT(DISTINCT c.company_name) AS total FROM ${this.tpi('company')} c ${where}`,
      params
    );
    const rows = await this.executor.query(
      `
      WITH ranked AS (
        SELECT c.company_name, c.version, c.geography, c.sector_name,
               ROW_NUMBER() OVER (PARTITION BY c.company_name ORDER BY TRY_CAST(c.version AS FLOAT) DESC) AS rn
        FROM ${this.tpi('company')} c
        ${where}
      )
      SELECT r.company_name, r.version, r.geography, r.sector_name,
             mq.assessment_date AS latest_mq_date, mq.level AS mq_level,
             cp.cp_alignment_value AS cp_alignment_2035
      FROM ranked r
      OUTER APPLY (
        SELECT TOP 1 m.assessment_date, m.level
        FROM ${this.tpi('mq_assessment')} m
        WHERE m.company_name = r.company_name AND m.version = r.version
        ORDER BY m.assessment_date DESC
      ) mq
      OUTER APPLY (
        SELECT TOP 1 a.cp_alignment_value
        FROM ${this.tpi('cp_alignment')} a
        WHERE a.company_name = r.company_name AND a.version = r.version AND a.cp_alignment_year = 2035
        ORDER BY a.assessment_date DESC
      ) cp
      WHERE r.rn = 1
      ORDER BY r.company_name
      OFFSET @offset ROWS FETCH NEXT @pageSize ROWS ONLY`,
      { ...params, offset: pageOffset(request), pageSize: request.pageSize }
    );

    return {
      page: request.page,
      pageSize: request.pageSize,
      total: totalOf(count),
      items: rows.map(row => ({
        companyName: asText(row.company_name) ?? '',
        version: asText(row.version),
        geography: asText(row.geography),
        sector: asText(row.sector_name),
        latestMqDate: asDate(row.latest_mq_date),
        managementQuality: asNumber(row.mq_level),
        cpAlignment2035: asText(row.cp_alignment_2035),
      })),
    };
  }

  /**
   * Every MQ assessment of a company (case-insensitive name), newest first.
   * Null when the company has none.
   */
  async getCompanyHistory(companyName: string): Promise<CompanyHistory | null> {
    const name = requireName('companyName', companyName);
    const rows = await this.executor.query(
      `
      SELECT c.company_name, c.geography, c.sector_name,
             mq.assessment_date, mq.tpi_cycle, mq.level, mq.performance_change,
             a.cp_alignment_value AS cp_alignment_2035
      FROM ${this.tpi('company')} c
      JOIN ${this.tpi('mq_assessment')} mq
        ON c.company_name = mq.company_name AND c.version = mq.version
      LEFT JOIN ${this.tpi('cp_alignment')} a
        ON c.company_name = a.company_name AND c.version = a.version
       AND mq.assessment_date = a.assessment_date AND a.cp_alignment_year = 2035
      WHERE LOWER(c.company_name) = LOWER(@companyName)
      ORDER BY mq.assessment_date DESC, mq.tpi_cycle DESC`,
      { companyName: name }
    );
    const [first] = rows;
    if (!first) return null;

    return {
      companyName: asText(first.company_name) ?? name,
      geography: asText(first.geography),
      sector: asText(first.sector_name),
      assessments: rows.map(row => ({
        assessmentDate: asDate(row.assessment_date),
        tpiCycle: asNumber(row.tpi_cycle),
        level: asNumber(row.level),
        performanceChange: asText(row.performance_change),
        cpAlignment2035: asText(row.cp_alignment_2035),
      })),
    };
  }

  /**
   * Latest MQ assessment per company (newest date, then highest cycle).
   */
  async getLatestMqAssessments(request: PageRequest): Promise<Page<LatestMqAssessment>> {
    validatePage(request);
    const count = await this.executor.query(
      `SELECT COUNT(DISTINCT company_name) AS total FROM ${this.tpi('mq_assessment')}`
    );
    const rows = await this.executor.query(
      `
      WITH ranked AS (
        SELECT mq.company_name, mq.version, mq.assessment_date, mq.tpi_cycle, mq.level,
               ROW_NUMBER() OVER (PARTITION BY mq.company_name ORDER BY mq.assessment_date DESC, mq.tpi_cycle DESC) AS rn
        FROM ${this.tpi('mq_assessment')} mq
      )
      SELECT r.company_name, c.sector_name, c.geography, r.assessment_date, r.tpi_cycle, r.level
      FROM ranked r
      LEFT JOIN ${this.tpi('company')} c ON c.company_name = r.company_name AND c.version = r.version
      WHERE r.rn = 1
      ORDER BY r.company_name
      OFFSET @offset ROWS FETCH NEXT @pageSize ROWS ONLY`,
      { offset: pageOffset(request), pageSize: request.pageSize }
    );

    return {
      page: request.page,
      pageSize: request.pageSize,
      total: totalOf(count),
      items: rows.map(row => {
        const assessmentDate = asDate(row.assessment_date);
        return {
          companyName: asText(row.company_name) ?? '',
          sector: asText(row.sector_name),
          geography: asText(row.geography),
          assessmentDate,
          assessmentYear: assessmentDate ? assessmentDate.getUTCFullYear() : null,
          tpiCycle: asNumber(row.tpi_cycle),
          level: asNumber(row.level),
        };
      }),
    };
  }

  /**
   * CP alignments of the company's two most recent assessment years, side by side.
   * Null unless two distinct assessment years exist.
   */
  async getCpComparison(companyName: string): Promise<CpComparison | null> {
    const name = requireName('companyName', companyName);
    const rows = await this.executor.query(
      `
      SELECT a.company_name, a.assessment_date, a.cp_alignment_year, a.cp_alignment_value
      FROM ${this.tpi('cp_alignment')} a
      WHERE LOWER(a.company_name) = LOWER(@companyName)
        AND a.cp_alignment_year IN (${CP_COMPARISON_YEARS.join(', ')})
      ORDER BY a.assessment_date DESC`,
      { companyName: name }
    );

    const dated = rows.flatMap(row => {
      const assessmentDate = asDate(row.assessment_date);
      return assessmentDate ? [{ row, assessmentYear: assessmentDate.getUTCFullYear(), assessmentDate }] : [];
    });
    const years = uniq(dated.map(entry => entry.assessmentYear)).sort((a, b) => b - a);
    if (years.length < 2) return null;
    const [latestYear, previousYear] = years;

    const byYear = groupBy(dated, entry => entry.assessmentYear);
    const valueFor = (assessmentYear: number, alignmentYear: number): string | null => {
      const candidates = sortBy(byYear[assessmentYear] ?? [], entry => -entry.assessmentDate.getTime());
      const match = candidates.find(entry => asNumber(entry.row.cp_alignment_year) === alignmentYear);
      return match ? asText(match.row.cp_alignment_value) : null;
    };

    return {
      companyName: asText(dated[0]?.row.company_name) ?? name,
      latestAssessmentYear: latestYear,
      previousAssessmentYear: previousYear,
      alignments: CP_COMPARISON_YEARS.map(year => ({
        year,
        latest: valueFor(latestYear, year),
        previous: valueFor(previousYear, year),
      })),
    };
  }

  /**
   * A country's assessment results for one assessment year, or for its latest assessment
   * when no year is given. Null when the country is unknown.
   */
  async getCountryAssessment(countryName: string, assessmentYear?: number): Promise<CountryAssessment | null> {
    const name = requireName('countryName', countryName);
    if (assessmentYear !== undefined && (!Number.isInteger(assessmentYear) || assessmentYear < 2000 || assessmentYear > 2100)) {
      throw new QueryParameterError('assessmentYear', `assessmentYear must be an integer between 2000 and 2100 (got ${assessmentYear})`);
    }

    const countries = await this.executor.query(
      `SELECT * FROM ${this.ascor('country')} WHERE LOWER(country_name) = LOWER(@countryName)`,
      { countryName: name }
    );
    const [countryRow] = countries;
    if (!countryRow) return null;
    const country = toCountry(countryRow);

    const rows = await this.executor.query(
      `
      SELECT ar.assessment_id, ar.code, ar.response, ar.assessment_date, ar.publication_date,
             ar.source, ar.year, ae.text AS element_text, ae.response_type, ae.type AS element_type
      FROM ${this.ascor('assessment_results')} ar
      JOIN ${this.ascor('assessment_elements')} ae ON ar.code = ae.code
      WHERE ar.country_name = @countryName
        AND (
          (@assessmentYear IS NOT NULL AND YEAR(ar.assessment_date) = @assessmentYear)
          OR (@assessmentYear IS NULL AND ar.assessment_date = (
            SELECT MAX(latest.assessment_date)
            FROM ${this.ascor('assessment_results')} latest
            WHERE latest.country_name = @countryName
          ))
        )
      ORDER BY ar.code`,
      { countryName: country.countryName, assessmentYear: assessmentYear ?? null }
    );

    return {
      country,
      results: rows.map(row => ({
        assessmentId: asNumber(row.assessment_id),
        code: asText(row.code),
        elementText: asText(row.element_text),
        elementType: asText(row.element_type),
        responseType: asText(row.response_type),
        response: asText(row.response),
        source: asText(row.source),
        year: asNumber(row.year),
        assessmentDate: asDate(row.assessment_date),
        publicationDate: asDate(row.publication_date),
      })),
    };
  }

  async listCountries(request: PageRequest, filters: CountryFilters = {}): Promise<Page<CountrySummary>> {
    validatePage(request);
    const params = { region: filters.region ?? null };
    const where = 'WHERE (@region IS NULL OR region = @region)';

    const count = await this.executor.query(`SELECT COUNT(*) AS total FROM ${this.ascor('country')} ${where}`, params);
    const rows = await this.executor.query(
      `
      SELECT country_name, iso, region, bank_lending_group, imf_category, un_party_type
      FROM ${this.ascor('country')}
      ${where}
      ORDER BY country_name
      OFFSET @offset ROWS FETCH NEXT @pageSize ROWS ONLY`,
      { ...params, offset: pageOffset(request), pageSize: request.pageSize }
    );

    return {
      page: request.page,
      pageSize: request.pageSize,
      total: totalOf(count),
      items: rows.map(toCountry),
    };
  }
}
