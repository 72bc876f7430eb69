import { sortBy, uniq } from 'lodash';
import { QueryExecutor, asText } from './query-executor';

export interface CompanyRecord {
  companyName: string;
  version: string;
  geography: string | null;
  sector: string | null;
}

/**
 * In-memory snapshot of `tpi.company`. Nothing is cached at module level: the snapshot
 * lives on the instance and is refreshed only by `reload()`.
 */
export class CompanyDataAccess {
  private snapshot: CompanyRecord[] | null = null;
  private loadedAt: Date | null = null;

  constructor(
    private readonly executor: QueryExecutor,
    private readonly schema: string
  ) {}

  get lastLoaded(): Date | null {
    return this.loadedAt;
  }

  async reload(): Promise<number> {
    const rows = await this.executor.query(
      `SELECT company_name, version, geography, sector_name FROM [${this.schema}].[company] ORDER BY company_name, version`
    );
    this.snapshot = rows.flatMap(row => {
      const companyName = asText(row.company_name);
      const version = asText(row.version);
      if (companyName === null || version === null) return [];
      return [{ companyName, version, geography: asText(row.geography), sector: asText(row.sector_name) }];
    });
    this.loadedAt = new Date();
    return this.snapshot.length;
  }

  private async records(): Promise<CompanyRecord[]> {
    if (this.snapshot === null) {
      await this.reload();
    }
    return this.snapshot ?? [];
  }

  async all(): Promise<CompanyRecord[]> {
    return [...(await this.records())];
  }

  /** every version of a company, case-insensitive on the name */
  async find(companyName: string): Promise<CompanyRecord[]> {
    const needle = companyName.trim().toLowerCase();
    return (await this.records()).filter(record => record.companyName.toLowerCase() === needle);
  }

  async sectors(): Promise<string[]> {
    const sectors = (await this.records()).flatMap(record => (record.sector === null ? [] : [record.sector]));
    return sortBy(uniq(sectors));
  }
}
