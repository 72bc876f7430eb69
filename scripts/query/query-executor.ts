import * as sql from 'mssql';
import { toStorageError } from '../lib/error-handler';

export type QueryValue = string | number | Date | null;

export type QueryParams = Record<string, QueryValue>;

export type ResultRow = Record<string, unknown>;

/**
 * Read-only access to the loaded relations. Rows come back untyped; callers map them.
 */
export interface QueryExecutor {
  query(text: string, params?: QueryParams): Promise<ResultRow[]>;
}

export class MssqlQueryExecutor implements QueryExecutor {
  constructor(private readonly pool: sql.ConnectionPool) {}

  async query(text: string, params: QueryParams = {}): Promise<ResultRow[]> {
    const request = this.pool.request();
    for (const [name, value] of Object.entries(params)) {
      request.input(name, value);
    }
    try {
      const result = await request.query<ResultRow>(text);
      return result.recordset;
    } catch (error) {
      throw toStorageError(error, 'query');
    }
  }
}

export function asText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value);
}

export function asNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function asDate(value: unknown): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === 'string') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}
