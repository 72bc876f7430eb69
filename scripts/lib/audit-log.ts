import * as sql from 'mssql';
import { toStorageError } from './error-handler';

export type AuditStatus =
  | 'STARTED'
  | 'COMPLETED'
  | 'COMPLETED_WITH_WARNINGS'
  | 'VALIDATION_PASSED'
  | 'VALIDATION_WARNINGS'
  | 'VALIDATION_FAILED'
  | 'FAILED';

export interface AuditEntry {
  process: string;
  status: AuditStatus;
  notes?: string | null;
  tableName?: string | null;
  sourceFile?: string | null;
  rowsInserted?: number | null;
}

export interface AuditRecord extends Required<AuditEntry> {
  executionId: number;
  executionTimestamp: Date;
  executionUser: string | null;
}

/**
 * Append-only record of pipeline activity. Survives dataset drops.
 */
export interface AuditLog {
  record(entry: AuditEntry): Promise<void>;
  recent(limit: number): Promise<AuditRecord[]>;
}

interface AuditRow {
  execution_id: number;
  execution_timestamp: Date;
  execution_user: string | null;
  process: string;
  execution_status: AuditStatus;
  execution_notes: string | null;
  table_name: string | null;
  source_file: string | null;
  rows_inserted: number | null;
}

/**
 * Audit log stored in `[etl].[audit_log]`
 */
export class MssqlAuditLog implements AuditLog {
  constructor(
    private readonly pool: sql.ConnectionPool,
    private readonly schema: string
  ) {}

  async record(entry: AuditEntry): Promise<void> {
    try {
      await this.pool.request()
        .input('Process', sql.NVarChar(255), entry.process)
        .input('Status', sql.NVarChar(50), entry.status)
        .input('Notes', sql.NVarChar(sql.MAX), entry.notes ?? null)
        .input('TableName', sql.NVarChar(255), entry.tableName ?? null)
        .input('SourceFile', sql.NVarChar(1024), entry.sourceFile ?? null)
        .input('RowsInserted', sql.Int, entry.rowsInserted ?? null)
        .query(`
          INSERT INTO [${this.schema}].[audit_log]
            (process, execution_status, execution_notes, table_name, source_file, rows_inserted)
          VALUES (@Process, @Status, @Notes, @TableName, @SourceFile, @RowsInserted)
        `);
    } catch (error) {
      throw toStorageError(error, 'write audit entry', `${this.schema}.audit_log`);
    }
  }

  /**
   * Most recent entries, newest first
   */
  async recent(limit: number): Promise<AuditRecord[]> {
    const result = await this.pool.request()
      .input('Limit', sql.Int, limit)
      .query<AuditRow>(`
        SELECT TOP (@Limit) *
        FROM [${this.schema}].[audit_log]
        ORDER BY execution_id DESC
      `);

    return result.recordset.map(row => ({
      executionId: row.execution_id,
      executionTimestamp: row.execution_timestamp,
      executionUser: row.execution_user,
      process: row.process,
      status: row.execution_status,
      notes: row.execution_notes,
      tableName: row.table_name,
      sourceFile: row.source_file,
      rowsInserted: row.rows_inserted,
    }));
  }
}
