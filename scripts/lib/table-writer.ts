import * as sql from 'mssql';
import type { Cell, Row } from './types';
import type { ColumnSpec, SqlColumnType, TableSpec } from './table-catalog';
import { parseDayFirstDate, parseInteger, parseNumber, toText } from './coerce';
import { toStorageError } from './error-handler';

/**
 * Append-only sink for one table. Returns the number of rows written.
 */
export interface TableWriter {
  write(table: TableSpec, rows: readonly Row[]): Promise<number>;
}

type StoredValue = string | number | Date | null;

/**
 * Convert a cell to the value stored in a column of the given type.
 */
export function toStoredValue(value: Cell | undefined, type: SqlColumnType): StoredValue {
  switch (type) {
    case 'text':
    case 'longText':
      return toText(value);
    case 'int':
      return parseInteger(value);
    case 'float':
      return parseNumber(value);
    case 'date':
      // reshaped dates are UTC midnight already
      if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
      return parseDayFirstDate(value);
  }
}

function sqlType(column: ColumnSpec): sql.ISqlType {
  switch (column.type) {
    case 'text':
      return sql.NVarChar(255);
    case 'longText':
      return sql.NVarChar(sql.MAX);
    case 'int':
      return sql.Int();
    case 'float':
      return sql.Float();
    case 'date':
      return sql.Date();
  }
}

/**
 * Bulk insert through mssql, one transaction per table. A failed write rolls back
 * and is rethrown as StorageError; there is no retry.
 */
export class MssqlTableWriter implements TableWriter {
  constructor(
    private readonly pool: sql.ConnectionPool,
    private readonly schema: string
  ) {}

  async write(spec: TableSpec, rows: readonly Row[]): Promise<number> {
    if (rows.length === 0) return 0;

    const table = new sql.Table(`[${this.schema}].[${spec.name}]`);
    table.create = false;
    for (const column of spec.columns) {
      table.columns.add(column.name, sqlType(column), { nullable: column.nullable });
    }
    for (const row of rows) {
      table.rows.add(...spec.columns.map(column => toStoredValue(row[column.name], column.type)));
    }

    const transaction = new sql.Transaction(this.pool);
    try {
      await transaction.begin();
      const result = await new sql.Request(transaction).bulk(table);
      await transaction.commit();
      return result.rowsAffected;
    } catch (error) {
      try {
        await transaction.rollback();
      } catch (rollbackError) {
        console.error(`  ⚠️  Failed to rollback ${spec.name}:`, rollbackError);
      }
      throw toStorageError(error, 'bulk insert', `${this.schema}.${spec.name}`);
    }
  }
}
