import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse';
import { readFile, utils } from 'xlsx';
import type { Cell, RawTable, Row } from './types';

export class UnsupportedSourceError extends Error {
  constructor(public readonly filePath: string) {
    super(`Unsupported source format: ${path.basename(filePath)} (expected .csv, .xlsx or .xls)`);
    this.name = 'UnsupportedSourceError';
  }
}

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value === '' ? null : value;
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  return String(value);
}

function headerName(value: unknown, index: number): string {
  const text = value === null || value === undefined ? '' : String(value);
  return text === '' ? `column_${index + 1}` : text;
}

/**
 * Build a RawTable from a header row followed by data rows.
 * Short rows are padded with nulls; fully empty rows are dropped.
 */
export function tableFromMatrix(matrix: readonly unknown[][], sourceFile: string | null): RawTable {
  if (matrix.length === 0) {
    return { columns: [], rows: [], sourceFile };
  }
  const columns = matrix[0].map(headerName);
  const rows: Row[] = [];

  for (const values of matrix.slice(1)) {
    const row: Row = {};
    let empty = true;
    columns.forEach((column, i) => {
      const value = toCell(values[i]);
      if (value !== null) empty = false;
      row[column] = value;
    });
    if (!empty) rows.push(row);
  }

  return { columns, rows, sourceFile };
}

/**
 * Stream a CSV export. Every value stays text; typing happens in the reshapers.
 */
export async function readCsv(filePath: string): Promise<RawTable> {
  const parser = fs.createReadStream(filePath).pipe(
    parse({
      columns: false,
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: false,
    })
  );

  const matrix: string[][] = [];
  for await (const record of parser) {
    if (Array.isArray(record)) {
      matrix.push(record.map(value => String(value)));
    }
  }

  return tableFromMatrix(matrix, filePath);
}

/**
 * First sheet of an Excel workbook, header row first. Date cells come back as Date.
 */
export function readWorkbook(filePath: string): RawTable {
  const workbook = readFile(filePath, { cellDates: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    return { columns: [], rows: [], sourceFile: filePath };
  }

  const matrix: unknown[][] = utils.sheet_to_json(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false,
  });
  return tableFromMatrix(matrix, filePath);
}

export async function readSource(filePath: string): Promise<RawTable> {
  const extension = path.extname(filePath).toLowerCase();
  switch (extension) {
    case '.csv':
      return readCsv(filePath);
    case '.xlsx':
    case '.xls':
      return readWorkbook(filePath);
    default:
      throw new UnsupportedSourceError(filePath);
  }
}
