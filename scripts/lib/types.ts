export type Cell = string | number | boolean | Date | null;

export type Row = Record<string, Cell>;

/**
 * One sheet of a source export exactly as read: headers untouched, one record per data row.
 */
export interface RawTable {
  columns: string[];
  rows: Row[];
  sourceFile: string | null;
}

/**
 * A normalized record set ready for validation and loading.
 * `columns` lists only the columns the source actually supplied (plus derived ones),
 * so a header missing from the export surfaces as a missing required column.
 */
export interface Relation<T extends Row = Row> {
  name: string;
  columns: readonly string[];
  rows: T[];
  sourceFile: string | null;
}

export type DatasetName = 'ascor' | 'tpi';
