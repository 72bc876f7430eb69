import type { Cell, Row } from './types';
import type { YearColumn } from './columns';
import { isMissing } from './coerce';

/**
 * Wide-to-long over year columns. Iterates column by column, so output is grouped by year
 * in header order. Cells that are missing, or that `build` rejects with null, produce no row.
 */
export function meltYears<T>(
  rows: readonly Row[],
  columns: readonly YearColumn[],
  build: (row: Row, year: number, value: Cell) => T | null
): T[] {
  const melted: T[] = [];
  for (const column of columns) {
    for (const row of rows) {
      const value = row[column.header] ?? null;
      if (isMissing(value)) continue;
      const record = build(row, column.year, value);
      if (record !== null) {
        melted.push(record);
      }
    }
  }
  return melted;
}

