import type { Row } from '../lib/types';
import { TableShape, cell } from '../lib/columns';
import { parseDayFirstDate, parseInteger, parseNumber, toText } from '../lib/coerce';

/**
 * Typed cell readers bound to one export's column description.
 */
export interface CellReader {
  text(row: Row, key: string): string | null;
  integer(row: Row, key: string): number | null;
  number(row: Row, key: string): number | null;
  date(row: Row, key: string): Date | null;
}

export function reader(shape: TableShape): CellReader {
  return {
    text: (row, key) => toText(cell(row, shape, key)),
    integer: (row, key) => parseInteger(cell(row, shape, key)),
    number: (row, key) => parseNumber(cell(row, shape, key)),
    date: (row, key) => parseDayFirstDate(cell(row, shape, key)),
  };
}

/**
 * Output result of a reshaper that also reports row-level problems.
 */
export interface Reshaped<T> {
  value: T;
  warnings: string[];
}

/**
 * Union of column lists, first-seen order.
 */
export function unionColumns(...lists: ReadonlyArray<readonly string[]>): string[] {
  return [...new Set(lists.flat())];
}
