import type { Cell } from './types';

const MISSING_SENTINELS = new Set(['', 'no data', 'n/a', 'na', 'nan', 'none', 'null', '-', '--']);

// 1899-12-30: day zero of spreadsheet serial dates
const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function isMissing(value: Cell | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return value.trim() === '';
  if (value instanceof Date) return Number.isNaN(value.getTime());
  return false;
}

function isSentinel(text: string): boolean {
  return MISSING_SENTINELS.has(text.trim().toLowerCase());
}

/**
 * Trimmed text, or null for empty cells. Dates render as yyyy-mm-dd.
 */
export function toText(value: Cell | undefined): string | null {
  if (value === null || value === undefined || isMissing(value)) return null;
  if (value instanceof Date) return formatDate(value);
  const text = String(value).trim();
  return text === '' ? null : text;
}

/**
 * Permissive numeric parse: numbers pass through, numeric text is parsed
 * (thousands separators allowed), sentinel text such as "No data" becomes null.
 */
export function parseNumber(value: Cell | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean' || value instanceof Date) return null;
  if (isSentinel(value)) return null;

  const cleaned = value.trim().replace(/,/g, '');
  if (!/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(cleaned)) return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parseInteger(value: Cell | undefined): number | null {
  const parsed = parseNumber(value);
  if (parsed === null) return null;
  return Number.isInteger(parsed) ? parsed : Math.trunc(parsed);
}

function utcDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Day-first date parsing. Accepts dd/mm/yyyy (also with `-` or `.`, optional time part),
 * ISO yyyy-mm-dd, spreadsheet serial numbers and Date cells. Anything else is null.
 */
export function parseDayFirstDate(value: Cell | undefined): Date | null {
  if (value === null || value === undefined || typeof value === 'boolean') return null;

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return utcDate(value.getFullYear(), value.getMonth() + 1, value.getDate());
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) return null;
    const serial = new Date(SERIAL_EPOCH_MS + Math.floor(value) * MS_PER_DAY);
    return utcDate(serial.getUTCFullYear(), serial.getUTCMonth() + 1, serial.getUTCDate());
  }

  const text = value.trim();
  if (isSentinel(text)) return null;

  const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T].*)?$/.exec(text);
  if (iso) {
    return utcDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const dayFirst = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{2}|\d{4})(?:[ T].*)?$/.exec(text);
  if (dayFirst) {
    const rawYear = Number(dayFirst[3]);
    const year = dayFirst[3].length === 2 ? 2000 + rawYear : rawYear;
    return utcDate(year, Number(dayFirst[2]), Number(dayFirst[1]));
  }

  return null;
}

/**
 * Cut-off columns hold either a bare year (2021) or a full date.
 * A bare year maps to 1 January of that year.
 */
export function parseYearOrDate(value: Cell | undefined): Date | null {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 1000 && value <= 9999) {
    return utcDate(value, 1, 1);
  }
  if (typeof value === 'string' && /^\s*\d{4}(\.0+)?\s*$/.test(value)) {
    return utcDate(Math.trunc(Number(value)), 1, 1);
  }
  return parseDayFirstDate(value);
}

export interface LevelParse {
  value: number | null;
  /** false when a non-empty cell could not be read as a level */
  ok: boolean;
}

const STAR_MARKER = /STAR/i;

/**
 * Management-quality levels arrive as plain numerals ("4") or with a STAR marker
 * ("STAR 3", "4STAR"). The marker is stripped before the numeric parse.
 */
export function parseLevel(value: Cell | undefined): LevelParse {
  if (isMissing(value)) return { value: null, ok: true };
  if (typeof value === 'number') return { value, ok: Number.isFinite(value) };

  const text = String(value).trim();
  if (STAR_MARKER.test(text)) {
    const stripped = parseNumber(text.replace(/STAR/gi, '').trim());
    if (stripped !== null) return { value: stripped, ok: true };
  }

  const plain = parseNumber(text);
  return plain === null ? { value: null, ok: false } : { value: plain, ok: true };
}

export function formatDate(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}
