import type { Cell, Row } from './types';
import { Matcher, firstMatch } from './matchers';

export type ResponseRole = 'area' | 'indicator' | 'metric';
export type SiblingRole = 'year' | 'source';

export interface YearColumn {
  header: string;
  year: number;
}

export interface PrefixedYearColumn extends YearColumn {
  prefix: string;
}

/** `indicator EP.1.a`: one response per assessment row */
export interface RoleColumn {
  header: string;
  role: ResponseRole;
  code: string;
}

/** `year indicator EP.1.a` / `source EP.1.a`: metadata attached to a response column */
export interface SiblingColumn {
  header: string;
  role: SiblingRole;
  target: string;
}

/** `Q1L0|Does the company ...` */
export interface QuestionColumn {
  header: string;
  code: string;
  text: string;
}

export interface TableShape {
  identity: string[];
  years: YearColumn[];
  prefixedYears: PrefixedYearColumn[];
  roleCoded: RoleColumn[];
  siblings: SiblingColumn[];
  questions: QuestionColumn[];
  /** normalized header → header as it appears in the rows */
  byKey: Map<string, string>;
}

export interface DescribeOptions {
  yearRange?: { min: number; max: number };
  /** normalized prefixes such as `carbon_performance_alignment_` */
  yearPrefixes?: readonly string[];
}

const ROLE_CODED = /^(area|indicator|metric|year|source)\s+(.+)$/i;
const CODE = /^[A-Za-z0-9.]+$/;
const YEAR = /^\d{4}$/;

/**
 * `Company Name` → `company_name`. A leading byte-order mark is dropped.
 */
export function normalizeHeader(header: string): string {
  return header.replace(/^\uFEFF/, '').trim().toLowerCase().replace(/ /g, '_');
}

function inRange(year: number, options: DescribeOptions): boolean {
  const range = options.yearRange;
  return range === undefined || (year >= range.min && year <= range.max);
}

type Classified =
  | { kind: 'year'; column: YearColumn }
  | { kind: 'skip' }
  | { kind: 'prefixed'; column: PrefixedYearColumn }
  | { kind: 'role'; column: RoleColumn }
  | { kind: 'sibling'; column: SiblingColumn }
  | { kind: 'question'; column: QuestionColumn };

function classifiers(options: DescribeOptions): Array<Matcher<string, Classified>> {
  return [
    header => {
      const key = normalizeHeader(header);
      if (!YEAR.test(key)) return undefined;
      const year = Number(key);
      return inRange(year, options) ? { kind: 'year', column: { header, year } } : { kind: 'skip' };
    },
    header => {
      const key = normalizeHeader(header);
      for (const prefix of options.yearPrefixes ?? []) {
        const rest = key.startsWith(prefix) ? key.slice(prefix.length) : '';
        if (YEAR.test(rest)) {
          return { kind: 'prefixed', column: { header, prefix, year: Number(rest) } };
        }
      }
      return undefined;
    },
    header => {
      const match = ROLE_CODED.exec(header.replace(/^\uFEFF/, '').trim());
      if (!match) return undefined;
      const role = match[1].toLowerCase();
      const rest = match[2].trim();
      if (role === 'year' || role === 'source') {
        return { kind: 'sibling', column: { header, role, target: rest } };
      }
      if (role === 'area' || role === 'indicator' || role === 'metric') {
        if (rest.includes('.') && CODE.test(rest)) {
          return { kind: 'role', column: { header, role, code: rest } };
        }
      }
      return undefined;
    },
    header => {
      const trimmed = header.replace(/^\uFEFF/, '').trim();
      const bar = trimmed.indexOf('|');
      if (bar < 0) return undefined;
      const code = trimmed.slice(0, bar).trim();
      if (!/^q/i.test(code)) return undefined;
      return { kind: 'question', column: { header, code, text: trimmed.slice(bar + 1).trim() } };
    },
  ];
}

/**
 * Classify every header of an export once, before any row is read.
 */
export function describeColumns(headers: readonly string[], options: DescribeOptions = {}): TableShape {
  const shape: TableShape = {
    identity: [],
    years: [],
    prefixedYears: [],
    roleCoded: [],
    siblings: [],
    questions: [],
    byKey: new Map(),
  };
  const rules = classifiers(options);

  for (const header of headers) {
    const key = normalizeHeader(header);
    if (!shape.byKey.has(key)) {
      shape.byKey.set(key, header);
    }

    const classified = firstMatch(header, rules);
    if (classified === undefined) {
      shape.identity.push(header);
      continue;
    }
    switch (classified.kind) {
      case 'year':
        shape.years.push(classified.column);
        break;
      case 'prefixed':
        shape.prefixedYears.push(classified.column);
        break;
      case 'role':
        shape.roleCoded.push(classified.column);
        break;
      case 'sibling':
        shape.siblings.push(classified.column);
        break;
      case 'question':
        shape.questions.push(classified.column);
        break;
      case 'skip':
        break;
    }
  }

  return shape;
}

/**
 * Header of the year/source column belonging to a response column.
 * Tries `year {role} {code}` first, then `year {code}`.
 */
export function findSibling(shape: TableShape, role: SiblingRole, column: RoleColumn): string | undefined {
  const candidates = shape.siblings.filter(s => s.role === role);
  const byTarget = (target: string): Matcher<SiblingColumn[], string> => siblings =>
    siblings.find(s => s.target.toLowerCase() === target.toLowerCase())?.header;

  return firstMatch(candidates, [
    byTarget(`${column.role} ${column.code}`),
    byTarget(column.code),
  ]);
}

/**
 * Cell of `row` under the normalized header `key`; null when the export has no such column.
 */
export function cell(row: Row, shape: TableShape, key: string): Cell {
  const header = shape.byKey.get(key);
  if (header === undefined) return null;
  return row[header] ?? null;
}

/**
 * Output columns of a renamed relation: only the targets whose source column exists,
 * plus `derived` columns the reshaper always fills.
 */
export function presentColumns(
  shape: TableShape,
  mapping: Readonly<Record<string, string>>,
  derived: readonly string[] = []
): string[] {
  const mapped = Object.entries(mapping)
    .filter(([source]) => shape.byKey.has(source))
    .map(([, target]) => target);
  return [...mapped, ...derived];
}
