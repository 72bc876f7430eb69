import * as path from 'path';
import type { RawTable, Relation } from '../../lib/types';
import { TableShape, describeColumns, presentColumns } from '../../lib/columns';
import { captureGroup, constant, firstMatch, Matcher } from '../../lib/matchers';
import { KeySet, KeyTuple } from '../../lib/referential-filter';
import { reader, unionColumns } from '../shared';
import type { CompanyRow } from './types';

const METADATA_COLUMNS = {
  company_name: 'company_name',
  geography: 'geography',
  isins: 'isin',
  ca100_focus_company: 'ca100_focus',
  'large/medium_classification': 'size_classification',
  geography_code: 'geography_code',
  sedol: 'sedol',
  sector: 'sector_name',
} as const;

export type CompanySource =
  | { kind: 'latest'; table: RawTable; version: string }
  | { kind: 'mq'; table: RawTable; cycle: number };

/**
 * Version of a `Company_Latest_Assessments*.csv` file: `_5.0.csv` or `_5.0_08032025.csv` → "5.0",
 * no version in the name → the legacy version.
 */
export function companyFileVersion(fileName: string, legacyVersion: string): string {
  const matchers: Array<Matcher<string, string>> = [
    captureGroup(/_(\d+\.\d+)(?:_\d{8})?\.csv$/i),
    constant(legacyVersion),
  ];
  return firstMatch(path.basename(fileName), matchers) ?? legacyVersion;
}

export function cycleVersion(cycle: number): string {
  return `${cycle}.0`;
}

function compareVersionsDescending(a: string, b: string): number {
  const [aMajor, aMinor] = a.split('.').map(Number);
  const [bMajor, bMinor] = b.split('.').map(Number);
  return bMajor - aMajor || bMinor - aMinor;
}

/**
 * Sources in precedence order: latest-assessment files by descending version,
 * then MQ files by cycle.
 */
export function orderCompanySources(sources: readonly CompanySource[]): CompanySource[] {
  const latest = sources
    .flatMap(s => (s.kind === 'latest' ? [s] : []))
    .sort((a, b) => compareVersionsDescending(a.version, b.version));
  const mq = sources
    .flatMap(s => (s.kind === 'mq' ? [s] : []))
    .sort((a, b) => a.cycle - b.cycle);
  return [...latest, ...mq];
}

function latestRows(shape: TableShape, table: RawTable, version: string): CompanyRow[] {
  const read = reader(shape);
  return table.rows.map(row => ({
    company_name: read.text(row, 'company_name'),
    version,
    geography: read.text(row, 'geography'),
    isin: read.text(row, 'isins'),
    ca100_focus: read.text(row, 'ca100_focus_company'),
    size_classification: read.text(row, 'large/medium_classification'),
    geography_code: read.text(row, 'geography_code'),
    sedol: read.text(row, 'sedol'),
    sector_name: read.text(row, 'sector'),
  }));
}

function mqRows(shape: TableShape, table: RawTable, version: string): CompanyRow[] {
  const read = reader(shape);
  const seen = new Set<string>();
  const rows: CompanyRow[] = [];
  for (const row of table.rows) {
    const name = read.text(row, 'company_name');
    if (name === null || seen.has(name)) continue;
    seen.add(name);
    rows.push({
      company_name: name,
      version,
      geography: null,
      isin: null,
      ca100_focus: null,
      size_classification: null,
      geography_code: null,
      sedol: null,
      sector_name: null,
    });
  }
  return rows;
}

/**
 * Merge company metadata from every source. A (company, version) already supplied by a
 * higher-precedence source is skipped; repeats inside one latest-assessment file are kept
 * so validation reports them.
 */
export function reshapeCompanies(sources: readonly CompanySource[]): Relation<CompanyRow> {
  const accepted = new KeySet();
  const rows: CompanyRow[] = [];
  const columnLists: string[][] = [['company_name', 'version']];

  for (const source of orderCompanySources(sources)) {
    const shape = describeColumns(source.table.columns);
    const candidates = source.kind === 'latest'
      ? latestRows(shape, source.table, source.version)
      : mqRows(shape, source.table, cycleVersion(source.cycle));
    if (source.kind === 'latest') {
      columnLists.push(presentColumns(shape, METADATA_COLUMNS));
    }

    const added: KeyTuple[] = [];
    for (const row of candidates) {
      const key = [row.company_name, row.version];
      if (accepted.has(key)) continue;
      rows.push(row);
      added.push(key);
    }
    added.forEach(key => accepted.add(key));
  }

  const latestFiles = sources
    .flatMap(s => (s.kind === 'latest' ? [s.table.sourceFile] : []))
    .filter((file): file is string => file !== null);
  return {
    name: 'company',
    columns: unionColumns(...columnLists),
    rows,
    sourceFile: latestFiles.join(', ') || null,
  };
}
