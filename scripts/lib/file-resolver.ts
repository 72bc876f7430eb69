import * as fs from 'fs';
import * as path from 'path';
import { Matcher, firstMatch } from './matchers';

export const DATE_TOKEN_FORMATS = ['DDMMYYYY', 'MMDDYYYY', 'YYYYMMDD'] as const;

export type DateTokenFormat = typeof DATE_TOKEN_FORMATS[number];

export interface ResolveOptions {
  dateFormats?: readonly DateTokenFormat[];
}

export interface Candidate {
  name: string;
  path: string;
  date: Date | null;
}

export type Resolution<T> =
  | { status: 'found'; value: T; candidates: string[] }
  | { status: 'not-found'; pattern: string; searched: string };

function validDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

function parseToken(token: string, format: DateTokenFormat): Date | null {
  const a = Number(token.slice(0, 2));
  const b = Number(token.slice(2, 4));
  switch (format) {
    case 'DDMMYYYY':
      return validDate(Number(token.slice(4, 8)), b, a);
    case 'MMDDYYYY':
      return validDate(Number(token.slice(4, 8)), a, b);
    case 'YYYYMMDD':
      return validDate(Number(token.slice(0, 4)), Number(token.slice(4, 6)), Number(token.slice(6, 8)));
  }
}

/**
 * Date carried by an 8-digit token in a file or directory name.
 * Formats are tried in order; the first valid reading wins. Null when nothing parses.
 */
export function extractDateFromName(
  name: string,
  formats: readonly DateTokenFormat[] = DATE_TOKEN_FORMATS
): Date | null {
  const tokens = name.match(/(?<!\d)\d{8}(?!\d)/g) ?? [];
  for (const token of tokens) {
    const readings: Array<Matcher<string, Date>> = formats.map(format => (t: string) => parseToken(t, format) ?? undefined);
    const date = firstMatch(token, readings);
    if (date) return date;
  }
  return null;
}

/**
 * Pick the most recent candidate. Names are ordered lexicographically first, so among
 * equal dates (or when no candidate is dated) the lexicographically last name wins.
 */
export function selectLatest(candidates: readonly Candidate[]): Candidate | undefined {
  if (candidates.length === 0) return undefined;
  const byName = [...candidates].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const dated = byName.filter(c => c.date !== null);
  if (dated.length === 0) {
    return byName[byName.length - 1];
  }
  return dated.reduce((best, c) => ((c.date?.getTime() ?? 0) >= (best.date?.getTime() ?? 0) ? c : best));
}

/**
 * Convert a glob with `*` and `?` into an anchored regular expression.
 */
export function globToRegExp(glob: string): RegExp {
  const escaped = glob
    .split('')
    .map(ch => {
      if (ch === '*') return '.*';
      if (ch === '?') return '.';
      return ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${escaped}$`);
}

function listEntries(dir: string, wantDirectories: boolean): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter(entry => (wantDirectories ? entry.isDirectory() : entry.isFile()))
    .map(entry => entry.name);
}

function toCandidates(dir: string, names: string[], options: ResolveOptions): Candidate[] {
  return names.map(name => ({
    name,
    path: path.join(dir, name),
    date: extractDateFromName(name, options.dateFormats),
  }));
}

function resolved(dir: string, pattern: string, candidates: Candidate[]): Resolution<string> {
  const latest = selectLatest(candidates);
  if (!latest) {
    return { status: 'not-found', pattern, searched: dir };
  }
  return { status: 'found', value: latest.path, candidates: candidates.map(c => c.name).sort() };
}

/**
 * Newest subdirectory of `baseDir` whose name contains `pattern` (case-insensitive).
 */
export function resolveLatestDirectory(baseDir: string, pattern: string, options: ResolveOptions = {}): Resolution<string> {
  const needle = pattern.toLowerCase();
  const names = listEntries(baseDir, true).filter(name => name.toLowerCase().includes(needle));
  return resolved(baseDir, pattern, toCandidates(baseDir, names, options));
}

export function resolveLatestFile(dir: string, glob: string, options: ResolveOptions = {}): Resolution<string> {
  const regex = globToRegExp(glob);
  const names = listEntries(dir, false).filter(name => regex.test(name));
  return resolved(dir, glob, toCandidates(dir, names, options));
}

export interface NumberedFile {
  number: number;
  path: string;
}

/**
 * Every file matching `glob`, in name order. Used where each match is a separate source
 * (one latest-assessments export per methodology version).
 */
export function resolveAllFiles(dir: string, glob: string): Resolution<string[]> {
  const regex = globToRegExp(glob);
  const names = listEntries(dir, false).filter(name => regex.test(name)).sort();
  if (names.length === 0) {
    return { status: 'not-found', pattern: glob, searched: dir };
  }
  return { status: 'found', value: names.map(name => path.join(dir, name)), candidates: names };
}

/**
 * Files matching `glob`, one per number captured by `numberPattern` (files without one
 * count as 0), ordered by that number. When a number has several files the latest wins.
 * Used for MQ methodology cycles 1..N.
 */
export function resolveNumberedFiles(
  dir: string,
  glob: string,
  numberPattern: RegExp = /Methodology_(\d+)/,
  options: ResolveOptions = {}
): Resolution<NumberedFile[]> {
  const regex = globToRegExp(glob);
  const names = listEntries(dir, false).filter(name => regex.test(name)).sort();
  if (names.length === 0) {
    return { status: 'not-found', pattern: glob, searched: dir };
  }

  const byNumber = new Map<number, Candidate[]>();
  for (const candidate of toCandidates(dir, names, options)) {
    const match = numberPattern.exec(candidate.name);
    const number = match ? Number(match[1]) : 0;
    byNumber.set(number, [...(byNumber.get(number) ?? []), candidate]);
  }

  const files: NumberedFile[] = [];
  for (const [number, candidates] of byNumber) {
    const latest = selectLatest(candidates);
    if (latest) files.push({ number, path: latest.path });
  }
  files.sort((a, b) => a.number - b.number);
  return { status: 'found', value: files, candidates: names };
}

export interface FileCategory<C extends string> {
  category: C;
  matchers: ReadonlyArray<Matcher<string, true>>;
}

/**
 * Assign each file matching `glob` to the first category whose matchers accept its name,
 * then keep the latest file per category.
 */
export function resolveCategorizedFiles<C extends string>(
  dir: string,
  glob: string,
  categories: ReadonlyArray<FileCategory<C>>,
  options: ResolveOptions = {}
): Resolution<Partial<Record<C, string>>> {
  const regex = globToRegExp(glob);
  const names = listEntries(dir, false).filter(name => regex.test(name));
  if (names.length === 0) {
    return { status: 'not-found', pattern: glob, searched: dir };
  }

  const categorize = categories.map(({ category, matchers }) => (name: string): C | undefined =>
    firstMatch(name, matchers) ? category : undefined
  );

  const grouped = new Map<C, Candidate[]>();
  for (const candidate of toCandidates(dir, names, options)) {
    const category = firstMatch(candidate.name, categorize);
    if (category === undefined) continue;
    grouped.set(category, [...(grouped.get(category) ?? []), candidate]);
  }

  const value: Partial<Record<C, string>> = {};
  for (const [category, candidates] of grouped) {
    const latest = selectLatest(candidates);
    if (latest) value[category] = latest.path;
  }
  return { status: 'found', value, candidates: names.sort() };
}

/**
 * Matcher accepting names that match a regular expression.
 */
export function nameMatches(pattern: RegExp): Matcher<string, true> {
  return name => (pattern.test(name) ? true : undefined);
}
