/**
 * Unit Tests for source file discovery
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  extractDateFromName,
  globToRegExp,
  nameMatches,
  resolveAllFiles,
  resolveCategorizedFiles,
  resolveLatestDirectory,
  resolveLatestFile,
  resolveNumberedFiles,
  selectLatest,
} from '../file-resolver';

function workspace(files: string[], dirs: string[] = []): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'resolver-'));
  for (const dir of dirs) fs.mkdirSync(path.join(root, dir));
  for (const file of files) fs.writeFileSync(path.join(root, file), 'a,b\n1,2\n');
  return root;
}

describe('extractDateFromName', () => {
  it('reads day-first tokens first', () => {
    expect(extractDateFromName('ASCOR_01022024')?.toISOString()).toBe('2024-02-01T00:00:00.000Z');
  });

  it('falls back to month-first when the day-first reading is invalid', () => {
    expect(extractDateFromName('TPI_12312021')?.toISOString()).toBe('2021-12-31T00:00:00.000Z');
  });

  it('respects the configured format order', () => {
    expect(extractDateFromName('TPI_20240102', ['YYYYMMDD'])?.toISOString()).toBe('2024-01-02T00:00:00.000Z');
  });

  it('returns null for undated names and longer digit runs', () => {
    expect(extractDateFromName('Company_Latest_Assessments.csv')).toBeNull();
    expect(extractDateFromName('export_123456789.csv')).toBeNull();
  });
});

describe('selectLatest', () => {
  it('picks 12312021 over 01012021', () => {
    const latest = selectLatest([
      { name: 'data_12312021', path: 'a', date: extractDateFromName('data_12312021') },
      { name: 'data_01012021', path: 'b', date: extractDateFromName('data_01012021') },
    ]);
    expect(latest?.name).toBe('data_12312021');
  });

  it('picks the lexicographically last name when nothing is dated', () => {
    const latest = selectLatest([
      { name: 'b_export', path: 'b', date: null },
      { name: 'c_export', path: 'c', date: null },
      { name: 'a_export', path: 'a', date: null },
    ]);
    expect(latest?.name).toBe('c_export');
  });

  it('prefers a dated candidate over undated ones', () => {
    const latest = selectLatest([
      { name: 'z_export', path: 'z', date: null },
      { name: 'a_01012020', path: 'a', date: new Date(Date.UTC(2020, 0, 1)) },
    ]);
    expect(latest?.name).toBe('a_01012020');
  });

  it('returns undefined for no candidates', () => {
    expect(selectLatest([])).toBeUndefined();
  });
});

describe('globToRegExp', () => {
  it('anchors and escapes literal dots', () => {
    const regex = globToRegExp('ASCOR_countries.*');
    expect(regex.test('ASCOR_countries.xlsx')).toBe(true);
    expect(regex.test('ASCOR_countriesXcsv')).toBe(false);
    expect(regex.test('old_ASCOR_countries.csv')).toBe(false);
  });
});

describe('resolveLatestDirectory', () => {
  it('selects the newest matching directory case-insensitively', () => {
    const root = workspace([], ['ASCOR_assessments_01012021', 'ascor_assessments_12312021', 'TPI_sector_data_01012025']);
    const result = resolveLatestDirectory(root, 'ASCOR');
    expect(result).toEqual({
      status: 'found',
      value: path.join(root, 'ascor_assessments_12312021'),
      candidates: ['ASCOR_assessments_01012021', 'ascor_assessments_12312021'],
    });
  });

  it('reports not-found instead of throwing', () => {
    const root = workspace([]);
    expect(resolveLatestDirectory(root, 'ascor')).toEqual({ status: 'not-found', pattern: 'ascor', searched: root });
    expect(resolveLatestDirectory(path.join(root, 'missing'), 'ascor').status).toBe('not-found');
  });
});

describe('resolveLatestFile', () => {
  it('picks the latest dated file and tags missing ones', () => {
    const root = workspace(['Sector_Benchmarks_01012023.csv', 'Sector_Benchmarks_01012024.csv']);
    const resolved = resolveLatestFile(root, 'Sector_Benchmarks_*.csv');
    expect(resolved.status).toBe('found');
    if (resolved.status === 'found') {
      expect(path.basename(resolved.value)).toBe('Sector_Benchmarks_01012024.csv');
    }
    expect(resolveLatestFile(root, 'CP_Assessments*.csv').status).toBe('not-found');
    expect(resolveLatestFile(root, 'Nothing_*.csv').status).toBe('not-found');
  });
});

describe('resolveAllFiles', () => {
  it('returns every match in name order', () => {
    const root = workspace(['Company_Latest_Assessments_5.0.csv', 'Company_Latest_Assessments.csv', 'other.csv']);
    const result = resolveAllFiles(root, 'Company_Latest_Assessments*.csv');
    expect(result.status === 'found' && result.value.map(file => path.basename(file))).toEqual([
      'Company_Latest_Assessments.csv',
      'Company_Latest_Assessments_5.0.csv',
    ]);
  });
});

describe('resolveNumberedFiles', () => {
  it('orders methodology files by number and keeps the latest per number', () => {
    const root = workspace([
      'MQ_Assessments_Methodology_2_01012024.csv',
      'MQ_Assessments_Methodology_10_01012024.csv',
      'MQ_Assessments_Methodology_1_01012023.csv',
      'MQ_Assessments_Methodology_1_01012024.csv',
    ]);
    const result = resolveNumberedFiles(root, 'MQ_Assessments_Methodology_*.csv');
    expect(result.status).toBe('found');
    if (result.status === 'found') {
      expect(result.value.map(file => [file.number, path.basename(file.path)])).toEqual([
        [1, 'MQ_Assessments_Methodology_1_01012024.csv'],
        [2, 'MQ_Assessments_Methodology_2_01012024.csv'],
        [10, 'MQ_Assessments_Methodology_10_01012024.csv'],
      ]);
    }
  });
});

describe('resolveCategorizedFiles', () => {
  it('assigns each file to the first accepting category', () => {
    const root = workspace([
      'CP_Assessments_01012024.csv',
      'CP_Assessments_Regional_01012023.csv',
      'CP_Assessments_Regional_01012024.csv',
    ]);
    const result = resolveCategorizedFiles(root, 'CP_Assessments*.csv', [
      { category: 'regional', matchers: [nameMatches(/^CP_Assessments_Regional/i)] },
      { category: 'standard', matchers: [nameMatches(/^CP_Assessments/i)] },
    ]);
    expect(result.status).toBe('found');
    if (result.status === 'found') {
      expect(path.basename(result.value.regional ?? '')).toBe('CP_Assessments_Regional_01012024.csv');
      expect(path.basename(result.value.standard ?? '')).toBe('CP_Assessments_01012024.csv');
    }
  });
});
