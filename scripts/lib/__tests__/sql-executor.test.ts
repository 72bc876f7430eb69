/**
 * Unit Tests for SQL script helpers
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { listScripts, splitBatches, substituteVariables } from '../sql-executor';

describe('substituteVariables', () => {
  it('replaces known placeholders and keeps unknown ones', () => {
    expect(substituteVariables('CREATE TABLE [$(SCHEMA)].[x] -- $(OTHER)', { SCHEMA: 'tpi' })).toBe(
      'CREATE TABLE [tpi].[x] -- $(OTHER)'
    );
  });
});

describe('splitBatches', () => {
  it('splits on GO lines and drops empty batches', () => {
    const script = 'CREATE TABLE a (id INT);\nGO\n\ngo  \nCREATE TABLE b (id INT);\nGO\n';
    expect(splitBatches(script)).toEqual(['CREATE TABLE a (id INT);', 'CREATE TABLE b (id INT);']);
  });

  it('does not split on GO inside a line', () => {
    expect(splitBatches('SELECT 1 AS GOAL')).toEqual(['SELECT 1 AS GOAL']);
  });
});

describe('listScripts', () => {
  it('returns sql files in name order', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scripts-'));
    for (const name of ['02_b.sql', '01_a.SQL', 'notes.txt']) {
      fs.writeFileSync(path.join(dir, name), '');
    }
    expect(listScripts(dir)).toEqual([path.join(dir, '01_a.SQL'), path.join(dir, '02_b.sql')]);
  });

  it('returns nothing for a missing directory', () => {
    expect(listScripts(path.join(os.tmpdir(), 'no-such-scripts-dir'))).toEqual([]);
  });
});
