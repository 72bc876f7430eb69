/**
 * The catalog and the DDL scripts describe the same tables
 */

import * as fs from 'fs';
import * as path from 'path';
import { CATALOGS, getTableSpec, loadOrder, parentsOf } from '../table-catalog';
import { listScripts } from '../sql-executor';
import type { DatasetName } from '../types';

const SQL_DIR = path.join(__dirname, '..', '..', '..', 'sql');

describe('table catalog', () => {
  it('lists the load order with parents first', () => {
    expect(loadOrder('ascor')).toEqual([
      'country',
      'assessment_elements',
      'benchmarks',
      'benchmark_values',
      'assessment_results',
      'assessment_trends',
      'trend_values',
      'value_per_year',
    ]);
    expect(loadOrder('tpi')).toEqual([
      'company',
      'sector_benchmark',
      'company_answer',
      'mq_assessment',
      'cp_assessment',
      'cp_alignment',
      'cp_projection',
      'benchmark_projection',
    ]);
  });

  it.each<DatasetName>(['ascor', 'tpi'])('places every %s parent before its children', dataset => {
    const order = loadOrder(dataset);
    for (const table of CATALOGS[dataset].tables) {
      for (const parent of parentsOf(table)) {
        expect(order.indexOf(parent)).toBeLessThan(order.indexOf(table.name));
      }
    }
  });

  it.each<DatasetName>(['ascor', 'tpi'])('has one %s init script per table, in load order', dataset => {
    const scripts = listScripts(path.join(SQL_DIR, dataset, 'init'));
    const order = loadOrder(dataset);
    expect(scripts).toHaveLength(order.length);

    scripts.forEach((script, i) => {
      const ddl = fs.readFileSync(script, 'utf-8');
      expect(ddl).toContain(`CREATE TABLE [$(SCHEMA)].[${order[i]}]`);
      for (const column of getTableSpec(dataset, order[i]).columns) {
        expect(ddl).toContain(`${column.name} `);
      }
    });
  });

  it('rejects unknown tables', () => {
    expect(() => getTableSpec('tpi', 'country')).toThrow('Unknown tpi table: country');
  });

  it('collapses repeated parents', () => {
    expect(parentsOf(getTableSpec('ascor', 'assessment_results'))).toEqual(['country', 'assessment_elements']);
    expect(parentsOf(getTableSpec('tpi', 'cp_alignment'))).toEqual(['cp_assessment']);
  });
});
