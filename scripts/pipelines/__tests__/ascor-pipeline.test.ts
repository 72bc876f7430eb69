/**
 * End-to-end ASCOR run over the fixture exports, against in-memory storage
 */

import { AscorPipeline } from '../ascor-pipeline';
import { MemoryLogger } from '../../lib/logger';
import { loadOrder } from '../../lib/table-catalog';
import { MemoryAuditLog, MemorySchemaManager, MemoryTableWriter, testConfig } from '../../__tests__/helpers/fakes';

describe('AscorPipeline', () => {
  async function run() {
    const writer = new MemoryTableWriter();
    const audit = new MemoryAuditLog();
    const logger = new MemoryLogger();
    const pipeline = new AscorPipeline({
      config: testConfig(),
      schema: new MemorySchemaManager(),
      writer,
      audit,
      logger,
    });
    const result = await pipeline.run();
    return { pipeline, result, writer, audit, logger };
  }

  it('loads every table in catalog order', async () => {
    const { pipeline, result, writer } = await run();

    expect(pipeline.state).toBe('DONE');
    expect(writer.writes.map(write => write.table)).toEqual(loadOrder('ascor'));
    expect(result.tablesLoaded).toEqual(loadOrder('ascor'));
    expect(writer.writes.map(write => write.rows.length)).toEqual([2, 3, 1, 2, 4, 1, 1, 2]);
    expect(result.rowsLoaded).toBe(16);
  });

  it('drops rows for countries outside the country list', async () => {
    const { result, writer } = await run();

    expect(result.warnings).toEqual([
      'benchmarks: dropped 1 row(s) referencing unknown country (Atlantis)',
      'benchmark_values: dropped 3 row(s) referencing unknown benchmarks (11)',
      'assessment_results: dropped 2 row(s) referencing unknown country (Atlantis)',
      'assessment_trends: dropped 1 row(s) referencing unknown country (Atlantis)',
      'trend_values: dropped 1 row(s) referencing unknown assessment_trends (2, Atlantis)',
      'value_per_year: dropped 3 row(s) referencing unknown assessment_trends (2, Atlantis)',
    ]);
    expect(writer.rowsFor('assessment_results').map(row => row.country_name)).toEqual(['France', 'France', 'Japan', 'Japan']);
    expect(writer.rowsFor('trend_values')).toEqual([{ trend_id: 1, country_name: 'France', year: 2021, value: 403.5 }]);
    expect(writer.rowsFor('value_per_year').map(row => [row.year, row.value])).toEqual([
      [2021, 403.5],
      [2030, 300],
    ]);
  });

  it('records the run in the audit log', async () => {
    const { audit, logger } = await run();

    expect(audit.statuses('ascor:pipeline')).toEqual(['STARTED', 'COMPLETED_WITH_WARNINGS']);
    expect(audit.statuses('ascor:validate')).toEqual(Array(8).fill('VALIDATION_PASSED'));
    expect(audit.statuses('ascor:load')).toEqual(Array(8).fill('COMPLETED'));
    expect(audit.entries[audit.entries.length - 1]).toEqual({
      process: 'ascor:pipeline',
      status: 'COMPLETED_WITH_WARNINGS',
      notes: '6 warning(s)',
      rowsInserted: 16,
    });
    expect(logger.messages('success')).toEqual(['ASCOR: 16 row(s) loaded into 8 tables']);
  });

  it('walks PROCESS and VALIDATE once per entity', async () => {
    const { pipeline } = await run();

    const steps = pipeline.history.filter(t => t.to === 'PROCESS').map(t => t.detail);
    expect(steps).toEqual(['country', 'assessment_elements', 'benchmarks', 'assessment_results', 'assessment_trends']);
    expect(pipeline.history.map(t => t.to).slice(-2)).toEqual(['LOAD', 'DONE']);
  });
});
