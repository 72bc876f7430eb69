/**
 * Unit Tests for the dataset pipeline state machine
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BasePipeline, PipelineStep, StepOutput } from '../base-pipeline';
import { MemoryLogger } from '../../lib/logger';
import { DatasetValidationError, LoadOrderError, PipelineStateError, SourceNotFoundError } from '../../lib/errors';
import { MemoryAuditLog, MemorySchemaManager, MemoryTableWriter, testConfig } from '../../__tests__/helpers/fakes';

class StubPipeline extends BasePipeline {
  readonly dataset = 'ascor' as const;
  private outputs: StepOutput[] = [];

  withSteps(...outputs: StepOutput[]): this {
    this.outputs = outputs;
    return this;
  }

  protected directoryPattern(): string {
    return this.deps.config.sources.ascorDirectoryPattern;
  }

  protected buildSteps(): PipelineStep[] {
    return this.outputs.map((output, i) => ({ name: `step ${i + 1}`, run: async () => output }));
  }
}

function setup(dataDir?: string) {
  const deps = {
    config: testConfig(dataDir),
    schema: new MemorySchemaManager(),
    writer: new MemoryTableWriter(),
    audit: new MemoryAuditLog(),
    logger: new MemoryLogger(),
  };
  return { ...deps, pipeline: new StubPipeline(deps) };
}

const franceWithBadIso: StepOutput = {
  relations: [{ name: 'country', columns: ['country_name', 'iso'], rows: [{ country_name: 'France', iso: 'France' }], sourceFile: null }],
  warnings: ['country: something to look at'],
};

const transitions = (pipeline: BasePipeline) => pipeline.history.map(t => `${t.from}>${t.to}`);

describe('BasePipeline', () => {
  it('starts in INIT', () => {
    expect(setup().pipeline.state).toBe('INIT');
  });

  it('fails the whole dataset on a validation error without writing', async () => {
    const { pipeline, writer, audit, logger, schema } = setup();
    pipeline.withSteps(franceWithBadIso);

    await expect(pipeline.run()).rejects.toBeInstanceOf(DatasetValidationError);

    expect(writer.writes).toEqual([]);
    expect(pipeline.state).toBe('FAILED');
    expect(transitions(pipeline)).toEqual(['INIT>DROP', 'DROP>CREATE', 'CREATE>PROCESS', 'PROCESS>VALIDATE', 'VALIDATE>FAILED']);
    expect(schema.calls).toEqual([
      'ensureAuditLog',
      'drop ascor: value_per_year, trend_values, assessment_trends, assessment_results, benchmark_values, benchmarks, assessment_elements, country',
      'create ascor',
    ]);
    expect(audit.statuses('ascor:pipeline')).toEqual(['STARTED', 'FAILED']);
    expect(audit.entries.find(entry => entry.process === 'ascor:validate')).toEqual({
      process: 'ascor:validate',
      status: 'VALIDATION_FAILED',
      notes: 'Found 1 invalid ISO codes in country',
      tableName: 'country',
      sourceFile: null,
    });
    expect(logger.messages('warn')).toContain('country: something to look at');
    expect(logger.messages('error')).toEqual([
      'Found 1 invalid ISO codes in country',
      'ASCOR failed during VALIDATE: ascor validation failed with 1 error(s)',
    ]);
  });

  it('carries errors and warnings on the validation error', async () => {
    const { pipeline } = setup();
    pipeline.withSteps(franceWithBadIso);

    const error = await pipeline.run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DatasetValidationError);
    if (error instanceof DatasetValidationError) {
      expect(error.errors).toEqual(['Found 1 invalid ISO codes in country']);
      expect(error.warnings).toEqual(['country: something to look at']);
    }
  });

  it('refuses to load when a table has no relation', async () => {
    const { pipeline, writer } = setup();
    pipeline.withSteps({
      relations: [{ name: 'country', columns: ['country_name', 'iso'], rows: [{ country_name: 'France', iso: 'FRA' }], sourceFile: null }],
      warnings: [],
    });

    await expect(pipeline.run()).rejects.toThrow(
      new LoadOrderError('assessment_elements', 'no relation was produced for it').message
    );
    expect(writer.writes.map(write => write.table)).toEqual(['country']);
    expect(transitions(pipeline).slice(-2)).toEqual(['VALIDATE>LOAD', 'LOAD>FAILED']);
  });

  it('cannot be run twice', async () => {
    const { pipeline } = setup();
    pipeline.withSteps(franceWithBadIso);
    await expect(pipeline.run()).rejects.toBeInstanceOf(DatasetValidationError);

    await expect(pipeline.run()).rejects.toThrow(new PipelineStateError('FAILED', 'DROP').message);
  });

  it('fails in CREATE when no source directory matches', async () => {
    const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'empty-data-'));
    const { pipeline, audit } = setup(dataDir);

    await expect(pipeline.run()).rejects.toThrow(`ascor: no source directory matching "ascor" in ${dataDir}`);
    await expect(setup(dataDir).pipeline.run()).rejects.toBeInstanceOf(SourceNotFoundError);
    expect(transitions(pipeline)).toEqual(['INIT>DROP', 'DROP>CREATE', 'CREATE>FAILED']);
    expect(audit.entries[audit.entries.length - 1]).toEqual({
      process: 'ascor:pipeline',
      status: 'FAILED',
      notes: `ascor: no source directory matching "ascor" in ${dataDir}`,
    });
  });

  it('reports when the failure cannot be audited', async () => {
    const { pipeline, audit, logger } = setup();
    audit.failing = true;

    await expect(pipeline.run()).rejects.toThrow('audit log unavailable');

    expect(pipeline.state).toBe('FAILED');
    expect(logger.messages('error')).toEqual([
      'ASCOR failed during DROP: audit log unavailable',
      'ASCOR: could not record failure in audit log: audit log unavailable',
    ]);
  });
});
