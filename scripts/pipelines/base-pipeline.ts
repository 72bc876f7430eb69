import type { DatasetName, RawTable, Relation, Row } from '../lib/types';
import type { ETLConfig } from '../lib/config-loader';
import type { Logger } from '../lib/logger';
import type { SchemaManager } from '../lib/schema-manager';
import type { TableWriter } from '../lib/table-writer';
import type { AuditLog, AuditStatus } from '../lib/audit-log';
import { ProgressReporter } from '../lib/progress-reporter';
import { Resolution, resolveLatestDirectory, resolveLatestFile } from '../lib/file-resolver';
import { readSource } from '../lib/source-reader';
import { KeySet, KeyTuple, describeRejection, filterValid } from '../lib/referential-filter';
import { validateDataset } from '../lib/validator';
import { loadOrder } from '../lib/table-catalog';
import { Loader } from '../lib/loader';
import { DatasetValidationError, LoadOrderError, PipelineStateError, SourceNotFoundError } from '../lib/errors';

export type PipelineState = 'INIT' | 'DROP' | 'CREATE' | 'PROCESS' | 'VALIDATE' | 'LOAD' | 'DONE' | 'FAILED';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  INIT: ['DROP', 'FAILED'],
  DROP: ['CREATE', 'FAILED'],
  CREATE: ['PROCESS', 'FAILED'],
  PROCESS: ['VALIDATE', 'FAILED'],
  VALIDATE: ['PROCESS', 'LOAD', 'FAILED'],
  LOAD: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

export interface Transition {
  from: PipelineState;
  to: PipelineState;
  at: Date;
  detail?: string;
}

export interface PipelineDeps {
  config: ETLConfig;
  schema: SchemaManager;
  writer: TableWriter;
  audit: AuditLog;
  logger: Logger;
  progress?: ProgressReporter;
}

export interface StepOutput {
  relations: Relation[];
  warnings: string[];
}

/**
 * One entity's PROCESS work: resolve its files, reshape, filter against parents
 * produced by earlier steps.
 */
export interface PipelineStep {
  name: string;
  run(): Promise<StepOutput>;
}

export interface PipelineResult {
  dataset: DatasetName;
  rowsLoaded: number;
  tablesLoaded: string[];
  warnings: string[];
  history: Transition[];
}

/**
 * Per-dataset run: INIT → DROP → CREATE → (PROCESS → VALIDATE)×N → LOAD → DONE.
 * Any validation error fails the whole dataset before a single row is written.
 */
export abstract class BasePipeline {
  abstract readonly dataset: DatasetName;

  private current: PipelineState = 'INIT';
  private readonly transitions: Transition[] = [];
  protected readonly progress: ProgressReporter;

  constructor(protected readonly deps: PipelineDeps) {
    this.progress = deps.progress ?? new ProgressReporter(line => deps.logger.debug(line));
  }

  get state(): PipelineState {
    return this.current;
  }

  get history(): Transition[] {
    return [...this.transitions];
  }

  /** name fragment identifying this dataset's dated source directories */
  protected abstract directoryPattern(): string;

  protected abstract buildSteps(sourceDir: string): PipelineStep[];

  private get processName(): string {
    return `${this.dataset}:pipeline`;
  }

  private transition(to: PipelineState, detail?: string): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new PipelineStateError(from, to);
    }
    this.current = to;
    this.transitions.push({ from, to, at: new Date(), detail });
    this.deps.logger.debug(`${this.dataset}: ${from} → ${to}${detail ? ` (${detail})` : ''}`);
  }

  async run(): Promise<PipelineResult> {
    if (this.current !== 'INIT') {
      throw new PipelineStateError(this.current, 'DROP');
    }

    const { schema, audit, logger } = this.deps;
    const tables = loadOrder(this.dataset);
    const label = this.dataset.toUpperCase();
    const warnings: string[] = [];
    const errors: string[] = [];
    const relations = new Map<string, Relation>();

    this.progress.logRunStart(label, tables.length);

    try {
      this.transition('DROP');
      this.progress.logPhase('DROP', `${tables.length} tables`);
      await schema.ensureAuditLog();
      await audit.record({ process: this.processName, status: 'STARTED' });
      await schema.dropTables(this.dataset, [...tables].reverse());

      this.transition('CREATE');
      this.progress.logPhase('CREATE');
      const scripts = await schema.createTables(this.dataset);
      logger.info(`${label}: ${scripts.length} DDL script(s) executed`);

      const steps = this.buildSteps(this.resolveSourceDirectory());

      for (const [index, step] of steps.entries()) {
        this.transition('PROCESS', step.name);
        this.progress.logStep(step.name, index + 1, steps.length);
        const started = Date.now();
        const output = await step.run();
        for (const warning of output.warnings) {
          logger.warn(warning);
        }
        warnings.push(...output.warnings);

        this.transition('VALIDATE', step.name);
        const validation = validateDataset(output.relations);
        for (const relation of output.relations) {
          const result = validation.byEntity[relation.name] ?? { errors: [], warnings: [] };
          relations.set(relation.name, relation);
          result.errors.forEach(message => logger.error(message));
          result.warnings.forEach(message => logger.warn(message));
          await audit.record({
            process: `${this.dataset}:validate`,
            status: validationStatus(result.errors, result.warnings),
            notes: [...result.errors, ...result.warnings].join('; ') || null,
            tableName: relation.name,
            sourceFile: relation.sourceFile,
          });
        }
        errors.push(...validation.errors);
        warnings.push(...validation.warnings);

        const rowCount = output.relations.reduce((sum, relation) => sum + relation.rows.length, 0);
        this.progress.logStepComplete(step.name, (Date.now() - started) / 1000, rowCount);
      }

      if (errors.length > 0) {
        throw new DatasetValidationError(this.dataset, errors, warnings);
      }

      this.transition('LOAD');
      this.progress.logPhase('LOAD', `${tables.length} tables`);
      const loader = new Loader(this.dataset, this.deps.writer, audit, logger);
      let rowsLoaded = 0;
      for (const table of tables) {
        const relation = relations.get(table);
        if (!relation) {
          throw new LoadOrderError(table, 'no relation was produced for it');
        }
        rowsLoaded += await loader.load(table, relation, tables);
      }

      await audit.record({
        process: this.processName,
        status: warnings.length > 0 ? 'COMPLETED_WITH_WARNINGS' : 'COMPLETED',
        notes: warnings.length > 0 ? `${warnings.length} warning(s)` : null,
        rowsInserted: rowsLoaded,
      });
      this.transition('DONE');
      logger.success(`${label}: ${rowsLoaded} row(s) loaded into ${tables.length} tables`);
      this.progress.logRunComplete(label, rowsLoaded, warnings.length);

      return {
        dataset: this.dataset,
        rowsLoaded,
        tablesLoaded: loader.loadedTables,
        warnings,
        history: this.history,
      };
    } catch (error) {
      const failedDuring = this.state;
      const message = error instanceof Error ? error.message : String(error);
      if (failedDuring !== 'DONE' && failedDuring !== 'FAILED') {
        this.transition('FAILED', message);
      }
      logger.error(`${label} failed during ${failedDuring}: ${message}`);

      try {
        await audit.record({ process: this.processName, status: 'FAILED', notes: message });
      } catch (auditError) {
        logger.error(
          `${label}: could not record failure in audit log: ${auditError instanceof Error ? auditError.message : String(auditError)}`
        );
      }

      this.progress.logRunFailure(label, error instanceof Error ? error : new Error(message), failedDuring);
      throw error;
    }
  }

  private resolveSourceDirectory(): string {
    const { dataDir, sources } = this.deps.config;
    const directory = this.required(
      resolveLatestDirectory(dataDir, this.directoryPattern(), { dateFormats: sources.dateFormats }),
      'source directory'
    );
    this.deps.logger.info(`${this.dataset.toUpperCase()}: reading from ${directory}`);
    return directory;
  }

  /**
   * Unwrap a resolution, turning not-found into a fatal `SourceNotFoundError`.
   */
  protected required<T>(resolution: Resolution<T>, source: string): T {
    if (resolution.status === 'not-found') {
      throw new SourceNotFoundError(this.dataset, source, resolution.pattern, resolution.searched);
    }
    if (resolution.candidates.length > 1) {
      this.deps.logger.debug(`${source}: ${resolution.candidates.length} candidates (${resolution.candidates.join(', ')})`);
    }
    return resolution.value;
  }

  protected async readLatest(dir: string, source: string, glob: string): Promise<RawTable> {
    const file = this.required(
      resolveLatestFile(dir, glob, { dateFormats: this.deps.config.sources.dateFormats }),
      source
    );
    const table = await readSource(file);
    this.deps.logger.info(`${source}: ${table.rows.length} row(s) from ${file}`);
    return table;
  }

  /**
   * Keep the rows whose key resolves in `parentKeys`; each rejected key becomes a warning.
   */
  protected keep<T extends Row>(
    relation: Relation<T>,
    parentKeys: KeySet,
    keyOf: (row: T) => KeyTuple,
    parent: string,
    warnings: string[]
  ): Relation<T> {
    const context = { entity: relation.name, parent };
    const result = filterValid(relation.rows, parentKeys, keyOf, context);
    warnings.push(...result.rejectedKeys.map(rejected => describeRejection(context, rejected)));
    return { ...relation, rows: result.valid };
  }
}

function validationStatus(errors: readonly string[], warnings: readonly string[]): AuditStatus {
  if (errors.length > 0) return 'VALIDATION_FAILED';
  if (warnings.length > 0) return 'VALIDATION_WARNINGS';
  return 'VALIDATION_PASSED';
}
