import type { DatasetName, Relation } from './types';
import type { Logger } from './logger';
import type { AuditLog } from './audit-log';
import type { TableWriter } from './table-writer';
import { getTableSpec, parentsOf } from './table-catalog';
import { LoadOrderError } from './errors';

/**
 * Writes validated relations parents-first and records one audit row per table write.
 */
export class Loader {
  private readonly loaded = new Set<string>();

  constructor(
    private readonly dataset: DatasetName,
    private readonly writer: TableWriter,
    private readonly audit: AuditLog,
    private readonly logger: Logger
  ) {}

  get loadedTables(): string[] {
    return [...this.loaded];
  }

  async load(entity: string, relation: Relation, loadOrder: readonly string[]): Promise<number> {
    if (!loadOrder.includes(entity)) {
      throw new LoadOrderError(entity, `not part of the ${this.dataset} load order`);
    }
    const spec = getTableSpec(this.dataset, entity);
    const pending = parentsOf(spec).filter(parent => !this.loaded.has(parent));
    if (pending.length > 0) {
      throw new LoadOrderError(entity, `parent table(s) not loaded yet: ${pending.join(', ')}`);
    }

    const process = `${this.dataset}:load`;
    let written: number;
    try {
      written = await this.writer.write(spec, relation.rows);
    } catch (error) {
      await this.audit.record({
        process,
        status: 'FAILED',
        notes: error instanceof Error ? error.message : String(error),
        tableName: entity,
        sourceFile: relation.sourceFile,
        rowsInserted: 0,
      });
      throw error;
    }

    await this.audit.record({
      process,
      status: 'COMPLETED',
      tableName: entity,
      sourceFile: relation.sourceFile,
      rowsInserted: written,
    });
    this.loaded.add(entity);
    this.logger.debug(`${this.dataset}.${entity}: ${written} row(s) written`);
    return written;
  }
}
