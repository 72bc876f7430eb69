import * as path from 'path';
import * as sql from 'mssql';
import type { DatasetName } from './types';
import type { Logger } from './logger';
import { ETLConfig } from './config-loader';
import { executeSQLScripts, listScripts } from './sql-executor';
import { toStorageError } from './error-handler';

/**
 * Create/drop operations for a dataset's tables. The audit log has its own entry point
 * and is never touched by `dropTables`.
 */
export interface SchemaManager {
  ensureAuditLog(): Promise<void>;
  /** drops in the order given; callers pass reverse load order */
  dropTables(dataset: DatasetName, tables: readonly string[]): Promise<void>;
  createTables(dataset: DatasetName): Promise<string[]>;
}

export class MssqlSchemaManager implements SchemaManager {
  constructor(
    private readonly pool: sql.ConnectionPool,
    private readonly config: ETLConfig,
    private readonly logger: Logger,
    private readonly sqlDir: string = path.join(process.cwd(), 'sql')
  ) {}

  private async ensureSchema(schema: string): Promise<void> {
    try {
      await this.pool
        .request()
        .input('schema', sql.NVarChar(128), schema)
        .query(`IF NOT EXISTS (SELECT 1 FROM sys.schemas WHERE name = @schema) EXEC('CREATE SCHEMA [${schema}]')`);
    } catch (error) {
      throw toStorageError(error, 'create schema', schema);
    }
  }

  async ensureAuditLog(): Promise<void> {
    const schema = this.config.database.schemas.audit;
    await this.ensureSchema(schema);
    await executeSQLScripts(listScripts(path.join(this.sqlDir, 'etl')), this.pool, { AUDIT_SCHEMA: schema }, this.logger);
  }

  async dropTables(dataset: DatasetName, tables: readonly string[]): Promise<void> {
    const schema = this.config.database.schemas[dataset];
    for (const table of tables) {
      try {
        await this.pool.request().query(`DROP TABLE IF EXISTS [${schema}].[${table}]`);
        this.logger.debug(`Dropped [${schema}].[${table}]`);
      } catch (error) {
        throw toStorageError(error, 'drop table', `${schema}.${table}`);
      }
    }
  }

  async createTables(dataset: DatasetName): Promise<string[]> {
    const schema = this.config.database.schemas[dataset];
    await this.ensureSchema(schema);
    const scripts = listScripts(path.join(this.sqlDir, dataset, 'init'));
    const results = await executeSQLScripts(scripts, this.pool, { SCHEMA: schema }, this.logger);
    return results.map(result => result.script);
  }
}
