import * as sql from 'mssql';
import type { DatasetName } from '../lib/types';
import type { ETLConfig } from '../lib/config-loader';
import type { Logger } from '../lib/logger';
import { ProgressReporter } from '../lib/progress-reporter';
import { createPool } from '../lib/db';
import { MssqlSchemaManager } from '../lib/schema-manager';
import { MssqlTableWriter } from '../lib/table-writer';
import { MssqlAuditLog } from '../lib/audit-log';
import type { PipelineDeps } from './base-pipeline';

/**
 * SQL Server-backed collaborators shared by the CLI entry points.
 */
export interface Runtime {
  pool: sql.ConnectionPool;
  schema: MssqlSchemaManager;
  audit: MssqlAuditLog;
  depsFor(dataset: DatasetName): PipelineDeps;
  close(): Promise<void>;
}

export async function openRuntime(config: ETLConfig, logger: Logger, progress: ProgressReporter): Promise<Runtime> {
  logger.info('Connecting to SQL Server...');
  const pool = await createPool(config);
  logger.success('Connected');

  const schema = new MssqlSchemaManager(pool, config, logger);
  const audit = new MssqlAuditLog(pool, config.database.schemas.audit);

  return {
    pool,
    schema,
    audit,
    depsFor: dataset => ({
      config,
      schema,
      audit,
      logger,
      progress,
      writer: new MssqlTableWriter(pool, config.database.schemas[dataset]),
    }),
    close: async () => {
      await pool.close();
      logger.info('Connection closed');
    },
  };
}
