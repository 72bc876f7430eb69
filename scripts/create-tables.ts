/**
 * Create Dataset Tables
 * =====================
 * Drops and recreates the tables of one or both datasets from sql/<dataset>/init,
 * and makes sure the audit log exists.
 *
 * Usage:
 *   npx tsx scripts/create-tables.ts [ascor|tpi|all]
 */

import * as dotenv from 'dotenv';
import type { DatasetName } from './lib/types';
import { loadConfig, printConfig } from './lib/config-loader';
import { ConsoleLogger } from './lib/logger';
import { ProgressReporter } from './lib/progress-reporter';
import { formatError } from './lib/error-handler';
import { loadOrder } from './lib/table-catalog';
import { DATASETS, isDatasetName } from './pipelines';
import { Runtime, openRuntime } from './pipelines/runtime';

dotenv.config();

function parseTarget(arg: string | undefined): DatasetName[] | null {
  if (arg === undefined || arg === 'all') return [...DATASETS];
  return isDatasetName(arg) ? [arg] : null;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new ConsoleLogger(config.debugMode);
  const progress = new ProgressReporter();

  const datasets = parseTarget(process.argv[2]);
  if (!datasets) {
    logger.error(`Unknown dataset "${process.argv[2]}". Usage: create-tables [ascor|tpi|all]`);
    process.exit(1);
  }

  if (config.debugMode) {
    printConfig(config);
  }
  if (!config.database.connectionString) {
    logger.error('Database connection string is required (SQLSERVER or SQLSERVER_HOST/DATABASE/USER/PASSWORD)');
    process.exit(1);
  }

  let runtime: Runtime | null = null;
  try {
    runtime = await openRuntime(config, logger, progress);
    await runtime.schema.ensureAuditLog();

    for (const dataset of datasets) {
      progress.logPhase(`Create ${dataset.toUpperCase()} tables`);
      await runtime.schema.dropTables(dataset, [...loadOrder(dataset)].reverse());
      const scripts = await runtime.schema.createTables(dataset);
      logger.success(`${dataset}: ${scripts.length} script(s) executed (${scripts.join(', ')})`);
    }
  } finally {
    if (runtime) {
      await runtime.close();
    }
  }
}

main().catch(error => {
  console.error(formatError(error));
  process.exit(1);
});
