/**
 * Climate Assessment ETL Pipeline
 * ===============================
 * Runs every dataset pipeline in sequence: TPI first, then ASCOR.
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts [options]
 *
 * Options:
 *   --stop-on-failure   Abort the remaining datasets after the first failure
 *   --only=<dataset>    Run a single dataset (ascor or tpi)
 *
 * Each dataset runs its own state machine:
 *   INIT → DROP → CREATE → (PROCESS → VALIDATE) per entity → LOAD → DONE
 * A validation error fails that dataset with nothing loaded. The other dataset still
 * runs unless --stop-on-failure is given. Exit code is 1 when any dataset failed.
 */

import * as dotenv from 'dotenv';
import type { DatasetName } from './lib/types';
import { loadConfig, printConfig, validateConfig } from './lib/config-loader';
import { ConsoleLogger } from './lib/logger';
import { ProgressReporter } from './lib/progress-reporter';
import { formatError } from './lib/error-handler';
import { DatasetValidationError } from './lib/errors';
import { DATASETS, createPipeline, isDatasetName, runDatasets } from './pipelines';
import { Runtime, openRuntime } from './pipelines/runtime';

dotenv.config();

function selectDatasets(args: readonly string[]): DatasetName[] | null {
  const only = args.find(arg => arg.startsWith('--only='));
  if (!only) return [...DATASETS];
  const name = only.slice('--only='.length);
  return isDatasetName(name) ? [name] : null;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const stopOnFailure = args.includes('--stop-on-failure');
  const config = loadConfig();
  const logger = new ConsoleLogger(config.debugMode);
  const progress = new ProgressReporter();

  const datasets = selectDatasets(args);
  if (!datasets) {
    logger.error('--only must name a dataset: ascor or tpi');
    process.exit(1);
  }

  logger.info('');
  logger.info('='.repeat(60));
  logger.info('Climate Assessment ETL Pipeline');
  logger.info('='.repeat(60));
  logger.info(`Datasets: ${datasets.join(', ')}`);
  logger.info(`Data directory: ${config.dataDir}`);
  if (config.debugMode) {
    printConfig(config);
  }

  const validation = validateConfig(config);
  if (!validation.valid) {
    validation.errors.forEach(message => logger.error(message));
    process.exit(1);
  }

  let runtime: Runtime | null = null;
  try {
    runtime = await openRuntime(config, logger, progress);
    const { depsFor } = runtime;
    const outcomes = await runDatasets(datasets, dataset => createPipeline(dataset, depsFor(dataset)), logger, {
      stopOnFailure,
    });

    logger.info('='.repeat(60));
    for (const outcome of outcomes) {
      switch (outcome.status) {
        case 'done':
          logger.success(`${outcome.dataset}: ${outcome.result.rowsLoaded} row(s), ${outcome.result.warnings.length} warning(s)`);
          break;
        case 'failed':
          if (outcome.error instanceof DatasetValidationError) {
            logger.error(`${outcome.dataset}: validation failed, nothing loaded`);
            outcome.error.errors.forEach(message => logger.error(`  ${message}`));
          } else {
            logger.error(`${outcome.dataset}: failed`);
            console.error(formatError(outcome.error));
          }
          break;
        case 'skipped':
          logger.warn(`${outcome.dataset}: skipped`);
          break;
      }
    }

    if (outcomes.some(outcome => outcome.status !== 'done')) {
      process.exitCode = 1;
    } else {
      logger.success('PIPELINE COMPLETED SUCCESSFULLY');
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
