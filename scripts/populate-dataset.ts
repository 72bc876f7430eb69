/**
 * Populate One Dataset
 * ====================
 * Runs the pipeline of a single dataset: drop, create, process, validate, load.
 * Nothing is loaded when validation reports an error.
 *
 * Usage:
 *   npx tsx scripts/populate-dataset.ts <ascor|tpi>
 */

import * as dotenv from 'dotenv';
import { loadConfig, printConfig, validateConfig } from './lib/config-loader';
import { ConsoleLogger } from './lib/logger';
import { ProgressReporter } from './lib/progress-reporter';
import { formatError } from './lib/error-handler';
import { DatasetValidationError } from './lib/errors';
import { createPipeline, isDatasetName } from './pipelines';
import { Runtime, openRuntime } from './pipelines/runtime';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new ConsoleLogger(config.debugMode);
  const progress = new ProgressReporter();

  const dataset = process.argv[2];
  if (dataset === undefined || !isDatasetName(dataset)) {
    logger.error(`Usage: populate-dataset <ascor|tpi> (got "${dataset ?? ''}")`);
    process.exit(1);
  }

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
    const result = await createPipeline(dataset, runtime.depsFor(dataset)).run();
    logger.success(`${dataset}: ${result.rowsLoaded} row(s) loaded, ${result.warnings.length} warning(s)`);
  } catch (error) {
    if (error instanceof DatasetValidationError) {
      logger.error(`${error.dataset}: ${error.errors.length} validation error(s), nothing loaded`);
      error.errors.forEach(message => logger.error(`  ${message}`));
    } else {
      console.error(formatError(error));
    }
    process.exitCode = 1;
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
