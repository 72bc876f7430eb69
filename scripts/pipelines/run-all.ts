import type { DatasetName } from '../lib/types';
import type { Logger } from '../lib/logger';
import type { BasePipeline, PipelineResult } from './base-pipeline';

export type DatasetOutcome =
  | { dataset: DatasetName; status: 'done'; result: PipelineResult }
  | { dataset: DatasetName; status: 'failed'; error: unknown }
  | { dataset: DatasetName; status: 'skipped' };

export interface RunAllOptions {
  /** abort the remaining datasets after the first failure */
  stopOnFailure?: boolean;
}

/**
 * Run each dataset's pipeline in sequence. A failed dataset does not stop the next one
 * unless `stopOnFailure` is set; later datasets are then reported as skipped.
 */
export async function runDatasets(
  datasets: readonly DatasetName[],
  pipelineFor: (dataset: DatasetName) => BasePipeline,
  logger: Logger,
  options: RunAllOptions = {}
): Promise<DatasetOutcome[]> {
  const outcomes: DatasetOutcome[] = [];
  let aborted = false;

  for (const dataset of datasets) {
    if (aborted) {
      logger.warn(`${dataset}: skipped after an earlier failure`);
      outcomes.push({ dataset, status: 'skipped' });
      continue;
    }
    try {
      const result = await pipelineFor(dataset).run();
      outcomes.push({ dataset, status: 'done', result });
    } catch (error) {
      logger.error(`${dataset}: ${error instanceof Error ? error.message : String(error)}`);
      outcomes.push({ dataset, status: 'failed', error });
      aborted = options.stopOnFailure === true;
    }
  }

  return outcomes;
}
