import type { DatasetName } from '../lib/types';
import { AscorPipeline } from './ascor-pipeline';
import { TpiPipeline } from './tpi-pipeline';
import type { BasePipeline, PipelineDeps } from './base-pipeline';

export { BasePipeline } from './base-pipeline';
export type { PipelineDeps, PipelineResult, PipelineState, PipelineStep, Transition } from './base-pipeline';
export { AscorPipeline } from './ascor-pipeline';
export { TpiPipeline } from './tpi-pipeline';
export { runDatasets } from './run-all';
export type { DatasetOutcome, RunAllOptions } from './run-all';

export const DATASETS: readonly DatasetName[] = ['tpi', 'ascor'];

export function isDatasetName(value: string): value is DatasetName {
  return DATASETS.some(dataset => dataset === value);
}

export function createPipeline(dataset: DatasetName, deps: PipelineDeps): BasePipeline {
  switch (dataset) {
    case 'ascor':
      return new AscorPipeline(deps);
    case 'tpi':
      return new TpiPipeline(deps);
  }
}
