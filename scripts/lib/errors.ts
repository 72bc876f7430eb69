import type { DatasetName } from './types';

/**
 * A required source directory or file was not found. Fatal for the dataset.
 */
export class SourceNotFoundError extends Error {
  constructor(
    public readonly dataset: DatasetName,
    public readonly source: string,
    public readonly pattern: string,
    public readonly searched: string
  ) {
    super(`${dataset}: no ${source} matching "${pattern}" in ${searched}`);
    this.name = 'SourceNotFoundError';
  }
}

/**
 * Validation produced blocking errors; nothing from the dataset was loaded.
 */
export class DatasetValidationError extends Error {
  constructor(
    public readonly dataset: DatasetName,
    public readonly errors: string[],
    public readonly warnings: string[]
  ) {
    super(`${dataset} validation failed with ${errors.length} error(s)`);
    this.name = 'DatasetValidationError';
  }
}

export type StorageErrorCategory = 'connection' | 'permission' | 'already-exists' | 'constraint' | 'syntax' | 'unknown';

export class StorageError extends Error {
  constructor(
    message: string,
    public readonly category: StorageErrorCategory,
    public readonly operation: string,
    public readonly table: string | null,
    public readonly driverError: unknown
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

/**
 * The loader was asked to write a table before its parents, or a table outside the load order.
 */
export class LoadOrderError extends Error {
  constructor(public readonly entity: string, reason: string) {
    super(`Cannot load ${entity}: ${reason}`);
    this.name = 'LoadOrderError';
  }
}

export class QueryParameterError extends Error {
  constructor(public readonly parameter: string, message: string) {
    super(message);
    this.name = 'QueryParameterError';
  }
}

/**
 * A pipeline was asked to move between states its transition table does not allow.
 */
export class PipelineStateError extends Error {
  constructor(public readonly from: string, public readonly to: string) {
    super(`Illegal pipeline transition ${from} → ${to}`);
    this.name = 'PipelineStateError';
  }
}
