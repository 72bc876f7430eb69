import { groupBy } from 'lodash';
import type { Cell, Relation, Row } from './types';
import { EntityRules, VALIDATION_RULES } from './validation-rules';
import { isMissing, toText } from './coerce';

export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

export interface DatasetValidation extends ValidationResult {
  byEntity: Record<string, ValidationResult>;
}

function numericValue(value: Cell): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function isValidDate(value: Cell): boolean {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

function duplicateGroups(rows: readonly Row[], key: readonly string[]): number {
  const groups = groupBy(rows, row => JSON.stringify(key.map(column => toText(row[column] ?? null))));
  return Object.values(groups).filter(group => group.length > 1).length;
}

/**
 * Run the rule battery for one entity. Errors block the dataset; warnings are advisory.
 * The relation is never modified.
 */
export function validate(
  entity: string,
  relation: Relation,
  rules: Readonly<Record<string, EntityRules>> = VALIDATION_RULES
): ValidationResult {
  const rule = rules[entity];
  if (!rule) {
    throw new Error(`No validation rules registered for ${entity}`);
  }

  const errors: string[] = [];
  const warnings: string[] = [];
  const { rows } = relation;

  if (rows.length === 0) {
    if (!rule.allowEmpty) {
      errors.push(`${entity} data is empty`);
    }
    return { errors, warnings };
  }

  const present = new Set(relation.columns);
  const missing = rule.required.filter(column => !present.has(column));
  if (missing.length > 0) {
    errors.push(`Missing required columns in ${entity}: ${missing.join(', ')}`);
  }

  for (const column of rule.required.filter(c => present.has(c))) {
    const nulls = rows.filter(row => isMissing(row[column])).length;
    if (nulls > 0) {
      warnings.push(`Found ${nulls} null values in ${entity}.${column}`);
    }
  }

  if (rule.uniqueKey && rule.uniqueKey.every(column => present.has(column))) {
    const groups = duplicateGroups(rows, rule.uniqueKey);
    if (groups > 0) {
      errors.push(`Found ${groups} duplicate key group(s) in ${entity} on (${rule.uniqueKey.join(', ')})`);
    }
  }

  for (const format of rule.formats ?? []) {
    if (!present.has(format.column)) continue;
    const invalid = rows.filter(row => {
      const text = toText(row[format.column] ?? null);
      return text !== null && !format.pattern.test(text);
    }).length;
    if (invalid > 0) {
      errors.push(`Found ${invalid} invalid ${format.label} in ${entity}`);
    }
  }

  for (const range of rule.ranges ?? []) {
    if (!present.has(range.column)) continue;
    const invalid = rows.filter(row => {
      const value = row[range.column] ?? null;
      if (isMissing(value)) return false;
      const n = numericValue(value);
      return n === null || n < range.min || n > range.max;
    }).length;
    if (invalid > 0) {
      errors.push(`Found ${invalid} invalid ${range.label} in ${entity}`);
    }
  }

  for (const column of rule.dates ?? []) {
    if (!present.has(column)) continue;
    const invalid = rows.filter(row => !isValidDate(row[column] ?? null)).length;
    if (invalid > 0) {
      errors.push(`Found ${invalid} invalid ${column} dates in ${entity}`);
    }
  }

  return { errors, warnings };
}

/**
 * Validate a batch of relations and aggregate the findings, keyed by relation name.
 */
export function validateDataset(
  relations: readonly Relation[],
  rules: Readonly<Record<string, EntityRules>> = VALIDATION_RULES
): DatasetValidation {
  const byEntity: Record<string, ValidationResult> = {};
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const relation of relations) {
    const result = validate(relation.name, relation, rules);
    byEntity[relation.name] = result;
    errors.push(...result.errors);
    warnings.push(...result.warnings);
  }

  return { errors, warnings, byEntity };
}
