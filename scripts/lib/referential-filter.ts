import type { Cell } from './types';
import type { Logger } from './logger';
import { toText } from './coerce';

export type KeyTuple = ReadonlyArray<Cell | undefined>;

function encode(key: KeyTuple): string {
  return JSON.stringify(key.map(part => toText(part ?? null) ?? ''));
}

/**
 * Set of parent keys. Key parts are compared as trimmed text, so `42` and `"42 "` match.
 */
export class KeySet {
  private readonly keys = new Set<string>();

  static from<T>(rows: readonly T[], keyOf: (row: T) => KeyTuple): KeySet {
    const set = new KeySet();
    for (const row of rows) set.add(keyOf(row));
    return set;
  }

  add(key: KeyTuple): void {
    this.keys.add(encode(key));
  }

  has(key: KeyTuple): boolean {
    return this.keys.has(encode(key));
  }

  get size(): number {
    return this.keys.size;
  }
}

export interface FilterResult<T> {
  valid: T[];
  rejected: T[];
  /** distinct rejected keys with the number of rows dropped for each */
  rejectedKeys: RejectedKey[];
}

export interface RejectedKey {
  key: string[];
  rows: number;
}

export interface FilterContext {
  entity: string;
  parent: string;
  logger?: Logger;
}

export function describeRejection(context: FilterContext, rejected: RejectedKey): string {
  return `${context.entity}: dropped ${rejected.rows} row(s) referencing unknown ${context.parent} (${rejected.key.join(', ')})`;
}

/**
 * Keep rows whose foreign key is present in `parentKeys`. Each distinct missing key is
 * logged once, with the number of rows dropped for it.
 */
export function filterValid<T>(
  rows: readonly T[],
  parentKeys: KeySet,
  keyOf: (row: T) => KeyTuple,
  context: FilterContext
): FilterResult<T> {
  const valid: T[] = [];
  const rejected: T[] = [];
  const counts = new Map<string, RejectedKey>();

  for (const row of rows) {
    const key = keyOf(row);
    if (parentKeys.has(key)) {
      valid.push(row);
      continue;
    }
    rejected.push(row);
    const encoded = encode(key);
    const entry = counts.get(encoded);
    if (entry) {
      entry.rows++;
    } else {
      counts.set(encoded, { key: key.map(part => toText(part ?? null) ?? ''), rows: 1 });
    }
  }

  const rejectedKeys = [...counts.values()];
  for (const entry of rejectedKeys) {
    context.logger?.warn(describeRejection(context, entry));
  }

  return { valid, rejected, rejectedKeys };
}
