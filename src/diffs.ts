import { isDeepStrictEqual } from 'node:util';
import { TRANSFER_COLUMNS, type TransferColumn } from './types/index.js';

/** A dataset row as it appears in the CSV, every column a string. */
export type CsvRow = Record<TransferColumn, string>;

export interface FieldChange {
  before: string;
  after: string;
}

export interface RowChange {
  key: string;
  changes: Partial<Record<TransferColumn, FieldChange>>;
}

export interface DatasetDiff {
  added: CsvRow[];
  removed: CsvRow[];
  changed: RowChange[];
}

export interface DatasetDiffSummary {
  added: number;
  removed: number;
  changed: number;
}

const KEY_COLUMNS = ['club', 'movement', 'window', 'player_id', 'dealing_club'] as const satisfies readonly TransferColumn[];

/**
 * Identity of each row across runs. A player can move between the same two
 * clubs twice in one window, so repeats get an occurrence number.
 */
export function datasetRowKeys(rows: readonly CsvRow[]): string[] {
  const seen = new Map<string, number>();
  return rows.map((row) => {
    const base = KEY_COLUMNS.map((column) => row[column]).join('|');
    const occurrence = seen.get(base) ?? 0;
    seen.set(base, occurrence + 1);
    return `${base}#${occurrence}`;
  });
}

export function computeDiff(
  before: CsvRow,
  after: CsvRow,
  fields: readonly TransferColumn[] = TRANSFER_COLUMNS
): Partial<Record<TransferColumn, FieldChange>> | null {
  const changes: Partial<Record<TransferColumn, FieldChange>> = {};
  for (const field of fields) {
    const prev = before[field];
    const next = after[field];
    if (!isDeepStrictEqual(prev, next)) {
      changes[field] = { before: prev, after: next };
    }
  }
  return Object.keys(changes).length ? changes : null;
}

export function diffDatasets(previous: readonly CsvRow[], next: readonly CsvRow[]): DatasetDiff {
  const previousKeys = datasetRowKeys(previous);
  const previousByKey = new Map(previousKeys.map((key, index) => [key, previous[index]]));
  const diff: DatasetDiff = { added: [], removed: [], changed: [] };

  const nextKeys = datasetRowKeys(next);
  for (const [index, key] of nextKeys.entries()) {
    const row = next[index];
    const before = previousByKey.get(key);
    if (!before) {
      diff.added.push(row);
      continue;
    }
    previousByKey.delete(key);
    const changes = computeDiff(before, row);
    if (changes) diff.changed.push({ key, changes });
  }

  diff.removed.push(...previousByKey.values());
  return diff;
}

export function summarizeDiff(diff: DatasetDiff): DatasetDiffSummary {
  return { added: diff.added.length, removed: diff.removed.length, changed: diff.changed.length };
}
