import { join } from 'node:path';
import Papa from 'papaparse';
import { diffDatasets, summarizeDiff, type CsvRow, type DatasetDiffSummary } from './diffs.js';
import { WriteError } from './errors.js';
import { TRANSFER_COLUMNS, type Movement, type TransferRecord, type TransferWindow } from './types/index.js';
import { readTextOrUndefined, writeFileAtomic } from './utils/fs.js';
import { log } from './utils/log.js';
import { validateTransferRecords } from './validate.js';

export interface WriteOptions {
  outputDir: string;
  schemaDir?: string;
}

export interface WriteResult {
  file: string;
  rows: number;
  unchanged: boolean;
  diff: DatasetDiffSummary;
}

const MOVEMENT_ORDER: Record<Movement, number> = { in: 0, out: 1 };
const WINDOW_ORDER: Record<TransferWindow, number> = { summer: 0, winter: 1 };

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function nullable(value: number | null): string {
  return value === null ? '' : String(value);
}

export function toCsvRow(record: TransferRecord): CsvRow {
  return {
    season: String(record.season),
    league: record.league,
    club: record.club,
    window: record.window,
    movement: record.movement,
    player_name: record.player_name,
    player_id: record.player_id,
    age: String(record.age),
    nationality: record.nationality,
    position: record.position,
    pos: record.pos,
    market_value: nullable(record.market_value),
    dealing_club: record.dealing_club,
    dealing_country: record.dealing_country,
    fee: nullable(record.fee),
    is_loan: record.is_loan ? '1' : '0'
  };
}

function rowCells(row: CsvRow): string[] {
  return TRANSFER_COLUMNS.map((column) => row[column]);
}

/** Total order of the published file; ties fall through to the whole row. */
export function compareRecords(a: TransferRecord, b: TransferRecord): number {
  return (
    compareText(a.club, b.club) ||
    MOVEMENT_ORDER[a.movement] - MOVEMENT_ORDER[b.movement] ||
    WINDOW_ORDER[a.window] - WINDOW_ORDER[b.window] ||
    compareText(a.player_name, b.player_name) ||
    compareText(a.player_id, b.player_id) ||
    compareText(a.dealing_club, b.dealing_club) ||
    compareText(rowCells(toCsvRow(a)).join('\u0000'), rowCells(toCsvRow(b)).join('\u0000'))
  );
}

export function sortRecords(records: readonly TransferRecord[]): TransferRecord[] {
  return [...records].sort(compareRecords);
}

/** CSV text of a season: header, sorted rows, `\n` endings and a trailing newline. */
export function serializeDataset(records: readonly TransferRecord[]): string {
  const data = sortRecords(records).map((record) => rowCells(toCsvRow(record)));
  const csv = Papa.unparse([[...TRANSFER_COLUMNS], ...data], { newline: '\n' });
  return `${csv}\n`;
}

function csvRowFromCells(cells: string[], line: number): CsvRow {
  if (cells.length !== TRANSFER_COLUMNS.length) {
    throw new Error(`Expected ${TRANSFER_COLUMNS.length} columns on row ${line}, found ${cells.length}.`);
  }
  const [
    season,
    league,
    club,
    window,
    movement,
    player_name,
    player_id,
    age,
    nationality,
    position,
    pos,
    market_value,
    dealing_club,
    dealing_country,
    fee,
    is_loan
  ] = cells;
  return {
    season,
    league,
    club,
    window,
    movement,
    player_name,
    player_id,
    age,
    nationality,
    position,
    pos,
    market_value,
    dealing_club,
    dealing_country,
    fee,
    is_loan
  };
}

/** Parses a dataset file back into string rows, checking the header. */
export function parseDataset(text: string): CsvRow[] {
  const parsed = Papa.parse<string[]>(text, { skipEmptyLines: true });
  if (parsed.errors.length) {
    const [first] = parsed.errors;
    throw new Error(`Malformed CSV at row ${first.row ?? '?'}: ${first.message}`);
  }
  const [header, ...rows] = parsed.data;
  if (!header || header.join(',') !== TRANSFER_COLUMNS.join(',')) {
    throw new Error('CSV header does not match the transfer record columns.');
  }
  return rows.map((cells, index) => csvRowFromCells(cells, index + 2));
}

function parseNullableInteger(value: string, column: string): number | null {
  if (value === '') return null;
  if (!/^\d+$/.test(value)) throw new Error(`Invalid ${column} "${value}".`);
  return Number(value);
}

export function recordFromCsvRow(row: CsvRow): TransferRecord {
  const { window, movement } = row;
  if (window !== 'summer' && window !== 'winter') throw new Error(`Invalid window "${window}".`);
  if (movement !== 'in' && movement !== 'out') throw new Error(`Invalid movement "${movement}".`);
  if (row.is_loan !== '0' && row.is_loan !== '1') throw new Error(`Invalid is_loan "${row.is_loan}".`);
  return {
    season: Number(row.season),
    league: row.league,
    club: row.club,
    window,
    movement,
    player_name: row.player_name,
    player_id: row.player_id,
    age: Number(row.age),
    nationality: row.nationality,
    position: row.position,
    pos: row.pos,
    market_value: parseNullableInteger(row.market_value, 'market_value'),
    dealing_club: row.dealing_club,
    dealing_country: row.dealing_country,
    fee: parseNullableInteger(row.fee, 'fee'),
    is_loan: row.is_loan === '1'
  };
}

export function datasetPath(outputDir: string, league: string, season: number): string {
  return join(outputDir, league, `${season}.csv`);
}

async function readPreviousRows(file: string): Promise<{ text?: string; rows: CsvRow[] }> {
  const text = await readTextOrUndefined(file);
  if (text === undefined) return { rows: [] };
  try {
    return { text, rows: parseDataset(text) };
  } catch (error) {
    log.warn('Previous dataset is unreadable, diffing against an empty file', { file, error });
    return { text, rows: [] };
  }
}

/**
 * Validates, sorts and atomically replaces `{outputDir}/{league}/{season}.csv`.
 * A file whose content would not change is left untouched.
 */
export async function writeSeasonDataset(
  league: string,
  season: number,
  records: readonly TransferRecord[],
  options: WriteOptions
): Promise<WriteResult> {
  const file = datasetPath(options.outputDir, league, season);
  const sorted = sortRecords(records);
  await validateTransferRecords(sorted, file, options.schemaDir);

  const content = serializeDataset(sorted);
  const previous = await readPreviousRows(file);
  const diff = summarizeDiff(diffDatasets(previous.rows, sorted.map(toCsvRow)));

  if (previous.text === content) {
    log.info('Season dataset unchanged', { file, rows: sorted.length });
    return { file, rows: sorted.length, unchanged: true, diff };
  }

  try {
    await writeFileAtomic(file, content);
  } catch (error) {
    throw new WriteError('Failed to replace season dataset', { code: 'WRITE_FAILED', file, cause: error });
  }

  log.info('Wrote season dataset', { file, rows: sorted.length, ...diff });
  return { file, rows: sorted.length, unchanged: false, diff };
}
