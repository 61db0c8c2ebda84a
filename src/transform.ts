import { NormalizationError } from './errors.js';
import { canonicalText, resolvePosition } from './lib/canon.js';
import { classifyFee, parseCurrency } from './lib/currency.js';
import { DERIVED_LABELS, fieldForLabel, type CanonicalField } from './lib/labels.js';
import type { NormalizeContext, RawRow, ScrapedTransfer, TransferRecord, TransferSource } from './types/index.js';

export type NormalizeResult =
  | { ok: true; record: TransferRecord; source: TransferSource }
  | { ok: false; error: NormalizationError; row: RawRow };

export interface NormalizedPage {
  transfers: ScrapedTransfer[];
  failures: Array<{ error: NormalizationError; row: RawRow }>;
}

const PLAYER_ID = /\/spieler\/(\d+)/;
const CLUB_ID = /\/verein\/(\d+)/;
const TRANSFER_ID = /transfer_id\/(\d+)/;
const MAX_AGE = 120;
const LOAN_MARKERS = new Set(['yes', 'y', 'true', '1', 'x', '✓', 'ja']);

type FieldValues = Partial<Record<CanonicalField, string>>;

// A layout can print a field twice (crest title and name link); the first non-empty cell wins.
function collectFields(cells: Record<string, string>): FieldValues {
  const fields: FieldValues = {};
  for (const [label, value] of Object.entries(cells)) {
    if (label.startsWith('@')) continue;
    const field = fieldForLabel(label);
    if (!field || fields[field]) continue;
    const text = canonicalText(value);
    if (text) fields[field] = text;
  }
  return fields;
}

function matchId(pattern: RegExp, href: string | undefined): string | undefined {
  if (!href) return undefined;
  return pattern.exec(href)?.[1];
}

function parseAge(raw: string | undefined): number {
  const text = canonicalText(raw);
  const age = Number(text);
  // Bounds match schemas/transfer_record.json.
  if (!/^\d{1,3}$/.test(text) || age > MAX_AGE) {
    throw new NormalizationError(`Invalid age "${text}"`, { code: 'INVALID_AGE', field: 'age', value: text });
  }
  return age;
}

function normalizeRow(row: RawRow, context: NormalizeContext): { record: TransferRecord; source: TransferSource } {
  const fields = collectFields(row.cells);
  const playerHref = row.cells[DERIVED_LABELS.playerHref];

  const player_id = matchId(PLAYER_ID, playerHref);
  if (!player_id) {
    throw new NormalizationError('Row has no player profile link', {
      code: 'MISSING_PLAYER_ID',
      field: 'player_id',
      value: playerHref ?? ''
    });
  }

  const player_name = fields.player_name ?? '';
  if (!player_name) {
    throw new NormalizationError('Row has no player name', {
      code: 'MISSING_PLAYER_NAME',
      field: 'player_name',
      value: '',
      details: { player_id }
    });
  }

  const positionText = fields.position ?? canonicalText(row.cells[DERIVED_LABELS.playerPosition]);
  const { position, pos } = resolvePosition(positionText, fields.pos ?? '');
  const { fee, isLoan } = classifyFee(fields.fee ?? '');
  const loanColumn = LOAN_MARKERS.has((fields.loan ?? '').toLowerCase());

  const record: TransferRecord = {
    season: context.season,
    league: context.league.slug,
    club: context.club.name,
    window: context.window,
    movement: row.movement,
    player_name,
    player_id,
    age: parseAge(fields.age),
    nationality: (fields.nationality ?? '').split('/')[0].trim(),
    position,
    pos,
    market_value: parseCurrency(fields.market_value ?? '', 'market_value'),
    dealing_club: fields.dealing_club ?? '',
    dealing_country: canonicalText(row.cells[DERIVED_LABELS.dealingCountry]),
    fee,
    is_loan: isLoan || loanColumn
  };

  const source: TransferSource = {
    clubId: context.club.id,
    dealingClubId: matchId(CLUB_ID, row.cells[DERIVED_LABELS.dealingClubHref]),
    transferId: matchId(TRANSFER_ID, row.cells[DERIVED_LABELS.transferHref]),
    date: fields.date || undefined,
    rowIndex: row.index,
    url: context.url
  };

  return { record, source };
}

/** Normalizes one row; a bad row yields an error result and never throws. */
export function normalize(row: RawRow, context: NormalizeContext): NormalizeResult {
  try {
    return { ok: true, ...normalizeRow(row, context) };
  } catch (error) {
    if (error instanceof NormalizationError) return { ok: false, error, row };
    throw error;
  }
}

export function normalizePage(rows: RawRow[], context: NormalizeContext): NormalizedPage {
  const page: NormalizedPage = { transfers: [], failures: [] };
  for (const row of rows) {
    const result = normalize(row, context);
    if (result.ok) {
      page.transfers.push({ record: result.record, source: result.source });
    } else {
      page.failures.push({ error: result.error, row: result.row });
    }
  }
  return page;
}
