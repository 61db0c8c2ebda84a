import type { Movement } from '../types/index.js';

export type CanonicalField =
  | 'player_name'
  | 'age'
  | 'nationality'
  | 'position'
  | 'pos'
  | 'market_value'
  | 'dealing_club'
  | 'fee'
  | 'date'
  | 'loan';

/** Labels the extractor adds to a row; the leading `@` keeps them apart from page labels. */
export const DERIVED_LABELS = {
  playerHref: '@player_href',
  dealingClubHref: '@dealing_club_href',
  dealingCountry: '@dealing_country',
  transferHref: '@transfer_href',
  playerPosition: '@player_position'
} as const;

const PLAYER_COLUMN_ENTRIES: Record<string, Movement> = {
  in: 'in',
  arrivals: 'in',
  incoming: 'in',
  'zugänge': 'in',
  out: 'out',
  departures: 'out',
  outgoing: 'out',
  'abgänge': 'out'
};

// Header labels across the English and German layouts, keyed by `labelKey`.
const LABEL_ALIAS_ENTRIES: Record<string, CanonicalField> = {
  player: 'player_name',
  spieler: 'player_name',
  name: 'player_name',
  age: 'age',
  alter: 'age',
  'nat.': 'nationality',
  nat: 'nationality',
  nationality: 'nationality',
  nation: 'nationality',
  position: 'position',
  pos: 'pos',
  'pos.': 'pos',
  'market value': 'market_value',
  mv: 'market_value',
  'mkt. value': 'market_value',
  marktwert: 'market_value',
  mw: 'market_value',
  left: 'dealing_club',
  joined: 'dealing_club',
  from: 'dealing_club',
  to: 'dealing_club',
  'left club': 'dealing_club',
  'joined club': 'dealing_club',
  'previous club': 'dealing_club',
  'new club': 'dealing_club',
  'abgebender verein': 'dealing_club',
  'aufnehmender verein': 'dealing_club',
  fee: 'fee',
  'transfer fee': 'fee',
  'ablöse': 'fee',
  date: 'date',
  datum: 'date',
  loan: 'loan',
  'on loan': 'loan'
};

// Looked up with page text, so kept off the object prototype.
const PLAYER_COLUMN_LABELS = new Map(Object.entries(PLAYER_COLUMN_ENTRIES));
const LABEL_ALIASES = new Map(Object.entries(LABEL_ALIAS_ENTRIES));

/** Lowercased, whitespace-collapsed label without the `#n` suffix added for repeated columns. */
export function labelKey(label: string): string {
  return label
    .normalize('NFC')
    .replace(/\s+#\d+$/, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

export function movementForLabel(label: string): Movement | undefined {
  return PLAYER_COLUMN_LABELS.get(labelKey(label));
}

export function movementForHeadline(text: string): Movement | undefined {
  const lower = labelKey(text);
  if (/\b(arrivals|incoming)\b|zugänge/.test(lower)) return 'in';
  if (/\b(departures|outgoing)\b|abgänge/.test(lower)) return 'out';
  return undefined;
}

export function fieldForLabel(label: string): CanonicalField | undefined {
  const key = labelKey(label);
  if (PLAYER_COLUMN_LABELS.has(key)) return 'player_name';
  return LABEL_ALIASES.get(key);
}
