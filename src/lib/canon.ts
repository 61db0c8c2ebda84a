import { NormalizationError } from '../errors.js';

export interface PositionEntry {
  position: string;
  pos: string;
}

// Canonical position names and abbreviations as printed on the English site, followed by
// spellings seen on older layouts and the German site.
const POSITIONS: ReadonlyArray<PositionEntry & { aliases: string[]; abbreviations: string[] }> = [
  { position: 'Goalkeeper', pos: 'GK', aliases: ['keeper', 'torwart'], abbreviations: ['TW'] },
  { position: 'Centre-Back', pos: 'CB', aliases: ['center-back', 'innenverteidiger'], abbreviations: ['IV'] },
  { position: 'Left-Back', pos: 'LB', aliases: ['linker verteidiger'], abbreviations: ['LV'] },
  { position: 'Right-Back', pos: 'RB', aliases: ['rechter verteidiger'], abbreviations: ['RV'] },
  { position: 'Defensive Midfield', pos: 'DM', aliases: ['defensives mittelfeld'], abbreviations: [] },
  { position: 'Central Midfield', pos: 'CM', aliases: ['zentrales mittelfeld'], abbreviations: ['ZM'] },
  { position: 'Attacking Midfield', pos: 'AM', aliases: ['offensives mittelfeld'], abbreviations: ['OM'] },
  { position: 'Left Midfield', pos: 'LM', aliases: ['linkes mittelfeld'], abbreviations: [] },
  { position: 'Right Midfield', pos: 'RM', aliases: ['rechtes mittelfeld'], abbreviations: [] },
  { position: 'Left Winger', pos: 'LW', aliases: ['linksaussen'], abbreviations: ['LA'] },
  { position: 'Right Winger', pos: 'RW', aliases: ['rechtsaussen'], abbreviations: ['RA'] },
  { position: 'Second Striker', pos: 'SS', aliases: ['haengende spitze', 'hangende spitze'], abbreviations: ['HS'] },
  { position: 'Centre-Forward', pos: 'CF', aliases: ['center-forward', 'mittelstuermer', 'mittelsturmer'], abbreviations: ['MS'] },
  { position: 'Defender', pos: 'DF', aliases: ['defence', 'defense', 'abwehr'], abbreviations: ['DEF'] },
  { position: 'Midfield', pos: 'MF', aliases: ['midfielder', 'mittelfeld'], abbreviations: ['MID'] },
  { position: 'Attack', pos: 'FW', aliases: ['forward', 'striker', 'sturm'], abbreviations: ['ATT'] }
];

function positionKey(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/ß/g, 'ss')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '');
}

const BY_POSITION = new Map<string, PositionEntry>();
const BY_ABBREVIATION = new Map<string, PositionEntry>();

for (const entry of POSITIONS) {
  const canonical: PositionEntry = { position: entry.position, pos: entry.pos };
  for (const name of [entry.position, ...entry.aliases]) {
    BY_POSITION.set(positionKey(name), canonical);
  }
  for (const abbreviation of [entry.pos, ...entry.abbreviations]) {
    BY_ABBREVIATION.set(positionKey(abbreviation), canonical);
  }
}

export function positionForAbbreviation(pos: string): PositionEntry | undefined {
  return BY_ABBREVIATION.get(positionKey(pos));
}

export function abbreviationForPosition(position: string): PositionEntry | undefined {
  return BY_POSITION.get(positionKey(position));
}

/**
 * Resolves the `position`/`pos` pair from whichever side the page provides.
 * Unknown strings and pairs that disagree are rejected rather than guessed.
 */
export function resolvePosition(position: string, pos: string): PositionEntry {
  const fromPosition = position ? abbreviationForPosition(position) : undefined;
  if (position && !fromPosition) {
    throw new NormalizationError(`Unknown position "${position}"`, {
      code: 'UNKNOWN_POSITION',
      field: 'position',
      value: position
    });
  }

  const fromPos = pos ? positionForAbbreviation(pos) : undefined;
  if (pos && !fromPos) {
    throw new NormalizationError(`Unknown position abbreviation "${pos}"`, {
      code: 'UNKNOWN_POSITION',
      field: 'pos',
      value: pos
    });
  }

  if (fromPosition && fromPos && fromPosition.pos !== fromPos.pos) {
    throw new NormalizationError(`Position "${position}" does not match abbreviation "${pos}"`, {
      code: 'POSITION_MISMATCH',
      field: 'pos',
      value: pos,
      details: { position }
    });
  }

  const resolved = fromPosition ?? fromPos;
  if (!resolved) {
    throw new NormalizationError('Row has neither a position nor an abbreviation', {
      code: 'MISSING_POSITION',
      field: 'position',
      value: ''
    });
  }
  return resolved;
}

export function canonicalText(value: string | undefined): string {
  if (!value) return '';
  return value
    .normalize('NFC')
    .replace(/[\u00a0\u2007\u202f]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

const CLUB_AFFIXES = new Set(['fc', 'afc', 'cf', 'sc', 'ac', 'ssc', 'as', 'sv', 'vfb', 'vfl', 'fk', 'sk', 'cd', 'ud', 'rc', 'calcio', 'club', 'de', 'the']);

function tokens(input: string): string[] {
  return input.split(/[^a-z0-9]+/i).filter(Boolean);
}

/**
 * Spelling-insensitive club key for names printed on different pages,
 * e.g. "Arsenal FC" and "Arsenal" both give `arsenal`.
 */
export function canonicalClubKey(name: string): string {
  const folded = canonicalText(name)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase();
  const all = tokens(folded);
  const significant = all.filter((token) => !CLUB_AFFIXES.has(token) && !/^\d{4}$/.test(token));
  return (significant.length ? significant : all).join('-');
}
