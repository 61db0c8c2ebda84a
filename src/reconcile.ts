import { canonicalClubKey } from './lib/canon.js';
import type { ScrapedTransfer, TransferRecord } from './types/index.js';
import { log } from './utils/log.js';

export type ConflictField = 'fee' | 'market_value' | 'is_loan';

/** A disagreement between the two pages of one transfer, with the value kept. */
export interface ReconciliationConflict {
  field: ConflictField;
  player_id: string;
  player_name: string;
  season: number;
  window: TransferRecord['window'];
  buyingClub: string;
  sellingClub: string;
  inValue: number | boolean | null;
  outValue: number | boolean | null;
  resolved: number | boolean | null;
}

export interface ReconcileStats {
  groups: number;
  pairs: number;
  unpaired: number;
}

export interface ReconcileResult {
  transfers: ScrapedTransfer[];
  conflicts: ReconciliationConflict[];
  stats: ReconcileStats;
}

interface Entry {
  position: number;
  transfer: ScrapedTransfer;
  ownKey: string;
  counterpartKey: string;
}

type PairMatcher = (incoming: Entry, outgoing: Entry) => boolean;

// Strongest evidence first; the last stage pairs whatever is left in page order.
const PAIRING_STAGES: PairMatcher[] = [
  (a, b) => a.transfer.source.transferId !== undefined && a.transfer.source.transferId === b.transfer.source.transferId,
  (a, b) => a.transfer.source.date !== undefined && a.transfer.source.date === b.transfer.source.date,
  (a, b) => a.transfer.record.fee === b.transfer.record.fee && a.transfer.record.is_loan === b.transfer.record.is_loan,
  () => true
];

/** Club ids by canonical name, so a side without a club link still keys by id. */
function buildClubIndex(transfers: ScrapedTransfer[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const { record, source } of transfers) {
    index.set(canonicalClubKey(record.club), source.clubId);
    if (source.dealingClubId && record.dealing_club) {
      const key = canonicalClubKey(record.dealing_club);
      if (!index.has(key)) index.set(key, source.dealingClubId);
    }
  }
  return index;
}

function clubKey(name: string, id: string | undefined, index: Map<string, string>): string {
  const resolved = id ?? index.get(canonicalClubKey(name));
  return resolved ? `id:${resolved}` : `name:${canonicalClubKey(name)}`;
}

function groupKey(entry: Entry): string {
  const { record } = entry.transfer;
  const [low, high] = [entry.ownKey, entry.counterpartKey].sort();
  return [record.player_id, record.season, record.window, low, high].join('|');
}

function pairGroup(entries: Entry[]): Array<[Entry, Entry]> {
  const incoming = entries.filter((entry) => entry.transfer.record.movement === 'in');
  const outgoing = entries.filter((entry) => entry.transfer.record.movement === 'out');
  const paired = new Set<Entry>();
  const pairs: Array<[Entry, Entry]> = [];

  for (const matches of PAIRING_STAGES) {
    for (const inEntry of incoming) {
      if (paired.has(inEntry)) continue;
      const outEntry = outgoing.find(
        (candidate) =>
          !paired.has(candidate) &&
          candidate.ownKey === inEntry.counterpartKey &&
          candidate.counterpartKey === inEntry.ownKey &&
          matches(inEntry, candidate)
      );
      if (!outEntry) continue;
      paired.add(inEntry);
      paired.add(outEntry);
      pairs.push([inEntry, outEntry]);
    }
  }
  return pairs;
}

function preferValue(inValue: number | null, outValue: number | null): number | null {
  if (inValue === null) return outValue;
  return inValue;
}

function mergePair(
  incoming: ScrapedTransfer,
  outgoing: ScrapedTransfer,
  conflicts: ReconciliationConflict[]
): [ScrapedTransfer, ScrapedTransfer] {
  const a = incoming.record;
  const b = outgoing.record;
  const conflict = (field: ConflictField, inValue: number | boolean | null, outValue: number | boolean | null, resolved: number | boolean | null) => {
    if (inValue === outValue) return;
    const entry: ReconciliationConflict = {
      field,
      player_id: a.player_id,
      player_name: a.player_name,
      season: a.season,
      window: a.window,
      buyingClub: a.club,
      sellingClub: b.club,
      inValue,
      outValue,
      resolved
    };
    conflicts.push(entry);
    log.warn('Paired transfer pages disagree', { ...entry });
  };

  const fee = preferValue(a.fee, b.fee);
  const marketValue = preferValue(a.market_value, b.market_value);
  const isLoan = a.is_loan || b.is_loan;
  conflict('fee', a.fee, b.fee, fee);
  conflict('market_value', a.market_value, b.market_value, marketValue);
  conflict('is_loan', a.is_loan, b.is_loan, isLoan);

  return [
    {
      record: { ...a, fee, market_value: marketValue, is_loan: isLoan, dealing_club: b.club },
      source: incoming.source
    },
    {
      record: { ...b, fee, market_value: marketValue, is_loan: isLoan, dealing_club: a.club },
      source: outgoing.source
    }
  ];
}

/**
 * Pairs the `in` and `out` records of the same transfer scraped from both
 * clubs' pages and makes the pair consistent. Records are never dropped or
 * created, and input order is kept.
 */
export function reconcile(transfers: ScrapedTransfer[]): ReconcileResult {
  const index = buildClubIndex(transfers);
  const groups = new Map<string, Entry[]>();
  const entries = transfers.map((transfer, position): Entry => {
    const { record, source } = transfer;
    const entry: Entry = {
      position,
      transfer,
      ownKey: clubKey(record.club, source.clubId, index),
      counterpartKey: clubKey(record.dealing_club, source.dealingClubId, index)
    };
    const key = groupKey(entry);
    const group = groups.get(key);
    if (group) group.push(entry);
    else groups.set(key, [entry]);
    return entry;
  });

  const output = [...transfers];
  const conflicts: ReconciliationConflict[] = [];
  let pairCount = 0;

  for (const group of groups.values()) {
    const sorted = [...group].sort((x, y) => x.transfer.source.rowIndex - y.transfer.source.rowIndex || x.position - y.position);
    for (const [inEntry, outEntry] of pairGroup(sorted)) {
      const [mergedIn, mergedOut] = mergePair(inEntry.transfer, outEntry.transfer, conflicts);
      output[inEntry.position] = mergedIn;
      output[outEntry.position] = mergedOut;
      pairCount++;
    }
  }

  return {
    transfers: output,
    conflicts,
    stats: { groups: groups.size, pairs: pairCount, unpaired: entries.length - pairCount * 2 }
  };
}
