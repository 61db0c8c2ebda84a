export type TransferWindow = 'summer' | 'winter';
export type Movement = 'in' | 'out';

/** One row of the published dataset. Field order matches the CSV columns. */
export interface TransferRecord {
  season: number;
  league: string;
  club: string;
  window: TransferWindow;
  movement: Movement;
  player_name: string;
  player_id: string;
  age: number;
  nationality: string;
  position: string;
  pos: string;
  market_value: number | null;
  dealing_club: string;
  dealing_country: string;
  fee: number | null;
  is_loan: boolean;
}

export const TRANSFER_COLUMNS = [
  'season',
  'league',
  'club',
  'window',
  'movement',
  'player_name',
  'player_id',
  'age',
  'nationality',
  'position',
  'pos',
  'market_value',
  'dealing_club',
  'dealing_country',
  'fee',
  'is_loan'
] as const satisfies readonly (keyof TransferRecord)[];

export type TransferColumn = (typeof TRANSFER_COLUMNS)[number];

/**
 * Identity carried next to a record through reconciliation. Never serialized.
 */
export interface TransferSource {
  clubId: string;
  dealingClubId?: string;
  transferId?: string;
  date?: string;
  /** Position of the row on its page, used as the last pairing tie-break. */
  rowIndex: number;
  url: string;
}

export interface ScrapedTransfer {
  record: TransferRecord;
  source: TransferSource;
}
