import type { Movement, TransferWindow } from './transfer.js';

export interface LeagueConfig {
  /** URL slug, also the output directory name, e.g. `premier-league`. */
  slug: string;
  /** Competition code, e.g. `GB1`. */
  code: string;
  name: string;
  country: string;
}

export interface ClubRef {
  id: string;
  name: string;
  slug: string;
}

export interface PageJob {
  league: LeagueConfig;
  season: number;
  window: TransferWindow;
  club: ClubRef;
}

/** A fetched HTML document, live or replayed from the page cache. */
export interface FetchedDocument {
  url: string;
  host: string;
  status: number;
  body: string;
  fromCache: boolean;
}

export interface RawPage extends FetchedDocument {
  job: PageJob;
}

/**
 * Untyped row of a transfer table, keyed by the page's own column labels.
 * Missing cells are empty strings, never absent keys.
 */
export interface RawRow {
  movement: Movement;
  index: number;
  cells: Record<string, string>;
}

export interface NormalizeContext {
  league: LeagueConfig;
  season: number;
  window: TransferWindow;
  club: ClubRef;
  url: string;
}
