import { readFileSync } from 'node:fs';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Clock } from '../lib/rateLimiter.js';
import type {
  ClubRef,
  LeagueConfig,
  PageJob,
  RawPage,
  ScrapedTransfer,
  TransferRecord,
  TransferSource,
  TransferWindow
} from '../types/index.js';

export function readFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}

export const schemaDir = fileURLToPath(new URL('../../schemas', import.meta.url));

export function tempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'transfers-etl-'));
}

export const testLeague: LeagueConfig = {
  slug: 'test-league',
  code: 'TL1',
  name: 'Test League',
  country: 'England'
};

export const northbridge: ClubRef = { id: '101', name: 'Northbridge FC', slug: 'northbridge-fc' };
export const eastvale: ClubRef = { id: '303', name: 'Eastvale United', slug: 'eastvale-united' };

export function makeJob(club: ClubRef, window: TransferWindow = 'summer', season = 2024): PageJob {
  return { league: testLeague, season, window, club };
}

export function rawPage(job: PageJob, body: string): RawPage {
  return {
    job,
    url: `https://tm.test/${job.club.slug}/transfers/verein/${job.club.id}/plus/`,
    host: 'tm.test',
    status: 200,
    body,
    fromCache: false
  };
}

export function makeRecord(overrides: Partial<TransferRecord> = {}): TransferRecord {
  return {
    season: 2024,
    league: 'test-league',
    club: 'Northbridge FC',
    window: 'summer',
    movement: 'in',
    player_name: 'Test Player',
    player_id: '1',
    age: 25,
    nationality: 'England',
    position: 'Central Midfield',
    pos: 'CM',
    market_value: 1_000_000,
    dealing_club: 'Harbor City',
    dealing_country: 'England',
    fee: null,
    is_loan: false,
    ...overrides
  };
}

export function makeTransfer(
  record: Partial<TransferRecord>,
  source: Partial<TransferSource> & { clubId: string }
): ScrapedTransfer {
  return {
    record: makeRecord(record),
    source: { rowIndex: 0, url: 'https://tm.test/page', ...source }
  };
}

/** Clock whose sleeps return at once and advance time by the requested amount. */
export class ManualClock implements Clock {
  time = 0;

  readonly sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}
