import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it } from 'vitest';
import { loadLeagues, selectLeagues } from '../leagues.js';
import { loadScrapeConfig } from '../scrape.js';
import { tempDir } from '../../__tests__/helpers.js';

const LEAGUES_FILE = fileURLToPath(new URL('../../../config/leagues.json', import.meta.url));

describe('loadScrapeConfig', () => {
  it('uses polite defaults under ./data', () => {
    const config = loadScrapeConfig({}, {});

    expect(config).toMatchObject({
      baseUrl: 'https://www.transfermarkt.com',
      dataRoot: './data',
      outputDir: join('data', 'transfers'),
      quarantineDir: join('data', 'quarantine'),
      reportFile: join('data', 'reports', 'last-run.json'),
      offline: false,
      force: false,
      concurrency: 4,
      maxInFlight: 2,
      minRequestIntervalMs: 3_000,
      maxAttempts: 4
    });
    expect(config.cacheDir).toBeUndefined();
    expect(config.userAgents).toHaveLength(3);
  });

  it('reads the environment', () => {
    const config = loadScrapeConfig(
      {},
      {
        TM_BASE_URL: 'https://tm.test/',
        DATA_ROOT: '/srv/etl',
        CACHE_DIR: '/srv/cache',
        OFFLINE: 'yes',
        SCRAPE_CONCURRENCY: '8',
        SCRAPE_USER_AGENTS: 'ua-1|ua-2'
      }
    );

    expect(config).toMatchObject({
      baseUrl: 'https://tm.test',
      outputDir: join('/srv/etl', 'transfers'),
      cacheDir: '/srv/cache',
      offline: true,
      concurrency: 8,
      userAgents: ['ua-1', 'ua-2']
    });
    expect(loadScrapeConfig({}, { SCRAPE_USER_AGENTS: '["ua-a", "ua-b"]' }).userAgents).toEqual(['ua-a', 'ua-b']);
  });

  it('falls back to defaults for unparseable values', () => {
    const config = loadScrapeConfig(
      {},
      { SCRAPE_CONCURRENCY: '0', SCRAPE_JITTER_RATIO: '2', SCRAPE_MAX_ATTEMPTS: '2.5', OFFLINE: 'maybe' }
    );

    expect(config).toMatchObject({ concurrency: 4, jitterRatio: 0.3, maxAttempts: 4, offline: false });
  });

  it('lets overrides win over the environment', () => {
    const config = loadScrapeConfig({ concurrency: 1, outputDir: '/out' }, { SCRAPE_CONCURRENCY: '8', OUTPUT_DIR: '/env-out' });
    expect(config.concurrency).toBe(1);
    expect(config.outputDir).toBe('/out');
  });
});

describe('leagues', () => {
  const dirs: string[] = [];

  afterEach(async () => {
    await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  it('loads the configured leagues', async () => {
    const leagues = await loadLeagues(LEAGUES_FILE);
    expect(leagues[0]).toEqual({ slug: 'premier-league', code: 'GB1', name: 'Premier League', country: 'England' });
  });

  it('rejects incomplete entries', async () => {
    const dir = await tempDir();
    dirs.push(dir);
    const file = join(dir, 'leagues.json');
    await writeFile(file, JSON.stringify([{ slug: 'test-league', code: 'TL1' }]), 'utf8');

    await expect(loadLeagues(file)).rejects.toThrow(/index 0/);
  });

  it('selects by slug or code and accepts ad-hoc leagues', async () => {
    const all = await loadLeagues(LEAGUES_FILE);

    expect(selectLeagues(all, [])).toBe(all);
    expect(selectLeagues(all, ['gb1', 'premier-league', 'laliga']).map((league) => league.slug)).toEqual([
      'premier-league',
      'laliga'
    ]);
    expect(selectLeagues(all, ['test-league:tl1'])).toEqual([
      { slug: 'test-league', code: 'TL1', name: 'test-league', country: '' }
    ]);
    expect(() => selectLeagues(all, ['nowhere'])).toThrow(/Unknown league/);
  });

  it('lowercases the slug of an ad-hoc league', async () => {
    const all = await loadLeagues(LEAGUES_FILE);

    expect(selectLeagues(all, ['Second-Division:xx2'])).toEqual([
      { slug: 'second-division', code: 'XX2', name: 'second-division', country: '' }
    ]);
  });
});
