import { rm } from 'node:fs/promises';
import { afterEach, describe, expect, it } from 'vitest';
import { FilePageCache } from '../cache.js';
import { loadScrapeConfig, type ScrapeConfig } from '../config/scrape.js';
import { FetchError } from '../errors.js';
import { PageFetcher, parseRetryAfter, type FetchLike } from '../fetch.js';
import { HostRateLimiter } from '../lib/rateLimiter.js';
import { ManualClock, makeJob, northbridge, tempDir, testLeague } from './helpers.js';

const PAGE = '<!DOCTYPE html><html><body><p>ok</p></body></html>\n';

interface Call {
  url: string;
  userAgent: string | null;
}

function scriptedFetch(responses: Array<Response | Error>, calls: Call[] = []): FetchLike {
  return async (input, init) => {
    calls.push({ url: input, userAgent: new Headers(init?.headers).get('user-agent') });
    const next = responses.shift();
    if (!next) throw new Error(`Unexpected request to ${input}`);
    if (next instanceof Error) throw next;
    return next;
  };
}

function testConfig(overrides: Partial<ScrapeConfig> = {}): ScrapeConfig {
  return loadScrapeConfig(
    {
      baseUrl: 'https://tm.test',
      minRequestIntervalMs: 0,
      maxAttempts: 3,
      initialRetryDelayMs: 1_000,
      maxRetryDelayMs: 30_000,
      jitterRatio: 0.5,
      rateLimitCooldownMs: 60_000,
      userAgents: ['ua-1', 'ua-2'],
      ...overrides
    },
    {}
  );
}

async function fetchError(promise: Promise<unknown>): Promise<FetchError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof FetchError) return error;
    throw error;
  }
  throw new Error('Expected the fetch to fail');
}

describe('PageFetcher', () => {
  const dirs: string[] = [];

  afterEach(async () => {
    await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  it('builds the club transfers URL for a window', async () => {
    const calls: Call[] = [];
    const fetcher = new PageFetcher(testConfig(), {
      fetchImpl: scriptedFetch([new Response(PAGE)], calls),
      clock: new ManualClock()
    });

    const page = await fetcher.fetch(makeJob(northbridge, 'winter'));

    expect(page.url).toBe(
      'https://tm.test/northbridge-fc/transfers/verein/101/plus/?saison_id=2024&s_w=w&leihe=3&intern=0'
    );
    expect(page.host).toBe('tm.test');
    expect(page.body).toBe(PAGE);
    expect(page.fromCache).toBe(false);
    expect(calls.map((call) => call.url)).toEqual([page.url]);
  });

  it('retries server errors with exponential backoff and rotates user agents', async () => {
    const clock = new ManualClock();
    const calls: Call[] = [];
    const fetcher = new PageFetcher(testConfig(), {
      fetchImpl: scriptedFetch(
        [new Response('busy', { status: 503 }), new Response('busy', { status: 502 }), new Response(PAGE)],
        calls
      ),
      clock,
      random: () => 0.5
    });

    const page = await fetcher.fetch(makeJob(northbridge));

    expect(page.status).toBe(200);
    // 1000 and 2000 base delays plus 0.5 * 0.5 jitter.
    expect(clock.sleeps).toEqual([1_250, 2_500]);
    expect(calls.map((call) => call.userAgent)).toEqual(['ua-1', 'ua-2', 'ua-1']);
  });

  it('treats a truncated body and a network error as transient', async () => {
    const clock = new ManualClock();
    const fetcher = new PageFetcher(testConfig(), {
      fetchImpl: scriptedFetch([
        new Response('<html><body><table>'),
        new TypeError('fetch failed'),
        new Response(PAGE)
      ]),
      clock,
      random: () => 0
    });

    const page = await fetcher.fetch(makeJob(northbridge));

    expect(page.body).toBe(PAGE);
    expect(clock.sleeps).toEqual([1_000, 2_000]);
  });

  it('does not retry other client errors', async () => {
    const clock = new ManualClock();
    const calls: Call[] = [];
    const fetcher = new PageFetcher(testConfig(), {
      fetchImpl: scriptedFetch([new Response('gone', { status: 404 })], calls),
      clock
    });

    const error = await fetchError(fetcher.fetch(makeJob(northbridge)));

    expect(error.code).toBe('HTTP_ERROR');
    expect(error.status).toBe(404);
    expect(error.attempts).toBe(1);
    expect(error.retryable).toBe(false);
    expect(calls).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('gives up after the last attempt', async () => {
    const clock = new ManualClock();
    const fetcher = new PageFetcher(testConfig(), {
      fetchImpl: scriptedFetch([
        new Response('', { status: 500 }),
        new Response('', { status: 500 }),
        new Response('', { status: 500 })
      ]),
      clock,
      random: () => 0
    });

    const error = await fetchError(fetcher.fetch(makeJob(northbridge)));

    expect(error.code).toBe('MAX_RETRIES_EXCEEDED');
    expect(error.status).toBe(500);
    expect(error.attempts).toBe(3);
    expect(error.retryable).toBe(true);
    expect(clock.sleeps).toEqual([1_000, 2_000]);
  });

  it('waits out Retry-After on a 429 before retrying', async () => {
    const clock = new ManualClock();
    const fetcher = new PageFetcher(testConfig(), {
      fetchImpl: scriptedFetch([
        new Response('slow down', { status: 429, headers: { 'Retry-After': '30' } }),
        new Response(PAGE)
      ]),
      clock
    });

    await fetcher.fetch(makeJob(northbridge));

    expect(clock.sleeps).toEqual([30_000]);
  });

  it('pauses only the rate-limited host', async () => {
    const clock = new ManualClock();
    const limiter = new HostRateLimiter(0, clock);
    const limited = new PageFetcher(testConfig({ baseUrl: 'https://a.test', maxAttempts: 1 }), {
      fetchImpl: scriptedFetch([
        new Response('slow down', { status: 429, headers: { 'Retry-After': '30' } }),
        new Response(PAGE)
      ]),
      clock,
      limiter
    });
    const other = new PageFetcher(testConfig({ baseUrl: 'https://b.test' }), {
      fetchImpl: scriptedFetch([new Response(PAGE)]),
      clock,
      limiter
    });

    const error = await fetchError(limited.fetch(makeJob(northbridge)));
    expect(error.code).toBe('MAX_RETRIES_EXCEEDED');
    expect(error.status).toBe(429);
    expect(limiter.cooldownRemaining('a.test')).toBe(30_000);

    await other.fetch(makeJob(northbridge));
    expect(clock.sleeps).toEqual([]);

    await limited.fetch(makeJob(northbridge));
    expect(clock.sleeps).toEqual([30_000]);
  });

  it('falls back to the configured cooldown without Retry-After', async () => {
    const clock = new ManualClock();
    const fetcher = new PageFetcher(testConfig({ rateLimitCooldownMs: 45_000 }), {
      fetchImpl: scriptedFetch([new Response('', { status: 429 }), new Response(PAGE)]),
      clock
    });

    await fetcher.fetch(makeJob(northbridge));

    expect(clock.sleeps).toEqual([45_000]);
  });

  it('stores fetched pages and replays them offline', async () => {
    const cacheDir = await tempDir();
    dirs.push(cacheDir);
    const job = makeJob(northbridge);

    const online = new PageFetcher(testConfig({ cacheDir }), {
      fetchImpl: scriptedFetch([new Response(PAGE)]),
      clock: new ManualClock()
    });
    await online.fetch(job);

    const offline = new PageFetcher(testConfig({ cacheDir, offline: true }), {
      fetchImpl: scriptedFetch([])
    });
    const replayed = await offline.fetch(job);

    expect(replayed.body).toBe(PAGE);
    expect(replayed.fromCache).toBe(true);
    expect(await new FilePageCache(cacheDir).keys()).toEqual(['test-league/2024/summer/101.html']);

    const miss = await fetchError(offline.fetchLeagueOverview(testLeague, 2024));
    expect(miss.code).toBe('CACHE_MISS');
  });

  it('refuses offline mode without a cache', () => {
    expect(() => new PageFetcher(testConfig({ offline: true }))).toThrow(/cache/);
  });

  it('does not start requests once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const calls: Call[] = [];
    const fetcher = new PageFetcher(testConfig(), {
      fetchImpl: scriptedFetch([new Response(PAGE)], calls),
      clock: new ManualClock(),
      signal: controller.signal
    });

    const error = await fetchError(fetcher.fetch(makeJob(northbridge)));

    expect(error.code).toBe('CANCELLED');
    expect(calls).toHaveLength(0);
  });
});

describe('parseRetryAfter', () => {
  it('reads delta seconds and HTTP dates', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('30', now)).toBe(30_000);
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:30 GMT', now)).toBe(30_000);
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:27:00 GMT', now)).toBe(0);
    expect(parseRetryAfter('soon', now)).toBeUndefined();
    expect(parseRetryAfter(null, now)).toBeUndefined();
  });
});
