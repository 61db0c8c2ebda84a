import { FilePageCache, clubPageKey, leagueOverviewKey, type PageCache } from './cache.js';
import type { ScrapeConfig } from './config/scrape.js';
import { FetchError } from './errors.js';
import { JobCancelledError, WorkQueue } from './lib/pool.js';
import { HostRateLimiter, systemClock, type Clock } from './lib/rateLimiter.js';
import { clubTransfersUrl, leagueOverviewUrl } from './lib/urls.js';
import type { FetchedDocument, LeagueConfig, PageJob, RawPage } from './types/index.js';
import { log } from './utils/log.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface PageFetcherOptions {
  fetchImpl?: FetchLike;
  clock?: Clock;
  /** Source of jitter in [0, 1). */
  random?: () => number;
  limiter?: HostRateLimiter;
  cache?: PageCache;
  /** Stops new attempts; requests already sent finish or time out. */
  signal?: AbortSignal;
}

interface HttpResult {
  status: number;
  retryAfter: string | null;
  body: string;
}

type AttemptOutcome =
  | { ok: true; result: HttpResult }
  | { ok: false; status?: number; reason: string; error?: unknown; cooldownMs?: number };

/**
 * Parses a `Retry-After` header (delta seconds or an HTTP date) into
 * milliseconds from `now`.
 */
export function parseRetryAfter(value: string | null, now: number): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1_000;
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

function isCompleteDocument(body: string): boolean {
  return /<\/html>\s*$/i.test(body);
}

export class PageFetcher {
  private readonly fetchImpl: FetchLike;

  private readonly clock: Clock;

  private readonly random: () => number;

  private readonly limiter: HostRateLimiter;

  private readonly inFlight: WorkQueue;

  private readonly cache?: PageCache;

  private readonly signal?: AbortSignal;

  private requestCount = 0;

  constructor(
    private readonly config: ScrapeConfig,
    options: PageFetcherOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.limiter = options.limiter ?? new HostRateLimiter(config.minRequestIntervalMs, this.clock);
    this.inFlight = new WorkQueue(config.maxInFlight, options.signal);
    this.cache = options.cache ?? (config.cacheDir ? new FilePageCache(config.cacheDir) : undefined);
    this.signal = options.signal;

    if (config.offline && !this.cache) {
      throw new Error('Offline mode needs a page cache; set CACHE_DIR or --cache-dir.');
    }
  }

  async fetch(job: PageJob): Promise<RawPage> {
    const url = clubTransfersUrl(this.config.baseUrl, job);
    const document = await this.load(url, clubPageKey(job));
    return { ...document, job };
  }

  async fetchLeagueOverview(league: LeagueConfig, season: number): Promise<FetchedDocument> {
    const url = leagueOverviewUrl(this.config.baseUrl, league, season);
    return this.load(url, leagueOverviewKey(league, season));
  }

  private async load(url: string, cacheKey: string): Promise<FetchedDocument> {
    const host = new URL(url).host;

    if (this.config.offline) {
      const cached = await this.cache?.read(cacheKey);
      if (cached === undefined) {
        throw new FetchError('Page is not in the cache', {
          code: 'CACHE_MISS',
          url,
          attempts: 0,
          retryable: false,
          details: { cacheKey }
        });
      }
      return { url, host, status: 200, body: cached, fromCache: true };
    }

    const result = await this.fetchWithRetry(url, host);
    if (this.cache) {
      await this.cache.write(cacheKey, result.body);
    }
    return { url, host, status: result.status, body: result.body, fromCache: false };
  }

  private async fetchWithRetry(url: string, host: string): Promise<HttpResult> {
    let lastFailure: Extract<AttemptOutcome, { ok: false }> | undefined;

    for (let attempt = 0; attempt < this.config.maxAttempts; attempt++) {
      this.throwIfCancelled(url, attempt);

      const outcome = await this.attempt(url, host, attempt);
      if (outcome.ok) return outcome.result;
      lastFailure = outcome;

      if (outcome.cooldownMs !== undefined) {
        this.limiter.suspend(host, outcome.cooldownMs);
        log.warn('Rate limited, cooling down host', { url, host, attempt, cooldownMs: outcome.cooldownMs });
      }
      if (attempt + 1 >= this.config.maxAttempts) break;
      // The limiter holds the host for the cooldown; no extra backoff.
      if (outcome.cooldownMs !== undefined) continue;

      const delayMs = this.computeDelayMs(attempt);
      log.warn('Transient fetch failure, retrying', {
        url,
        attempt,
        status: outcome.status,
        reason: outcome.reason,
        delayMs
      });
      try {
        await this.clock.sleep(delayMs, this.signal);
      } catch (error) {
        throw this.cancelled(url, attempt + 1, error);
      }
    }

    throw new FetchError('Failed to fetch page after retries', {
      code: 'MAX_RETRIES_EXCEEDED',
      url,
      status: lastFailure?.status,
      attempts: this.config.maxAttempts,
      retryable: true,
      details: { reason: lastFailure?.reason },
      cause: lastFailure?.error
    });
  }

  private async attempt(url: string, host: string, attempt: number): Promise<AttemptOutcome> {
    let result: HttpResult;
    try {
      result = await this.inFlight.run(async () => {
        await this.limiter.acquire(host, this.signal);
        return this.request(url);
      });
    } catch (error) {
      if (error instanceof JobCancelledError || this.signal?.aborted) {
        throw this.cancelled(url, attempt, error);
      }
      return { ok: false, reason: 'network', error };
    }

    const { status } = result;
    if (status === 429) {
      const cooldownMs = parseRetryAfter(result.retryAfter, this.clock.now()) ?? this.config.rateLimitCooldownMs;
      return { ok: false, status, reason: 'rate_limited', cooldownMs };
    }
    if (status >= 500) {
      return { ok: false, status, reason: 'server_error' };
    }
    if (status >= 400) {
      throw new FetchError(`Request failed with status ${status}`, {
        code: 'HTTP_ERROR',
        url,
        status,
        attempts: attempt + 1,
        retryable: false
      });
    }
    if (!isCompleteDocument(result.body)) {
      return { ok: false, status, reason: 'truncated_body' };
    }
    return { ok: true, result };
  }

  private async request(url: string): Promise<HttpResult> {
    const userAgents = this.config.userAgents;
    const userAgent = userAgents[this.requestCount++ % userAgents.length];
    const response = await this.fetchImpl(url, {
      method: 'GET',
      headers: {
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-US,en;q=0.9',
        'User-Agent': userAgent
      },
      redirect: 'follow',
      signal: AbortSignal.timeout(this.config.requestTimeoutMs)
    });
    return {
      status: response.status,
      retryAfter: response.headers.get('retry-after'),
      body: await response.text()
    };
  }

  private computeDelayMs(attempt: number): number {
    const exponentialDelay = Math.min(
      this.config.maxRetryDelayMs,
      this.config.initialRetryDelayMs * 2 ** attempt
    );
    const jitter = exponentialDelay * this.config.jitterRatio * this.random();
    return Math.round(exponentialDelay + jitter);
  }

  private throwIfCancelled(url: string, attempts: number) {
    if (this.signal?.aborted) throw this.cancelled(url, attempts, this.signal.reason);
  }

  private cancelled(url: string, attempts: number, cause: unknown): FetchError {
    return new FetchError('Fetch cancelled', { code: 'CANCELLED', url, attempts, retryable: false, cause });
  }
}
