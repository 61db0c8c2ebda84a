import { join } from 'node:path';
import type { ScrapeConfig } from './config/scrape.js';
import { discoverClubs } from './discover.js';
import { EtlError, ExtractionError, FetchError, WriteError } from './errors.js';
import { extract } from './extract.js';
import { PageFetcher, type FetchLike } from './fetch.js';
import { JobCancelledError, WorkQueue } from './lib/pool.js';
import type { Clock } from './lib/rateLimiter.js';
import { writeSeasonDataset } from './load.js';
import { reconcile } from './reconcile.js';
import { normalizePage, type NormalizedPage } from './transform.js';
import type { ClubRef, LeagueConfig, PageJob, RawPage, RawRow, ScrapedTransfer, TransferWindow } from './types/index.js';
import { writeText } from './utils/fs.js';
import { log } from './utils/log.js';
import { RunReport, type DroppedRow, type PageRef, type SeasonReport, type RunSummary } from './utils/runReport.js';

export interface PipelineOptions {
  config: ScrapeConfig;
  leagues: LeagueConfig[];
  seasons: number[];
  windows: TransferWindow[];
  fetchImpl?: FetchLike;
  clock?: Clock;
  signal?: AbortSignal;
  schemaDir?: string;
}

export interface PipelineResult {
  summary: RunSummary;
  aborted: number;
  cancelled: boolean;
}

type PageOutcome =
  | { kind: 'ok'; page: NormalizedPage; fromCache: boolean }
  | { kind: 'quarantined'; error: ExtractionError; file: string };

function isCancellation(error: unknown): boolean {
  return error instanceof JobCancelledError || (error instanceof FetchError && error.code === 'CANCELLED');
}

function pageRef(job: PageJob, url?: string): PageRef {
  return {
    league: job.league.slug,
    season: job.season,
    window: job.window,
    club: job.club.name,
    clubId: job.club.id,
    url
  };
}

function errorCode(error: unknown): string {
  if (error instanceof EtlError) return error.code;
  return error instanceof Error ? error.name : 'UNKNOWN';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

class SeasonRun {
  constructor(
    private readonly options: PipelineOptions,
    private readonly fetcher: PageFetcher,
    private readonly queue: WorkQueue,
    private readonly report: RunReport,
    private readonly league: LeagueConfig,
    private readonly season: number
  ) {}

  private get config(): ScrapeConfig {
    return this.options.config;
  }

  private async quarantine(page: RawPage, error: ExtractionError): Promise<string> {
    const { job } = page;
    const file = join(this.config.quarantineDir, job.league.slug, String(job.season), job.window, `${job.club.id}.html`);
    await writeText(file, page.body);
    log.warn('Quarantined page with unrecognized layout', { file, url: page.url, code: error.code });
    return file;
  }

  private async processPage(job: PageJob): Promise<PageOutcome> {
    const page = await this.fetcher.fetch(job);
    let rows: RawRow[];
    try {
      rows = extract(page);
    } catch (error) {
      if (!(error instanceof ExtractionError)) throw error;
      return { kind: 'quarantined', error, file: await this.quarantine(page, error) };
    }
    const normalized = normalizePage(rows, {
      league: job.league,
      season: job.season,
      window: job.window,
      club: job.club,
      url: page.url
    });
    return { kind: 'ok', page: normalized, fromCache: page.fromCache };
  }

  private async discover(): Promise<ClubRef[]> {
    const overview = await this.queue.run(() => this.fetcher.fetchLeagueOverview(this.league, this.season));
    return discoverClubs(overview.body, this.league);
  }

  async run(): Promise<SeasonReport> {
    const seasonLog = log.child({ league: this.league.slug, season: this.season });
    const report: SeasonReport = {
      league: this.league.slug,
      season: this.season,
      status: 'aborted',
      clubs: 0,
      pages: { ok: 0, fromCache: 0, skipped: 0, quarantined: 0, cancelled: 0 },
      pairs: 0
    };

    let clubs: ClubRef[];
    try {
      clubs = await this.discover();
    } catch (error) {
      report.status = isCancellation(error) ? 'cancelled' : 'aborted';
      report.reason = `Club discovery failed: ${errorMessage(error)}`;
      seasonLog.error('Club discovery failed', { error });
      return report;
    }
    report.clubs = clubs.length;
    seasonLog.info('Discovered clubs', { clubs: clubs.length });

    const jobs: PageJob[] = clubs.flatMap((club) =>
      this.options.windows.map((window) => ({ league: this.league, season: this.season, window, club }))
    );

    // Reconciliation waits until every page of the season has settled.
    const settled = await Promise.allSettled(jobs.map((job) => this.queue.run(() => this.processPage(job))));

    const transfers: ScrapedTransfer[] = [];
    const dropped: DroppedRow[] = [];
    for (const [index, result] of settled.entries()) {
      const job = jobs[index];
      if (result.status === 'rejected') {
        if (isCancellation(result.reason)) {
          report.pages.cancelled++;
          continue;
        }
        report.pages.skipped++;
        const url = result.reason instanceof FetchError ? result.reason.url : undefined;
        this.report.recordSkippedPage({
          ...pageRef(job, url),
          code: errorCode(result.reason),
          message: errorMessage(result.reason)
        });
        seasonLog.warn('Skipped club page', { club: job.club.name, window: job.window, error: result.reason });
        continue;
      }

      const outcome = result.value;
      if (outcome.kind === 'quarantined') {
        report.pages.quarantined++;
        this.report.recordQuarantine({ ...pageRef(job), file: outcome.file, code: outcome.error.code });
        continue;
      }

      report.pages.ok++;
      if (outcome.fromCache) report.pages.fromCache++;
      transfers.push(...outcome.page.transfers);
      for (const { error, row } of outcome.page.failures) {
        dropped.push({
          ...pageRef(job),
          code: error.code,
          field: error.field,
          value: error.value,
          rowIndex: row.index
        });
      }
    }
    if (dropped.length) {
      this.report.recordDroppedRows(dropped);
      seasonLog.warn('Dropped rows that failed normalization', { rows: dropped.length });
    }

    if (report.pages.cancelled && !this.config.force) {
      report.status = 'cancelled';
      report.reason = `${report.pages.cancelled} page(s) were not attempted`;
      seasonLog.warn('Season incomplete after cancellation, not writing', { cancelled: report.pages.cancelled });
      return report;
    }

    if (jobs.length && report.pages.skipped === jobs.length) {
      report.reason = 'Every club page failed to fetch';
      seasonLog.error('Every club page failed to fetch', { pages: jobs.length });
      return report;
    }

    const reconciled = reconcile(transfers);
    report.pairs = reconciled.stats.pairs;
    this.report.recordConflicts(reconciled.conflicts);
    seasonLog.info('Reconciled season', { ...reconciled.stats, conflicts: reconciled.conflicts.length });

    try {
      const written = await writeSeasonDataset(
        this.league.slug,
        this.season,
        reconciled.transfers.map((transfer) => transfer.record),
        { outputDir: this.config.outputDir, schemaDir: this.options.schemaDir }
      );
      report.status = written.unchanged ? 'unchanged' : 'written';
      report.file = written.file;
      report.rows = written.rows;
      report.diff = written.diff;
    } catch (error) {
      if (!(error instanceof WriteError)) throw error;
      report.reason = error.message;
      report.file = error.file;
      seasonLog.error('Season dataset not written', { error });
    }
    return report;
  }
}

/**
 * Scrapes every (league, season) and writes one dataset per pair. Page and
 * row failures are recorded in the run report; a season is only lost to a
 * write failure, a total fetch failure or cancellation.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const { config, signal } = options;
  const fetcher = new PageFetcher(config, { fetchImpl: options.fetchImpl, clock: options.clock, signal });
  const queue = new WorkQueue(config.concurrency, signal);
  const report = new RunReport(config.reportFile);

  report.start({
    leagues: options.leagues.map((league) => league.slug),
    seasons: options.seasons,
    windows: options.windows,
    offline: config.offline
  });

  try {
    const seasons = await Promise.all(
      options.leagues.flatMap((league) =>
        options.seasons.map((season) => new SeasonRun(options, fetcher, queue, report, league, season).run())
      )
    );
    for (const season of seasons) report.recordSeason(season);
    report.updateStats({
      pages_ok: seasons.reduce((sum, season) => sum + season.pages.ok, 0),
      pages_from_cache: seasons.reduce((sum, season) => sum + season.pages.fromCache, 0),
      rows_written: seasons.reduce((sum, season) => sum + (season.rows ?? 0), 0)
    });

    const cancelled = Boolean(signal?.aborted);
    const summary = await report.finishSuccess(cancelled);
    return {
      summary,
      aborted: seasons.filter((season) => season.status === 'aborted').length,
      cancelled
    };
  } catch (error) {
    await report.finishFail(error);
    throw error;
  }
}
