import type { DatasetDiffSummary } from '../diffs.js';
import type { ReconciliationConflict } from '../reconcile.js';
import type { TransferWindow } from '../types/index.js';
import { serializeError, log } from './log.js';
import { writeJson } from './fs.js';

export type RunState = 'running' | 'success' | 'partial' | 'cancelled' | 'failed';

export type SeasonStatus = 'written' | 'unchanged' | 'aborted' | 'cancelled';

export interface PageRef {
  league: string;
  season: number;
  window: TransferWindow;
  club: string;
  clubId: string;
  url?: string;
}

export interface SkippedPage extends PageRef {
  code: string;
  message: string;
}

export interface QuarantinedPage extends PageRef {
  file: string;
  code: string;
}

export interface DroppedRow extends PageRef {
  code: string;
  field: string;
  value: string;
  rowIndex: number;
}

export interface SeasonReport {
  league: string;
  season: number;
  status: SeasonStatus;
  reason?: string;
  file?: string;
  rows?: number;
  diff?: DatasetDiffSummary;
  clubs: number;
  pages: { ok: number; fromCache: number; skipped: number; quarantined: number; cancelled: number };
  pairs: number;
}

export interface RunSummary {
  state: RunState;
  started_at: string;
  finished_at?: string;
  stats: Record<string, unknown>;
  seasons: SeasonReport[];
  skipped_pages: SkippedPage[];
  quarantined_pages: QuarantinedPage[];
  dropped_rows: DroppedRow[];
  conflicts: ReconciliationConflict[];
  error?: Record<string, unknown>;
}

function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Collects what a run skipped, dropped and resolved, and writes it to the
 * report file when the run ends.
 */
export class RunReport {
  private summary?: RunSummary;

  constructor(readonly file: string) {}

  private current(): RunSummary {
    if (!this.summary) {
      throw new Error('Run report used before start()');
    }
    return this.summary;
  }

  start(extra: Record<string, unknown> = {}): void {
    if (this.summary) return;
    this.summary = {
      state: 'running',
      started_at: nowIso(),
      stats: { ...extra },
      seasons: [],
      skipped_pages: [],
      quarantined_pages: [],
      dropped_rows: [],
      conflicts: []
    };
    log.info('Scrape run started', extra);
  }

  updateStats(partial: Record<string, unknown>): void {
    Object.assign(this.current().stats, partial);
  }

  recordSeason(season: SeasonReport): void {
    this.current().seasons.push(season);
  }

  recordSkippedPage(page: SkippedPage): void {
    this.current().skipped_pages.push(page);
  }

  recordQuarantine(page: QuarantinedPage): void {
    this.current().quarantined_pages.push(page);
  }

  recordDroppedRows(rows: DroppedRow[]): void {
    this.current().dropped_rows.push(...rows);
  }

  recordConflicts(conflicts: ReconciliationConflict[]): void {
    this.current().conflicts.push(...conflicts);
  }

  async finishSuccess(cancelled = false): Promise<RunSummary> {
    const summary = this.current();
    const aborted = summary.seasons.some((season) => season.status === 'aborted');
    summary.state = cancelled ? 'cancelled' : aborted ? 'partial' : 'success';
    summary.finished_at = nowIso();
    await writeJson(this.file, summary);
    log.info('Scrape run finished', {
      state: summary.state,
      report: this.file,
      seasons: summary.seasons.length,
      skippedPages: summary.skipped_pages.length,
      quarantinedPages: summary.quarantined_pages.length,
      droppedRows: summary.dropped_rows.length,
      conflicts: summary.conflicts.length
    });
    return summary;
  }

  async finishFail(error: unknown): Promise<RunSummary> {
    const summary = this.current();
    summary.state = 'failed';
    summary.error = serializeError(error);
    summary.finished_at = nowIso();
    await writeJson(this.file, summary);
    log.error('Scrape run failed', { report: this.file, error });
    return summary;
  }
}
