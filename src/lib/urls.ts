import type { LeagueConfig, PageJob, TransferWindow } from '../types/index.js';

// Query keys are the site's own (German) names.
const WINDOW_CODES: Record<TransferWindow, string> = { summer: 's', winter: 'w' };

function query(params: Record<string, string | number>): string {
  return Object.entries(params)
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`)
    .join('&');
}

/** Club transfers page with loans included and internal (youth/reserve) moves excluded. */
export function clubTransfersUrl(baseUrl: string, job: PageJob): string {
  const path = `${job.club.slug}/transfers/verein/${job.club.id}/plus/`;
  return `${baseUrl}/${path}?${query({
    saison_id: job.season,
    s_w: WINDOW_CODES[job.window],
    leihe: 3,
    intern: 0
  })}`;
}

export function leagueOverviewUrl(baseUrl: string, league: LeagueConfig, season: number): string {
  return `${baseUrl}/${league.slug}/startseite/wettbewerb/${league.code}/plus/?${query({ saison_id: season })}`;
}

export function parseWindow(value: string): TransferWindow | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === 's' || normalized === 'summer') return 'summer';
  if (normalized === 'w' || normalized === 'winter') return 'winter';
  return undefined;
}
