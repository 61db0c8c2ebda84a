import { load } from 'cheerio';
import { ExtractionError } from './errors.js';
import { canonicalText } from './lib/canon.js';
import type { ClubRef, LeagueConfig } from './types/index.js';

const CLUB_HREF = /^(?:https?:\/\/[^/]+)?\/([^/?#]+)\/startseite\/verein\/(\d+)/;

/**
 * Lists the clubs of a league overview page in page order. The crest link
 * comes first and carries the full name in its title; the text link is the
 * fallback.
 */
export function discoverClubs(html: string, league: LeagueConfig): ClubRef[] {
  const $ = load(html);
  const $tables = $('table.items');
  if (!$tables.length) {
    throw new ExtractionError('No club table on league overview', {
      code: 'CLUB_TABLE_NOT_FOUND',
      details: { league: league.slug }
    });
  }

  const clubs = new Map<string, ClubRef>();
  $tables.find('tbody tr a[href]').each((_, anchor) => {
    const $anchor = $(anchor);
    const match = CLUB_HREF.exec($anchor.attr('href') ?? '');
    if (!match) return;
    const [, slug, id] = match;
    if (clubs.has(id)) return;
    const name = canonicalText($anchor.attr('title')) || canonicalText($anchor.text());
    if (!name) return;
    clubs.set(id, { id, name, slug });
  });

  if (!clubs.size) {
    throw new ExtractionError('League overview lists no clubs', {
      code: 'CLUB_TABLE_NOT_FOUND',
      details: { league: league.slug }
    });
  }
  return [...clubs.values()];
}
