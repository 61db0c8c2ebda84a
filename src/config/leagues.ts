import { join } from 'node:path';
import { readJson } from '../utils/fs.js';
import type { LeagueConfig } from '../types/index.js';

const DEFAULT_LEAGUES_FILE = join(process.cwd(), 'config', 'leagues.json');

function isLeagueConfig(value: unknown): value is LeagueConfig {
  if (!value || typeof value !== 'object') return false;
  const candidate: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return ['slug', 'code', 'name', 'country'].every(
    (key) => typeof candidate[key] === 'string' && String(candidate[key]).trim() !== ''
  );
}

export async function loadLeagues(file: string = DEFAULT_LEAGUES_FILE): Promise<LeagueConfig[]> {
  const raw = await readJson<unknown>(file);
  if (!Array.isArray(raw)) {
    throw new Error(`Expected ${file} to contain an array of leagues.`);
  }
  const leagues: LeagueConfig[] = [];
  for (const [index, entry] of raw.entries()) {
    if (!isLeagueConfig(entry)) {
      throw new Error(`Invalid league entry at index ${index} in ${file}.`);
    }
    leagues.push(entry);
  }
  return leagues;
}

/**
 * Resolves CLI league selectors against the configured list. A selector is a
 * slug (`premier-league`), a code (`GB1`) or an ad-hoc `slug:CODE` pair.
 */
export function selectLeagues(all: LeagueConfig[], selectors: string[]): LeagueConfig[] {
  if (!selectors.length) return all;
  const selected: LeagueConfig[] = [];
  for (const selector of selectors) {
    const trimmed = selector.trim();
    if (!trimmed) continue;
    const known = all.find(
      (league) => league.slug === trimmed || league.code.toUpperCase() === trimmed.toUpperCase()
    );
    if (known) {
      if (!selected.includes(known)) selected.push(known);
      continue;
    }
    const adHoc = /^([a-z0-9-]+):([A-Z0-9]+)$/i.exec(trimmed);
    if (!adHoc) {
      throw new Error(`Unknown league "${trimmed}". Use a configured slug/code or slug:CODE.`);
    }
    // Slugs are lowercase on the site and in dataset paths.
    const slug = adHoc[1].toLowerCase();
    selected.push({ slug, code: adHoc[2].toUpperCase(), name: slug, country: '' });
  }
  return selected;
}
