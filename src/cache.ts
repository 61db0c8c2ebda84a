import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { listFiles, pathExists, writeFileAtomic } from './utils/fs.js';
import type { LeagueConfig, PageJob } from './types/index.js';

export interface PageCache {
  read(key: string): Promise<string | undefined>;
  write(key: string, body: string): Promise<void>;
}

export function clubPageKey(job: PageJob): string {
  return `${job.league.slug}/${job.season}/${job.window}/${job.club.id}.html`;
}

export function leagueOverviewKey(league: LeagueConfig, season: number): string {
  return `${league.slug}/${season}/clubs.html`;
}

/** Raw page bodies under `{dir}/{league}/{season}/...`, replayable in offline mode. */
export class FilePageCache implements PageCache {
  constructor(readonly dir: string) {}

  async read(key: string): Promise<string | undefined> {
    const file = join(this.dir, key);
    if (!(await pathExists(file))) return undefined;
    return readFile(file, 'utf8');
  }

  async write(key: string, body: string): Promise<void> {
    await writeFileAtomic(join(this.dir, key), body);
  }

  async keys(league?: string): Promise<string[]> {
    return listFiles(this.dir, [league ? `${league}/**/*.html` : '**/*.html']);
  }
}
