#!/usr/bin/env tsx
import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { basename, relative } from 'node:path';
import { FilePageCache } from '../src/cache.js';
import { getStringArg, parseCliArgs, resolveBooleanFlag } from '../src/cli.js';
import { extract } from '../src/extract.js';
import { formatEuros } from '../src/lib/currency.js';
import { parseWindow } from '../src/lib/urls.js';
import { normalize } from '../src/transform.js';
import type { PageJob } from '../src/types/index.js';
import { log } from '../src/utils/log.js';

// Prints what the extractor and normalizer make of a cached or quarantined page.
// Usage:
//   tsx scripts/inspect_page.ts --list --cache-dir data/cache [--league premier-league]
//   tsx scripts/inspect_page.ts --file data/cache/premier-league/2024/summer/11.html [--club-name "Arsenal FC"] [--raw]

// ASSUMPTION: inspected files keep the `{league}/{season}/{window}/{clubId}.html` layout of the cache and quarantine dirs.
function jobFromPath(file: string, clubName: string | undefined): PageJob {
  const parts = file.split(/[\\/]/);
  const clubId = basename(file, '.html');
  const window = parseWindow(parts[parts.length - 2] ?? '') ?? 'summer';
  const season = Number(parts[parts.length - 3]);
  const league = parts[parts.length - 4] ?? 'unknown';
  return {
    league: { slug: league, code: '', name: league, country: '' },
    season: Number.isInteger(season) ? season : new Date().getUTCFullYear(),
    window,
    club: { id: clubId, name: clubName ?? `club ${clubId}`, slug: '' }
  };
}

async function listCached(cacheDir: string, league: string | undefined) {
  const cache = new FilePageCache(cacheDir);
  const keys = await cache.keys(league);
  for (const key of keys) {
    process.stdout.write(`${key}\n`);
  }
  log.info('Cached pages listed', { cacheDir: relative(process.cwd(), cacheDir) || '.', count: keys.length });
}

async function inspect(file: string, clubName: string | undefined, raw: boolean) {
  const job = jobFromPath(file, clubName);
  const body = await readFile(file, 'utf8');
  const rows = extract({ job, url: file, host: 'file', status: 200, body, fromCache: true });

  let failures = 0;
  for (const row of rows) {
    if (raw) {
      process.stdout.write(`${JSON.stringify(row)}\n`);
    }
    const result = normalize(row, { ...job, url: file });
    if (result.ok) {
      const { record } = result;
      const fee = record.is_loan ? `${formatEuros(record.fee)} (loan)` : formatEuros(record.fee);
      process.stdout.write(
        `${record.movement.padEnd(3)} ${record.player_name} [${record.player_id}] ${record.pos} ` +
          `${record.dealing_club} ${fee} mv ${formatEuros(record.market_value)}\n`
      );
    } else {
      failures++;
      process.stdout.write(`!!  row ${row.index}: ${result.error.code} ${result.error.field}="${result.error.value}"\n`);
    }
  }

  log.info('Page inspected', { file, rows: rows.length, failures });
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  if (resolveBooleanFlag(args.list, false)) {
    const cacheDir = getStringArg(args, 'cache-dir') ?? process.env.CACHE_DIR;
    if (!cacheDir) throw new Error('--list needs --cache-dir or CACHE_DIR.');
    await listCached(cacheDir, getStringArg(args, 'league'));
    return;
  }

  const file = getStringArg(args, 'file');
  if (!file) throw new Error('Specify --file <page.html> or --list.');
  await inspect(file, getStringArg(args, 'club-name'), resolveBooleanFlag(args.raw, false) ?? false);
}

main().catch((error) => {
  log.error('Page inspection failed', { error });
  process.exitCode = 1;
});
