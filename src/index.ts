#!/usr/bin/env node
import 'dotenv/config';
import { parseCliArgs, resolveCliOptions } from './cli.js';
import { loadLeagues, selectLeagues } from './config/leagues.js';
import { loadScrapeConfig } from './config/scrape.js';
import { runPipeline } from './pipeline.js';
import { log } from './utils/log.js';

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception', { error });
  process.exit(1);
});

const USAGE = `Usage: transfers-etl [options]

  --league <slug|code|slug:CODE>   league to scrape (repeatable, default: all configured)
  --season <year|from-to>          season start year or range (repeatable, default: current)
  --window <summer|winter|s|w>     transfer window (repeatable, default: both)
  --data-root <dir>                root for datasets, reports and quarantine (DATA_ROOT)
  --output-dir <dir>               dataset directory (OUTPUT_DIR)
  --cache-dir <dir>                raw page cache (CACHE_DIR)
  --offline                        replay pages from the cache only (OFFLINE)
  --force                          write seasons left incomplete by cancellation (FORCE_WRITE)
  --concurrency <n>                page jobs run at once (SCRAPE_CONCURRENCY)
  --min-delay-ms <ms>              minimum delay between requests per host (SCRAPE_MIN_DELAY_MS)
  --max-attempts <n>               attempts per page (SCRAPE_MAX_ATTEMPTS)
`;

async function main() {
  const options = resolveCliOptions(parseCliArgs(process.argv.slice(2)), process.env);
  if (options.help) {
    process.stdout.write(USAGE);
    return;
  }

  const config = loadScrapeConfig(options.overrides);
  const leagues = selectLeagues(await loadLeagues(), options.leagues);

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      log.warn('Second signal received, exiting immediately', { signal });
      process.exit(130);
    }
    log.warn('Signal received, finishing in-flight requests', { signal });
    controller.abort(new Error(`Received ${signal}`));
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    log.info('Starting scrape', {
      leagues: leagues.map((league) => league.slug),
      seasons: options.seasons,
      windows: options.windows,
      outputDir: config.outputDir,
      offline: config.offline
    });
    const result = await runPipeline({
      config,
      leagues,
      seasons: options.seasons,
      windows: options.windows,
      signal: controller.signal
    });
    if (result.aborted || result.cancelled) {
      process.exitCode = 1;
    }
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

main().catch((error) => {
  log.error('Scrape failed', { error });
  process.exitCode = 1;
});
