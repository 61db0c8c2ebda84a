import { join } from 'node:path';
import { log } from '../utils/log.js';

export interface ScrapeConfig {
  baseUrl: string;
  dataRoot: string;
  outputDir: string;
  /** Raw page cache; unset disables caching. */
  cacheDir?: string;
  quarantineDir: string;
  reportFile: string;
  offline: boolean;
  force: boolean;
  concurrency: number;
  maxInFlight: number;
  minRequestIntervalMs: number;
  maxAttempts: number;
  initialRetryDelayMs: number;
  maxRetryDelayMs: number;
  jitterRatio: number;
  rateLimitCooldownMs: number;
  requestTimeoutMs: number;
  userAgents: string[];
}

const DEFAULT_BASE_URL = 'https://www.transfermarkt.com';

const DEFAULT_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:127.0) Gecko/20100101 Firefox/127.0',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36'
];

function parseBoolean(raw: string | undefined, defaultValue: boolean, name: string): boolean {
  if (!raw) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  log.warn('Unable to parse boolean env flag, falling back to default', {
    name,
    value: raw
  });
  return defaultValue;
}

function parseNumber(
  raw: string | undefined,
  defaultValue: number,
  name: string,
  bounds: { min?: number; max?: number; integer?: boolean } = {}
): number {
  if (raw === undefined || !raw.trim()) return defaultValue;
  const parsed = Number(raw.trim());
  const valid =
    Number.isFinite(parsed) &&
    (!bounds.integer || Number.isInteger(parsed)) &&
    (bounds.min === undefined || parsed >= bounds.min) &&
    (bounds.max === undefined || parsed <= bounds.max);
  if (!valid) {
    log.warn('Unable to parse numeric env value, falling back to default', {
      name,
      value: raw,
      defaultValue
    });
    return defaultValue;
  }
  return parsed;
}

function parseList(raw: string | undefined): string[] {
  if (!raw) return [];
  const trimmed = raw.trim();
  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) {
        return parsed.filter((entry): entry is string => typeof entry === 'string' && entry.trim() !== '');
      }
    } catch (error) {
      log.warn('Failed to parse list env value as JSON array, falling back to newline parsing', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
  return trimmed
    .split(/\n|\|/)
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export function loadScrapeConfig(
  overrides: Partial<ScrapeConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ScrapeConfig {
  const dataRoot = overrides.dataRoot ?? env.DATA_ROOT ?? './data';
  const cacheDir = overrides.cacheDir ?? (env.CACHE_DIR || undefined);
  const userAgents = overrides.userAgents ?? parseList(env.SCRAPE_USER_AGENTS);

  return {
    baseUrl: (overrides.baseUrl ?? env.TM_BASE_URL ?? DEFAULT_BASE_URL).replace(/\/+$/, ''),
    dataRoot,
    outputDir: overrides.outputDir ?? env.OUTPUT_DIR ?? join(dataRoot, 'transfers'),
    cacheDir,
    quarantineDir: overrides.quarantineDir ?? env.QUARANTINE_DIR ?? join(dataRoot, 'quarantine'),
    reportFile: overrides.reportFile ?? join(dataRoot, 'reports', 'last-run.json'),
    offline: overrides.offline ?? parseBoolean(env.OFFLINE, false, 'OFFLINE'),
    force: overrides.force ?? parseBoolean(env.FORCE_WRITE, false, 'FORCE_WRITE'),
    concurrency:
      overrides.concurrency ??
      parseNumber(env.SCRAPE_CONCURRENCY, 4, 'SCRAPE_CONCURRENCY', { min: 1, integer: true }),
    maxInFlight:
      overrides.maxInFlight ??
      parseNumber(env.SCRAPE_MAX_IN_FLIGHT, 2, 'SCRAPE_MAX_IN_FLIGHT', { min: 1, integer: true }),
    minRequestIntervalMs:
      overrides.minRequestIntervalMs ??
      parseNumber(env.SCRAPE_MIN_DELAY_MS, 3_000, 'SCRAPE_MIN_DELAY_MS', { min: 0 }),
    maxAttempts:
      overrides.maxAttempts ??
      parseNumber(env.SCRAPE_MAX_ATTEMPTS, 4, 'SCRAPE_MAX_ATTEMPTS', { min: 1, integer: true }),
    initialRetryDelayMs:
      overrides.initialRetryDelayMs ??
      parseNumber(env.SCRAPE_RETRY_DELAY_MS, 1_000, 'SCRAPE_RETRY_DELAY_MS', { min: 0 }),
    maxRetryDelayMs:
      overrides.maxRetryDelayMs ??
      parseNumber(env.SCRAPE_MAX_RETRY_DELAY_MS, 30_000, 'SCRAPE_MAX_RETRY_DELAY_MS', { min: 0 }),
    jitterRatio:
      overrides.jitterRatio ??
      parseNumber(env.SCRAPE_JITTER_RATIO, 0.3, 'SCRAPE_JITTER_RATIO', { min: 0, max: 1 }),
    rateLimitCooldownMs:
      overrides.rateLimitCooldownMs ??
      parseNumber(env.SCRAPE_COOLDOWN_MS, 60_000, 'SCRAPE_COOLDOWN_MS', { min: 0 }),
    requestTimeoutMs:
      overrides.requestTimeoutMs ??
      parseNumber(env.SCRAPE_TIMEOUT_MS, 30_000, 'SCRAPE_TIMEOUT_MS', { min: 1 }),
    userAgents: userAgents.length ? userAgents : DEFAULT_USER_AGENTS
  };
}
