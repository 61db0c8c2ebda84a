import type { ScrapeConfig } from './config/scrape.js';
import { parseWindow } from './lib/urls.js';
import type { TransferWindow } from './types/index.js';

export type CliArgs = Record<string, string | boolean | string[]>;

export interface CliOptions {
  help: boolean;
  leagues: string[];
  seasons: number[];
  windows: TransferWindow[];
  overrides: Partial<ScrapeConfig>;
}

export function parseCliArgs(tokens: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < tokens.length; i++) {
    let token = tokens[i];
    if (token === '--') continue;
    if (!token.startsWith('--')) continue;

    token = token.slice(2);
    if (!token) continue;

    let value: string | boolean = true;
    let key = token;

    if (token.includes('=')) {
      const [k, v] = token.split(/=(.*)/s, 2);
      key = k;
      value = v ?? true;
    } else {
      const next = tokens[i + 1];
      if (next && !next.startsWith('--')) {
        value = next;
        i++;
      }
    }

    const existing = result[key];
    if (existing === undefined) {
      result[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(String(value));
    } else {
      result[key] = [String(existing), String(value)];
    }
  }

  return result;
}

export function getStringArg(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return value[value.length - 1];
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return value;
}

/** Repeated flags and comma/space separated values both accumulate. */
export function getStringArrayArg(args: CliArgs, key: string): string[] | undefined {
  const value = args[key];
  if (value === undefined || typeof value === 'boolean') return undefined;
  const entries = Array.isArray(value) ? value : [value];
  return entries.flatMap((entry) => entry.split(/[\s,]+/)).filter(Boolean);
}

function normalizeBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

export function resolveBooleanFlag(cliValue: unknown, fallback?: boolean): boolean | undefined {
  if (Array.isArray(cliValue)) {
    cliValue = cliValue[cliValue.length - 1];
  }
  if (typeof cliValue === 'boolean') return cliValue;
  if (typeof cliValue === 'string') {
    const parsed = normalizeBoolean(cliValue);
    if (parsed !== undefined) return parsed;
  }
  return fallback;
}

function parseIntegerArg(args: CliArgs, key: string, min: number): number | undefined {
  const raw = getStringArg(args, key);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`--${key} expects an integer >= ${min}, got "${raw}".`);
  }
  return parsed;
}

/** The season a date falls in; seasons are named by the year they start in July. */
export function currentSeason(now: Date = new Date()): number {
  return now.getUTCMonth() >= 6 ? now.getUTCFullYear() : now.getUTCFullYear() - 1;
}

/** Expands `2024` and `2020-2023` selectors into a sorted list of seasons. */
export function parseSeasons(values: string[]): number[] {
  const seasons = new Set<number>();
  for (const value of values) {
    const range = /^(\d{4})(?:-(\d{4}))?$/.exec(value.trim());
    if (!range) {
      throw new Error(`Invalid season "${value}". Use a start year (2024) or a range (2020-2024).`);
    }
    const from = Number(range[1]);
    const to = range[2] ? Number(range[2]) : from;
    if (to < from) {
      throw new Error(`Invalid season range "${value}".`);
    }
    for (let season = from; season <= to; season++) seasons.add(season);
  }
  return [...seasons].sort((a, b) => a - b);
}

export function parseWindows(values: string[]): TransferWindow[] {
  if (!values.length) return ['summer', 'winter'];
  const windows = new Set<TransferWindow>();
  for (const value of values) {
    const window = parseWindow(value);
    if (!window) {
      throw new Error(`Invalid window "${value}". Use summer, winter, s or w.`);
    }
    windows.add(window);
  }
  return (['summer', 'winter'] as const).filter((window) => windows.has(window));
}

export function resolveCliOptions(
  args: CliArgs,
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date()
): CliOptions {
  const seasonValues =
    getStringArrayArg(args, 'season') ?? (env.SEASONS ? env.SEASONS.split(/[\s,]+/).filter(Boolean) : []);
  const seasons = seasonValues.length ? parseSeasons(seasonValues) : [currentSeason(now)];

  const overrides: Partial<ScrapeConfig> = {};
  const dataRoot = getStringArg(args, 'data-root');
  if (dataRoot) overrides.dataRoot = dataRoot;
  const outputDir = getStringArg(args, 'output-dir');
  if (outputDir) overrides.outputDir = outputDir;
  const cacheDir = getStringArg(args, 'cache-dir');
  if (cacheDir) overrides.cacheDir = cacheDir;
  const offline = resolveBooleanFlag(args.offline);
  if (offline !== undefined) overrides.offline = offline;
  const force = resolveBooleanFlag(args.force);
  if (force !== undefined) overrides.force = force;
  const concurrency = parseIntegerArg(args, 'concurrency', 1);
  if (concurrency !== undefined) overrides.concurrency = concurrency;
  const minDelay = parseIntegerArg(args, 'min-delay-ms', 0);
  if (minDelay !== undefined) overrides.minRequestIntervalMs = minDelay;
  const maxAttempts = parseIntegerArg(args, 'max-attempts', 1);
  if (maxAttempts !== undefined) overrides.maxAttempts = maxAttempts;

  return {
    help: resolveBooleanFlag(args.help, false) ?? false,
    leagues: getStringArrayArg(args, 'league') ?? (env.LEAGUES ? env.LEAGUES.split(/[\s,]+/).filter(Boolean) : []),
    seasons,
    windows: parseWindows(getStringArrayArg(args, 'window') ?? []),
    overrides
  };
}
