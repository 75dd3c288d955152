// src/config.ts
import dotenv from 'dotenv';
dotenv.config();

import cron from 'node-cron';
import path from 'path';
import { ConfigError } from './errors';
import {
  DEFAULT_MATCHER_CONFIG,
  type BucketKey,
  type MatchStrategy,
  type MatcherConfig,
  type SideLabels,
  type StrictKey,
} from './matching/types';
import type { RetryOptions } from './utils';

export type SourceName = 'shotgun' | 'dice';
export type PersistLevel = 'none' | 'light' | 'session';

export const SOURCE_NAMES: readonly SourceName[] = ['shotgun', 'dice'];
const STRATEGIES: readonly MatchStrategy[] = ['strict', 'threshold', 'greedy'];
const BUCKET_KEYS: readonly BucketKey[] = ['day', 'day-venue', 'artist-day'];
const STRICT_KEYS: readonly StrictKey[] = ['name-time', 'artist-day'];
const PERSIST_LEVELS: readonly PersistLevel[] = ['none', 'light', 'session'];

export type BrowserConfig = {
  wsEndpoint: string | null;
  executablePath: string | null;
  headless: boolean;
  proxyUrl: string | null;
  navTimeoutMs: number;
  userAgent: string | null;
  timezone: string;
  persistLevel: PersistLevel;
  sessionBaseDir: string;
};

export type ShotgunConfig = {
  dashboardUrl: string;
  email: string;
  password: string;
  maxScrolls: number;
};

export type DiceConfig = {
  endpoint: string;
  token: string;
  lookbackDays: number;
  pageSize: number;
  maxPages: number;
  timeoutMs: number;
};

export type SheetConfig = {
  enabled: boolean;
  credentialsPath: string;
  spreadsheetId: string | null;
  docTitle: string;
  worksheet: string;
  historyWorksheet: string | null;
};

export type ExportConfig = {
  csvDir: string;
  previewPath: string;
  previewLimit: number;
};

export type EtlConfig = {
  sources: SourceName[];
  labels: SideLabels;
  matcher: MatcherConfig;
  browser: BrowserConfig;
  shotgun: ShotgunConfig;
  dice: DiceConfig;
  sheet: SheetConfig;
  exports: ExportConfig;
  retry: RetryOptions;
  dryRun: boolean;
  pushgatewayUrl: string | null;
  metricsPort: number;
  scheduleCron: string;
};

/** Command-line overrides; anything unset keeps the environment value. */
export type ConfigOverrides = {
  strategy?: string;
  minScore?: string;
  toleranceMinutes?: string;
  bucketKey?: string;
  sources?: string;
  publishSheet?: boolean;
  dryRun?: boolean;
};

type Env = Record<string, string | undefined>;

// Helpers
export function parseEnvList(raw: string | undefined, fallback: string[] = []): string[] {
  if (!raw) return fallback;
  return raw.split(/[\n,;]+/g).map(s => s.trim()).filter(Boolean);
}

export function parseEnvBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return /^(1|true|yes|on)$/i.test(raw.trim());
}

/** null when set but not an integer (the caller reports it). */
export function parseEnvInt(raw: string | undefined, fallback: number): number | null {
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw.trim());
  return Number.isInteger(n) ? n : null;
}

function pickOne<T extends string>(raw: string | undefined, allowed: readonly T[], fallback: T): T | null {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = raw.trim().toLowerCase();
  return allowed.find(option => option === value) ?? null;
}

function text(raw: string | undefined): string {
  return raw?.trim() ?? '';
}

function orNull(raw: string | undefined): string | null {
  const value = text(raw);
  return value || null;
}

/** Flags understood by the CLI entry and the scheduler. */
export function parseCliArgs(argv: readonly string[]): ConfigOverrides {
  const out: ConfigOverrides = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const value = (): string | undefined => (eq === -1 ? argv[++i] : arg.slice(eq + 1));
    switch (flag) {
      case '--strategy':
        out.strategy = value();
        break;
      case '--min-score':
        out.minScore = value();
        break;
      case '--tolerance':
        out.toleranceMinutes = value();
        break;
      case '--bucket':
        out.bucketKey = value();
        break;
      case '--sources':
        out.sources = value();
        break;
      case '--no-sheet':
        out.publishSheet = false;
        break;
      case '--dry-run':
        out.dryRun = true;
        break;
      default:
        console.warn('[config] ignoring unknown argument', { arg });
    }
  }
  return out;
}

/**
 * Reads the environment (plus CLI overrides) into a typed config. Every missing or invalid
 * variable is collected and reported in one ConfigError, before anything is scraped.
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): EtlConfig {
  const missing: string[] = [];
  const invalid: string[] = [];

  const int = (name: string, raw: string | undefined, fallback: number) => {
    const n = parseEnvInt(raw, fallback);
    if (n === null || n < 0) {
      invalid.push(`${name}=${raw ?? ''}`);
      return fallback;
    }
    return n;
  };
  const choice = <T extends string>(name: string, raw: string | undefined, allowed: readonly T[], fallback: T): T => {
    const picked = pickOne(raw, allowed, fallback);
    if (picked === null) {
      invalid.push(`${name}=${raw ?? ''}`);
      return fallback;
    }
    return picked;
  };

  const requestedSources = parseEnvList(overrides.sources ?? env.SOURCES, [...SOURCE_NAMES]).map(s => s.toLowerCase());
  const sources: SourceName[] = [];
  for (const name of requestedSources) {
    const known = SOURCE_NAMES.find(s => s === name);
    if (!known) invalid.push(`SOURCES=${name}`);
    else if (!sources.includes(known)) sources.push(known);
  }

  const matcher: MatcherConfig = {
    strategy: choice('MATCH_STRATEGY', overrides.strategy ?? env.MATCH_STRATEGY, STRATEGIES, DEFAULT_MATCHER_CONFIG.strategy),
    minScore: int('MATCH_MIN_SCORE', overrides.minScore ?? env.MATCH_MIN_SCORE, DEFAULT_MATCHER_CONFIG.minScore),
    toleranceMinutes: int(
      'MATCH_TOLERANCE_MINUTES',
      overrides.toleranceMinutes ?? env.MATCH_TOLERANCE_MINUTES,
      DEFAULT_MATCHER_CONFIG.toleranceMinutes,
    ),
    adjacentDays: parseEnvBool(env.MATCH_ADJACENT_DAYS, DEFAULT_MATCHER_CONFIG.adjacentDays),
    bucketKey: choice('MATCH_BUCKET_KEY', overrides.bucketKey ?? env.MATCH_BUCKET_KEY, BUCKET_KEYS, DEFAULT_MATCHER_CONFIG.bucketKey),
    strictKey: choice('MATCH_STRICT_KEY', env.MATCH_STRICT_KEY, STRICT_KEYS, DEFAULT_MATCHER_CONFIG.strictKey),
    undatedFallback: parseEnvBool(env.MATCH_UNDATED_FALLBACK, DEFAULT_MATCHER_CONFIG.undatedFallback),
  };

  const browser: BrowserConfig = {
    wsEndpoint: orNull(env.BROWSER_WS_ENDPOINT),
    executablePath: orNull(env.CHROME_EXECUTABLE_PATH),
    headless: parseEnvBool(env.HEADLESS, true),
    proxyUrl: orNull(env.BROWSER_PROXY_URL),
    navTimeoutMs: int('NAV_TIMEOUT_MS', env.NAV_TIMEOUT_MS, 90_000),
    userAgent: orNull(env.USER_AGENT),
    timezone: text(env.TIMEZONE) || 'Europe/Paris',
    persistLevel: choice('PERSIST_LEVEL', env.PERSIST_LEVEL, PERSIST_LEVELS, 'light'),
    sessionBaseDir: path.resolve(text(env.SESSION_BASE_DIR) || '.session_data'),
  };

  const shotgun: ShotgunConfig = {
    dashboardUrl: text(env.SHOTGUN_DASHBOARD_URL) || 'https://smartboard.shotgun.live/events',
    email: text(env.SHOTGUN_EMAIL),
    password: env.SHOTGUN_PASSWORD ?? '',
    maxScrolls: int('SHOTGUN_MAX_SCROLLS', env.SHOTGUN_MAX_SCROLLS, 40),
  };

  const dice: DiceConfig = {
    endpoint: text(env.DICE_GRAPHQL_URL) || 'https://partners-endpoint.dice.fm/graphql',
    token: text(env.DICE_API_TOKEN),
    lookbackDays: int('DICE_LOOKBACK_DAYS', env.DICE_LOOKBACK_DAYS, 90),
    pageSize: 100,
    maxPages: 50,
    timeoutMs: int('DICE_TIMEOUT_MS', env.DICE_TIMEOUT_MS, 30_000),
  };

  const dryRun = overrides.dryRun ?? parseEnvBool(env.DRY_RUN, false);
  const sheet: SheetConfig = {
    enabled: !dryRun && (overrides.publishSheet ?? parseEnvBool(env.PUBLISH_SHEET, true)),
    credentialsPath: text(env.GOOGLE_APPLICATION_CREDENTIALS),
    spreadsheetId: orNull(env.GSHEET_ID),
    docTitle: text(env.GSHEET_DOC_TITLE) || 'Concerts Pointages',
    worksheet: text(env.GSHEET_WORKSHEET) || 'consolidated',
    historyWorksheet: orNull(env.GSHEET_HISTORY_WORKSHEET),
  };

  if (sources.includes('shotgun')) {
    if (!shotgun.email) missing.push('SHOTGUN_EMAIL');
    if (!shotgun.password) missing.push('SHOTGUN_PASSWORD');
    if (!browser.wsEndpoint && !browser.executablePath) missing.push('CHROME_EXECUTABLE_PATH or BROWSER_WS_ENDPOINT');
  }
  if (sources.includes('dice') && !dice.token) missing.push('DICE_API_TOKEN');
  if (sheet.enabled && !sheet.credentialsPath) missing.push('GOOGLE_APPLICATION_CREDENTIALS');

  const rawCron = text(env.SCHEDULE_CRON);
  if (rawCron && !cron.validate(rawCron)) invalid.push(`SCHEDULE_CRON=${rawCron}`);

  if (sources.length === 0 && requestedSources.length === 0) invalid.push('SOURCES=');
  if (missing.length || invalid.length) {
    throw new ConfigError('missing or invalid configuration', [...missing, ...invalid]);
  }

  return {
    sources,
    labels: { a: 'shotgun', b: 'dice' },
    matcher,
    browser,
    shotgun,
    dice,
    sheet,
    exports: {
      csvDir: path.resolve(text(env.EXPORT_CSV_DIR) || 'exports'),
      previewPath: path.resolve(text(env.PREVIEW_PATH) || 'providers_preview.json'),
      previewLimit: 20,
    },
    retry: { attempts: 3, minDelayMs: 1_000, maxDelayMs: 10_000 },
    dryRun,
    pushgatewayUrl: orNull(env.PUSHGATEWAY_URL),
    metricsPort: int('ETL_METRICS_PORT', env.ETL_METRICS_PORT, 9464),
    scheduleCron: rawCron && cron.validate(rawCron) ? rawCron : '0 */6 * * *',
  };
}
