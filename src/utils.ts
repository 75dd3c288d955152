import fs from 'fs';
import path from 'path';

export function ensureDir(dir: string) {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err: unknown) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) throw err;
  }
}

// naive eTLD+1 (last two labels is fine for these dashboards)
export function siteKeyFromUrl(url: string) {
  const { hostname } = new URL(url);
  const parts = hostname.split('.').filter(Boolean);
  return parts.length >= 2 ? parts.slice(-2).join('.') : hostname;
}

export type SitePaths = {
  baseDir: string;
  siteDir: string;
  cookies: string; // JSON file path for cookies
  ls: string;      // JSON file path for localStorage
};

export function sitePaths(siteKey: string, baseDir: string): SitePaths {
  const siteDir = path.join(baseDir, siteKey);
  ensureDir(siteDir);
  return {
    baseDir,
    siteDir,
    cookies: path.join(siteDir, 'cookies.json'),
    ls: path.join(siteDir, 'localstorage.json'),
  };
}

export function saveJSON(p: string, v: unknown) {
  ensureDir(path.dirname(p));
  fs.writeFileSync(p, JSON.stringify(v, null, 2), 'utf8');
}

/** Parsed JSON, or null when the file is absent or unreadable. The caller validates the shape. */
export function readJSON(p: string): unknown {
  try {
    if (!fs.existsSync(p)) return null;
    return JSON.parse(fs.readFileSync(p, 'utf8'));
  } catch (err) {
    console.warn('[utils] could not read JSON', { path: p, error: String(err) });
    return null;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/** `YYYY-MM-DD` of the given instant in UTC, used in artifact names. */
export function utcDay(at: Date = new Date()): string {
  return at.toISOString().slice(0, 10);
}

export type RetryOptions = {
  attempts: number;
  minDelayMs: number;
  maxDelayMs: number;
};

/**
 * Runs `fn` up to `attempts` times with exponential backoff (min * 2^n, capped at max).
 * Rethrows the last error.
 */
export async function withRetry<T>(
  label: string,
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions,
  wait: (ms: number) => Promise<void> = sleep,
): Promise<T> {
  let lastErr: unknown;
  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastErr = err;
      if (attempt >= opts.attempts) break;
      const delay = Math.min(opts.maxDelayMs, opts.minDelayMs * 2 ** (attempt - 1));
      console.warn(`[retry] ${label} failed, retrying`, { attempt, delayMs: delay, error: String(err) });
      await wait(delay);
    }
  }
  throw lastErr;
}
