import type { CookieParam, Page } from 'puppeteer-core';
import type { PersistLevel } from './config';
import { isRecord, readJSON, saveJSON, sitePaths } from './utils';

// Trackers and anti-bot tokens are never carried over between runs
export const COOKIE_BLOCKLIST =
  /^(forterToken|aws-waf-token|awswaf_token_refresh_timestamp|_rvt|_ga(_.+)?|_gid|_fbp|_gcl_au|_uetsid|_uetvid|_hj.*|ajs_.*|intercom-.*|__cf_bm|cf_clearance)$/i;

const NEUTRAL_COOKIE = /^(locale|lang|language|country|currency|siteprefs|pref|timezone|NEXT_LOCALE)$/i;

export const isCookieAllowed = (level: PersistLevel, name: string) => {
  if (level === 'none' || COOKIE_BLOCKLIST.test(name)) return false;
  if (level === 'session') return true;
  // light
  return NEUTRAL_COOKIE.test(name);
};

const LS_ALLOW_REGEX = /^(ui_|ux_|pref|locale|currency|country|feature_|toggle_)/i;
// auth tokens some dashboards keep in localStorage
const LS_SESSION_REGEX = /(token|auth|session|user|organi[sz]er)/i;

export function filterLocalStorage(level: PersistLevel, data: Record<string, string>): Record<string, string> {
  if (level === 'none') return {};
  return Object.fromEntries(
    Object.entries(data).filter(([k]) => LS_ALLOW_REGEX.test(k) || (level === 'session' && LS_SESSION_REGEX.test(k))),
  );
}

/** Cookies read back from disk; entries without a name, value and domain are dropped. */
export function storedCookies(raw: unknown, level: PersistLevel): CookieParam[] {
  if (!Array.isArray(raw)) return [];
  const out: CookieParam[] = [];
  for (const c of raw) {
    if (!isRecord(c)) continue;
    const { name, value, domain } = c;
    if (typeof name !== 'string' || typeof value !== 'string' || typeof domain !== 'string') continue;
    if (!isCookieAllowed(level, name)) continue;
    out.push({
      name,
      value,
      domain,
      path: typeof c.path === 'string' ? c.path : '/',
      expires: typeof c.expires === 'number' ? c.expires : undefined,
      httpOnly: c.httpOnly === true,
      secure: c.secure === true,
    });
  }
  return out;
}

function storedLocalStorage(raw: unknown): Record<string, string> {
  if (!isRecord(raw)) return {};
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (typeof v === 'string') out[k] = v;
  }
  return out;
}

/** Per-site cookie and localStorage persistence under `<baseDir>/<siteKey>/`. */
export class SessionStore {
  constructor(
    private readonly siteKey: string,
    private readonly level: PersistLevel,
    private readonly baseDir: string,
  ) {}

  private paths() {
    return sitePaths(this.siteKey, this.baseDir);
  }

  async persistCookies(page: Page) {
    if (this.level === 'none') return;
    const all = await page.cookies();
    const filtered = all
      .filter(c => (c.domain || '').endsWith(this.siteKey))
      .filter(c => isCookieAllowed(this.level, c.name));
    saveJSON(this.paths().cookies, filtered);
    console.log(`[session] saved ${filtered.length} cookies for ${this.siteKey} (level=${this.level})`);
  }

  async restoreCookies(page: Page) {
    if (this.level === 'none') return;
    const cookies = storedCookies(readJSON(this.paths().cookies), this.level);
    let restored = 0;
    for (const c of cookies) {
      try {
        await page.setCookie(c);
        restored++;
      } catch (err) {
        console.warn(`[session] could not restore cookie ${c.name}`, { error: String(err) });
      }
    }
    if (restored) console.log(`[session] restored ${restored} cookies for ${this.siteKey} (level=${this.level})`);
  }

  async persistLocalStorage(page: Page) {
    if (this.level === 'none') return;
    const data = await page.evaluate(() => {
      const o: Record<string, string> = {};
      for (let i = 0; i < localStorage.length; i++) {
        const k = localStorage.key(i);
        const v = k === null ? null : localStorage.getItem(k);
        if (k !== null && v !== null) o[k] = v;
      }
      return o;
    });
    const filtered = filterLocalStorage(this.level, data);
    saveJSON(this.paths().ls, filtered);
    console.log(`[session] saved ${Object.keys(filtered).length} LS keys for ${this.siteKey} (level=${this.level})`);
  }

  async restoreLocalStorage(page: Page) {
    if (this.level === 'none') return;
    const data = filterLocalStorage(this.level, storedLocalStorage(readJSON(this.paths().ls)));
    if (!Object.keys(data).length) return;
    await page.evaluate((obj: Record<string, string>) => {
      Object.entries(obj).forEach(([k, v]) => localStorage.setItem(k, v));
    }, data);
    console.log(`[session] restored ${Object.keys(data).length} LS keys for ${this.siteKey} (level=${this.level})`);
  }
}
