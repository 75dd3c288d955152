// src/sites/shotgunFlow.ts
import type { Page } from 'puppeteer-core';
import { AdapterError } from '../errors';
import type { ShotgunCard } from '../parsers/parse_shotgun';
import { sleep } from '../utils';

const rand = (min: number, max: number) => Math.floor(min + Math.random() * (max - min + 1));
export const humanPause = async (min = 200, max = 700) => sleep(rand(min, max));

const EMAIL_SELECTORS = ['input[type="email"]', 'input[name="email"]', 'input[autocomplete="email"]', 'input[autocomplete="username"]'];
const PASSWORD_SELECTORS = ['input[type="password"]', 'input[name="password"]'];
const CONSENT_LABELS = ['tout accepter', 'accepter', 'accept all', 'accept', 'agree', 'ok'];
const LOAD_MORE_LABELS = ['voir plus', 'afficher plus', 'charger plus', 'load more', 'show more'];
const EVENT_LINK_SELECTOR = 'a[href*="/events/"]';

/** Best-effort step: a timeout or a missing element is logged and skipped. */
export async function optional<T>(label: string, step: Promise<T>): Promise<T | null> {
  try {
    return await step;
  } catch (err) {
    console.debug(`[shotgun] skipped optional step: ${label}`, { error: String(err) });
    return null;
  }
}

export async function clickFirstVisibleButtonByText(page: Page, texts: string[], timeout = 4500): Promise<boolean> {
  await page.waitForFunction(
    (labels: string[]) => {
      const nodes = Array.from(document.querySelectorAll('button,[role="button"],a'));
      return nodes.some(n => {
        const t = (n.textContent || '').trim().toLowerCase();
        return t.length > 0 && labels.some(l => t === l || t.includes(l));
      });
    },
    { timeout },
    texts,
  );

  return page.evaluate((labels: string[]) => {
    const nodes = Array.from(document.querySelectorAll('button,[role="button"],a'));
    for (const l of labels) {
      for (const n of nodes) {
        const t = (n.textContent || '').trim().toLowerCase();
        if (!t || !(t === l || t.includes(l)) || !(n instanceof HTMLElement)) continue;
        n.scrollIntoView({ block: 'center' });
        n.click();
        return true;
      }
    }
    return false;
  }, texts);
}

export async function typeIntoOneOf(page: Page, selectors: string[], text: string, typeDelay = 40): Promise<boolean> {
  for (const sel of selectors) {
    const el = await optional(`wait for ${sel}`, page.waitForSelector(sel, { visible: true, timeout: 5000 }));
    if (!el) continue;
    await el.click({ count: 3 });
    await humanPause(150, 400);
    await page.keyboard.type(text, { delay: typeDelay + rand(0, 40) });
    return true;
  }
  return false;
}

/** Loose navigation for heavy single-page dashboards. */
export async function gotoLoose(page: Page, url: string, navTimeoutMs: number) {
  await page.goto(url, { waitUntil: 'domcontentloaded', timeout: navTimeoutMs });
  await page.waitForSelector('body', { timeout: 15000 });
  await optional('app root', page.waitForSelector('#__next, #root, main', { timeout: 15000 }));
  await optional('network idle', page.waitForNetworkIdle({ idleTime: 1000, timeout: 6000 }));
}

export async function isLoginForm(page: Page): Promise<boolean> {
  if (/\/(login|signin|sign-in|connexion)\b/i.test(page.url())) return true;
  return (await page.$(PASSWORD_SELECTORS.join(','))) !== null;
}

export async function dismissConsent(page: Page) {
  const clicked = await optional('consent banner', clickFirstVisibleButtonByText(page, CONSENT_LABELS, 2500));
  if (clicked) await humanPause();
}

/** Email + password, on one form or two steps. Throws when the form is still there afterwards. */
export async function login(page: Page, creds: { email: string; password: string }, navTimeoutMs: number) {
  console.log('[shotgun] login form detected, signing in');
  await dismissConsent(page);

  if (!(await typeIntoOneOf(page, EMAIL_SELECTORS, creds.email, 35))) {
    throw new AdapterError('shotgun', 'email field not found on login form');
  }
  if (!(await page.$(PASSWORD_SELECTORS.join(',')))) {
    // two-step form: the password field shows up after the email is submitted
    await page.keyboard.press('Enter');
    await humanPause(600, 1200);
  }
  if (!(await typeIntoOneOf(page, PASSWORD_SELECTORS, creds.password, 35))) {
    throw new AdapterError('shotgun', 'password field not found on login form');
  }

  await humanPause(250, 800);
  await Promise.all([
    optional('post-login navigation', page.waitForNavigation({ waitUntil: 'domcontentloaded', timeout: navTimeoutMs })),
    page.keyboard.press('Enter'),
  ]);
  await optional('network idle', page.waitForNetworkIdle({ idleTime: 800, timeout: 8000 }));

  if (await isLoginForm(page)) {
    throw new AdapterError('shotgun', 'still on the login form after submitting credentials');
  }
  console.log('[shotgun] signed in');
}

/** Event links rendered, or the empty-state message; loaders gone. Resolves to the number of links. */
export async function waitForEventCards(page: Page, timeoutMs: number): Promise<number> {
  const loaderSelectors = ['[data-testid*="skeleton"]', '[class*="Skeleton"]', '[class*="skeleton"]', '[aria-busy="true"]'];
  await page.waitForFunction(
    (linkSelector: string, loaders: string[]) => {
      const hasLinks = document.querySelector(linkSelector) !== null;
      const empty = /aucun [ée]v[ée]nement|no events? (yet|found)/i.test(document.body.innerText);
      const loading = loaders.some(sel => document.querySelector(sel));
      return (hasLinks || empty) && !loading;
    },
    { polling: 250, timeout: timeoutMs },
    EVENT_LINK_SELECTOR,
    loaderSelectors,
  );
  return page.$$eval(EVENT_LINK_SELECTOR, links => links.length);
}

/** Scrolls and presses "load more" until the number of event links stops growing. */
export async function loadAllCards(page: Page, maxScrolls: number): Promise<number> {
  let count = await page.$$eval(EVENT_LINK_SELECTOR, links => links.length);
  let stableRounds = 0;

  for (let i = 0; i < maxScrolls && stableRounds < 2; i++) {
    await page.evaluate(() => {
      window.scrollTo({ top: document.body.scrollHeight });
      const scrollers = Array.from(document.querySelectorAll<HTMLElement>('main, [class*="scroll"], [class*="list"]'));
      for (const el of scrollers) {
        if (el.scrollHeight > el.clientHeight + 40) el.scrollTop = el.scrollHeight;
      }
    });
    await optional('load more', clickFirstVisibleButtonByText(page, LOAD_MORE_LABELS, 800));
    await optional('network idle', page.waitForNetworkIdle({ idleTime: 600, timeout: 5000 }));
    await humanPause(300, 700);

    const next = await page.$$eval(EVENT_LINK_SELECTOR, links => links.length);
    stableRounds = next > count ? 0 : stableRounds + 1;
    count = next;
  }
  return count;
}

/** `{ href, title, lines }` per event card, one per distinct event link. */
export async function extractCards(page: Page): Promise<ShotgunCard[]> {
  return page.evaluate((linkSelector: string) => {
    const cards: Array<{ href: string; title: string; lines: string[] }> = [];
    const seen = new Set<string>();
    for (const a of Array.from(document.querySelectorAll(linkSelector))) {
      const href = a.getAttribute('href');
      if (!href || !/\/events\/[A-Za-z0-9_-]+/.test(href) || /\/events\/(new|create)\b/.test(href)) continue;
      const key = href.replace(/[?#].*$/, '').replace(/(\/events\/[A-Za-z0-9_-]+).*/, '$1');
      if (seen.has(key)) continue;

      const container = a.closest('[data-testid*="event" i], article, li, tr, [class*="card" i]') ?? a;
      const text = container instanceof HTMLElement ? container.innerText : container.textContent || '';
      const lines = text.split('\n').map(s => s.trim()).filter(Boolean);
      if (!lines.length) continue;

      const heading = container.querySelector('h1, h2, h3, h4, [data-testid*="title" i], [class*="title" i]');
      const title = heading?.textContent?.trim() || lines[0];
      seen.add(key);
      cards.push({ href: key, title, lines });
    }
    return cards;
  }, EVENT_LINK_SELECTOR);
}

export type ShotgunFlowOptions = {
  dashboardUrl: string;
  email: string;
  password: string;
  navTimeoutMs: number;
  maxScrolls: number;
};

/** Dashboard -> (login) -> event list -> every card on it. */
export async function runShotgunFlow(page: Page, opts: ShotgunFlowOptions): Promise<ShotgunCard[]> {
  await humanPause(500, 1200);
  await dismissConsent(page);

  if (await isLoginForm(page)) {
    await login(page, opts, opts.navTimeoutMs);
    if (!page.url().startsWith(opts.dashboardUrl)) {
      await gotoLoose(page, opts.dashboardUrl, opts.navTimeoutMs);
    }
  }

  const initial = await waitForEventCards(page, 30000);
  const total = await loadAllCards(page, opts.maxScrolls);
  console.log('[shotgun] event list loaded', { initial, total });

  return extractCards(page);
}
