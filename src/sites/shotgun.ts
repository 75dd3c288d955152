// src/sites/shotgun.ts
import fs from 'fs';
import path from 'path';
import puppeteer, { type Browser, type Page } from 'puppeteer-core';
import { anonymizeProxy, closeAnonymizedProxy } from 'proxy-chain';
import type { BrowserConfig, ShotgunConfig } from '../config';
import { SessionStore } from '../cookies_and_localstorage';
import type { RawEventRecord } from '../matching/types';
import { parseShotgunCards } from '../parsers/parse_shotgun';
import { siteKeyFromUrl, sitePaths, withRetry, type RetryOptions } from '../utils';
import { failSoft, type AdapterContext, type EventSourceAdapter } from './adapter';
import { gotoLoose, optional, runShotgunFlow } from './shotgunFlow';

export type BrowserSession = {
  browser: Browser;
  close(): Promise<void>;
};

export type OpenBrowser = (config: BrowserConfig) => Promise<BrowserSession>;

export function launchArgs(proxyUrl: string | null): string[] {
  const args = [
    '--no-sandbox',
    '--disable-setuid-sandbox',
    '--disable-dev-shm-usage',
    '--disable-blink-features=AutomationControlled',
    '--lang=fr-FR',
  ];
  if (proxyUrl) args.push(`--proxy-server=${proxyUrl}`);
  return args;
}

/** Remote browser when a websocket endpoint is set, local Chrome otherwise. */
export const openBrowser: OpenBrowser = async config => {
  if (config.wsEndpoint) {
    const browser = await puppeteer.connect({ browserWSEndpoint: config.wsEndpoint, defaultViewport: null });
    return { browser, close: () => browser.disconnect() };
  }

  // Chrome cannot take proxy credentials on the command line; proxy-chain serves a local open proxy in front
  const proxy = config.proxyUrl ? await anonymizeProxy(config.proxyUrl) : null;
  const browser = await puppeteer.launch({
    executablePath: config.executablePath ?? undefined,
    headless: config.headless,
    args: launchArgs(proxy),
    defaultViewport: { width: 1366, height: 900 },
  });
  return {
    browser,
    close: async () => {
      await browser.close();
      if (proxy) await closeAnonymizedProxy(proxy, true);
    },
  };
};

const SUSPICIOUS_URL = /captcha|challenge|robot/i;

/** Logs blocked or throttled responses and keeps their bodies beside the session data. */
function watchResponses(page: Page, siteDir: string) {
  page.on('response', res => {
    const status = res.status();
    if (![401, 403, 429].includes(status) && !SUSPICIOUS_URL.test(res.url())) return;
    console.warn('[shotgun] suspicious response', { status, url: res.url() });
    res
      .text()
      .then(body => fs.writeFileSync(path.join(siteDir, `suspicious_response_${Date.now()}.html`), body, 'utf8'))
      .catch((err: unknown) => console.debug('[shotgun] response body unavailable', { error: String(err) }));
  });
  page.on('requestfailed', req => {
    console.debug('[shotgun] request failed', { url: req.url(), error: req.failure()?.errorText });
  });
}

async function saveDebugArtifacts(page: Page, siteDir: string) {
  const stamp = Date.now();
  const htmlPath = path.join(siteDir, `page_${stamp}.html`);
  fs.writeFileSync(htmlPath, await page.content(), 'utf8');
  const screenshotPath: `${string}.png` = `${siteDir}${path.sep}screenshot_${stamp}.png`;
  await page.screenshot({ path: screenshotPath, fullPage: true });
  console.log('[shotgun] saved page and screenshot for debugging', { htmlPath, screenshotPath });
}

export class ShotgunAdapter implements EventSourceAdapter {
  readonly name = 'shotgun' as const;

  constructor(
    private readonly config: ShotgunConfig,
    private readonly browserConfig: BrowserConfig,
    private readonly retry: RetryOptions,
    private readonly open: OpenBrowser = openBrowser,
  ) {}

  produceEvents(ctx: AdapterContext): Promise<RawEventRecord[]> {
    return failSoft(this.name, () => withRetry('shotgun scrape', () => this.scrape(ctx), this.retry));
  }

  /** One full browser session. Throws on any failure. */
  async scrape(ctx: AdapterContext): Promise<RawEventRecord[]> {
    const { dashboardUrl } = this.config;
    const { navTimeoutMs } = this.browserConfig;
    const siteKey = siteKeyFromUrl(dashboardUrl);
    const { siteDir } = sitePaths(siteKey, this.browserConfig.sessionBaseDir);
    const store = new SessionStore(siteKey, this.browserConfig.persistLevel, this.browserConfig.sessionBaseDir);

    console.log(`[shotgun] starting scrape of ${dashboardUrl}`);
    const session = await this.open(this.browserConfig);
    try {
      const page = await session.browser.newPage();
      if (this.browserConfig.userAgent) await page.setUserAgent(this.browserConfig.userAgent);
      if (!this.browserConfig.wsEndpoint) {
        await page.setExtraHTTPHeaders({ 'accept-language': 'fr-FR,fr;q=0.9,en;q=0.8' });
      }
      await optional('timezone override', page.emulateTimezone(this.browserConfig.timezone));
      page.setDefaultNavigationTimeout(navTimeoutMs);
      watchResponses(page, siteDir);

      try {
        await gotoLoose(page, dashboardUrl, navTimeoutMs);

        // cookies -> reload, localStorage -> reload
        await store.restoreCookies(page);
        await page.reload({ waitUntil: 'domcontentloaded', timeout: navTimeoutMs });
        await store.restoreLocalStorage(page);
        await page.reload({ waitUntil: 'domcontentloaded', timeout: navTimeoutMs });

        const cards = await runShotgunFlow(page, {
          dashboardUrl,
          email: this.config.email,
          password: this.config.password,
          navTimeoutMs,
          maxScrolls: this.config.maxScrolls,
        });

        await store.persistCookies(page);
        await store.persistLocalStorage(page);

        const records = parseShotgunCards(
          cards,
          { runId: ctx.runId, scrapeTimestampUtc: ctx.scrapedAt.toISOString(), sourceUrl: dashboardUrl },
          ctx.scrapedAt,
        );
        console.log(`[shotgun] ${cards.length} cards, ${records.length} events`);
        return records;
      } catch (err) {
        await optional('debug artifacts', saveDebugArtifacts(page, siteDir));
        throw err;
      }
    } finally {
      await session.close();
    }
  }
}
