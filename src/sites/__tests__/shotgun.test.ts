import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { BrowserConfig, ShotgunConfig } from '../../config';
import { ShotgunAdapter, launchArgs, type OpenBrowser } from '../shotgun';

let baseDir: string;

beforeEach(() => {
  baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shotgun-'));
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  fs.rmSync(baseDir, { recursive: true, force: true });
});

const shotgun: ShotgunConfig = {
  dashboardUrl: 'https://smartboard.shotgun.live/events',
  email: 'organiser@example.com',
  password: 'test-secret',
  maxScrolls: 2,
};

function browserConfig(): BrowserConfig {
  return {
    wsEndpoint: null,
    executablePath: '/usr/bin/chromium',
    headless: true,
    proxyUrl: null,
    navTimeoutMs: 1_000,
    userAgent: null,
    timezone: 'Europe/Paris',
    persistLevel: 'none',
    sessionBaseDir: baseDir,
  };
}

describe('launchArgs', () => {
  it('adds the proxy only when one is given', () => {
    expect(launchArgs(null).some(a => a.startsWith('--proxy-server'))).toBe(false);
    expect(launchArgs('http://127.0.0.1:8000')).toContain('--proxy-server=http://127.0.0.1:8000');
  });
});

describe('ShotgunAdapter', () => {
  it('retries a failing browser session, then contributes no events', async () => {
    const open = vi.fn<OpenBrowser>().mockRejectedValue(new Error('no chrome'));
    const adapter = new ShotgunAdapter(shotgun, browserConfig(), { attempts: 2, minDelayMs: 0, maxDelayMs: 0 }, open);

    await expect(adapter.produceEvents({ runId: 'run-1', scrapedAt: new Date() })).resolves.toEqual([]);
    expect(open).toHaveBeenCalledTimes(2);
  });

  it('lets scrape reject so callers can see the failure', async () => {
    const open = vi.fn<OpenBrowser>().mockRejectedValue(new Error('no chrome'));
    const adapter = new ShotgunAdapter(shotgun, browserConfig(), { attempts: 1, minDelayMs: 0, maxDelayMs: 0 }, open);

    await expect(adapter.scrape({ runId: 'run-1', scrapedAt: new Date() })).rejects.toThrow('no chrome');
    expect(fs.existsSync(path.join(baseDir, 'shotgun.live'))).toBe(true);
  });
});
