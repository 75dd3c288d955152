import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { makeRecord } from '../../matching/__tests__/helpers';
import { buildPreview, writePreview } from '../preview';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'preview-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('buildPreview', () => {
  it('keeps the first records of each side and the first table rows as objects', () => {
    const preview = buildPreview({
      labels: { a: 'shotgun', b: 'dice' },
      recordsA: [
        makeRecord({ sourceId: 'sg-1', displayName: 'Daft Punk', venueName: 'Accor Arena', eventTime: '2025-10-10T20:30', ticketsSold: 500 }),
        makeRecord({ sourceId: 'sg-2', displayName: 'Justice' }),
      ],
      recordsB: [],
      table: { headers: ['event_name', 'shotgun_tickets_sold'], rows: [['Daft Punk', 500], ['Justice', null]] },
      limit: 1,
    });

    expect(preview).toEqual({
      shotgun: [{ name: 'Daft Punk', artist: null, venue: 'Accor Arena', dt: '2025-10-10T20:30', tickets: 500 }],
      dice: [],
      consolidated: [{ event_name: 'Daft Punk', shotgun_tickets_sold: 500 }],
    });
  });
});

describe('writePreview', () => {
  it('writes the preview as JSON', () => {
    const file = path.join(dir, 'nested', 'providers_preview.json');
    writePreview(file, { shotgun: [], dice: [], consolidated: [] });
    expect(JSON.parse(fs.readFileSync(file, 'utf8'))).toEqual({ shotgun: [], dice: [], consolidated: [] });
  });
});
