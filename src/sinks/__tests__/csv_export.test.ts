import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { makeRecord } from '../../matching/__tests__/helpers';
import { CsvTableSink, toCsv, writeSourceCsv } from '../csv_export';
import { RECORD_COLUMNS } from '../sink';

let dir: string;
const at = new Date('2025-10-10T23:30:00Z');

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('toCsv', () => {
  it('quotes cells with commas and leaves nulls empty', () => {
    expect(toCsv(['event_name', 'tickets'], [['Daft Punk, Live', 500], ['Solo', null]])).toBe(
      'event_name,tickets\r\n"Daft Punk, Live",500\r\nSolo,',
    );
  });
});

describe('CsvTableSink', () => {
  it('writes consolidated_<utc day>.csv and overwrites it on the same day', async () => {
    const sink = new CsvTableSink(path.join(dir, 'exports'), () => at);
    await sink.publish({ headers: ['a'], rows: [[1]] });
    await sink.publish({ headers: ['a'], rows: [[2]] });

    const file = path.join(dir, 'exports', 'consolidated_2025-10-10.csv');
    expect(sink.lastFile).toBe(file);
    expect(fs.readFileSync(file, 'utf8')).toBe('a\r\n2');
  });
});

describe('writeSourceCsv', () => {
  it('writes one raw record per line under the record columns', () => {
    const record = makeRecord({ sourceId: 'd-1', displayName: 'Solo Event', eventTime: '2025-12-01', ticketsSold: 50 });
    const file = writeSourceCsv(dir, 'dice', [{ provider: 'dice', record }], at);

    expect(path.basename(file)).toBe('dice_2025-10-10.csv');
    expect(fs.readFileSync(file, 'utf8').split('\r\n')).toEqual([
      RECORD_COLUMNS.join(','),
      'dice,d-1,Solo Event,,,,,2025-12-01,,on_sale,50,,,,2025-09-01T12:00:00Z,run-test',
    ]);
  });
});
