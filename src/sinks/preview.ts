// src/sinks/preview.ts
import type { CellValue, OutputTable, RawEventRecord, SideLabels } from '../matching/types';
import { SinkError, describeError } from '../errors';
import { saveJSON } from '../utils';

export type PreviewEntry = {
  name: string;
  artist: string | null;
  venue: string | null;
  dt: string | null;
  tickets: number | null;
};

export type Preview = Record<string, PreviewEntry[] | Array<Record<string, CellValue>>>;

export function previewEntry(record: RawEventRecord): PreviewEntry {
  return {
    name: record.displayName,
    artist: record.artistName ?? null,
    venue: record.venueName ?? null,
    dt: record.eventTime ?? null,
    tickets: record.ticketsSold ?? null,
  };
}

export function tableObjects(table: OutputTable, limit: number): Array<Record<string, CellValue>> {
  return table.rows
    .slice(0, limit)
    .map(row => Object.fromEntries(table.headers.map((header, i) => [header, row[i] ?? null])));
}

/** First `limit` records per side plus the first `limit` consolidated rows. */
export function buildPreview(opts: {
  labels: SideLabels;
  recordsA: readonly RawEventRecord[];
  recordsB: readonly RawEventRecord[];
  table: OutputTable;
  limit: number;
}): Preview {
  return {
    [opts.labels.a]: opts.recordsA.slice(0, opts.limit).map(previewEntry),
    [opts.labels.b]: opts.recordsB.slice(0, opts.limit).map(previewEntry),
    consolidated: tableObjects(opts.table, opts.limit),
  };
}

export function writePreview(file: string, preview: Preview) {
  try {
    saveJSON(file, preview);
  } catch (err) {
    throw new SinkError('preview', `could not write ${file}: ${describeError(err)}`, { cause: err });
  }
  console.log('[preview] wrote', { file });
}
