// src/sinks/sink.ts
import type { CellValue, OutputTable, RawEventRecord } from '../matching/types';

/** Destination of the consolidated table. `publish` overwrites what a previous run wrote. */
export interface TableSink {
  readonly name: string;
  publish(table: OutputTable): Promise<void>;
}

/** A raw record tagged with the side label it came from. */
export type LabelledRecord = { provider: string; record: RawEventRecord };

export const RECORD_COLUMNS = [
  'provider',
  'source_id',
  'event_name',
  'artist',
  'venue',
  'city',
  'country',
  'event_time',
  'timezone',
  'status',
  'tickets_sold',
  'gross_total',
  'currency',
  'sell_through_pct',
  'scrape_ts_utc',
  'run_id',
] as const;

export function recordRow({ provider, record }: LabelledRecord): CellValue[] {
  return [
    provider,
    record.sourceId,
    record.displayName,
    record.artistName ?? null,
    record.venueName ?? null,
    record.city ?? null,
    record.country ?? null,
    record.eventTime ?? null,
    typeof record.extra?.timezone === 'string' ? record.extra.timezone : null,
    record.status,
    record.ticketsSold ?? null,
    record.grossAmount ?? null,
    record.currency ?? null,
    record.sellThroughPct ?? null,
    record.scrapeTimestampUtc,
    record.runId,
  ];
}

export function labelRecords(provider: string, records: readonly RawEventRecord[]): LabelledRecord[] {
  return records.map(record => ({ provider, record }));
}
