// src/matching/project_rows.ts
import type { CellValue, MergedRow, OutputRow, OutputTable, RawEventRecord, SideLabels } from './types';

export const DEFAULT_SIDE_LABELS: SideLabels = { a: 'shotgun', b: 'dice' };

function fixedHeaders(labels: SideLabels): string[] {
  return [
    'event_name',
    'event_date',
    'artist',
    'venue',
    `${labels.a}_tickets_sold`,
    `${labels.b}_tickets_sold`,
    `${labels.a}_event_id`,
    `${labels.b}_event_id`,
  ];
}

function provenance(record: RawEventRecord, label: string): Record<string, CellValue> {
  const out: Record<string, CellValue> = {
    [`${label}_status`]: record.status,
    [`${label}_gross_total`]: record.grossAmount ?? null,
    [`${label}_currency`]: record.currency ?? null,
    [`${label}_sell_through_pct`]: record.sellThroughPct ?? null,
    [`${label}_city`]: record.city ?? null,
    [`${label}_country`]: record.country ?? null,
  };
  for (const [key, value] of Object.entries(record.extra ?? {})) {
    out[`${label}_${key}`] = value;
  }
  return out;
}

export function projectRow(merged: MergedRow, labels: SideLabels = DEFAULT_SIDE_LABELS): OutputRow {
  const extras: Record<string, CellValue> = {
    match_method: merged.matchedBy ?? (merged.recordA ? `${labels.a}_only` : `${labels.b}_only`),
    match_score: merged.score,
    ...(merged.recordA ? provenance(merged.recordA, labels.a) : {}),
    ...(merged.recordB ? provenance(merged.recordB, labels.b) : {}),
  };

  return {
    eventName: merged.eventName,
    eventDate: merged.eventDate ?? '',
    artist: merged.artist,
    venue: merged.venue,
    ticketsSoldA: merged.ticketsSoldA,
    ticketsSoldB: merged.ticketsSoldB,
    sourceAId: merged.sourceAId,
    sourceBId: merged.sourceBId,
    extras,
  };
}

/** Stable: date string ascending (unknown date is '' and comes first), then lower-case name. */
export function sortRows(rows: readonly OutputRow[]): OutputRow[] {
  return rows
    .map((row, position) => ({ row, position, name: row.eventName.toLowerCase() }))
    .sort((x, y) => {
      if (x.row.eventDate !== y.row.eventDate) return x.row.eventDate < y.row.eventDate ? -1 : 1;
      if (x.name !== y.name) return x.name < y.name ? -1 : 1;
      return x.position - y.position;
    })
    .map(entry => entry.row);
}

/** Fixed columns first, then every extra key seen in any row, sorted. */
export function buildHeaders(rows: readonly OutputRow[], labels: SideLabels = DEFAULT_SIDE_LABELS): string[] {
  const fixed = fixedHeaders(labels);
  const taken = new Set(fixed);
  const extra = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row.extras)) {
      if (!taken.has(key)) extra.add(key);
    }
  }
  return [...fixed, ...Array.from(extra).sort()];
}

export function toTable(rows: readonly OutputRow[], labels: SideLabels = DEFAULT_SIDE_LABELS): OutputTable {
  const headers = buildHeaders(rows, labels);
  const extraHeaders = headers.slice(fixedHeaders(labels).length);
  return {
    headers,
    rows: rows.map(row => [
      row.eventName,
      row.eventDate,
      row.artist,
      row.venue,
      row.ticketsSoldA,
      row.ticketsSoldB,
      row.sourceAId,
      row.sourceBId,
      ...extraHeaders.map(key => row.extras[key] ?? null),
    ]),
  };
}

/** Reconciled rows -> sorted, flat table ready for a sink. */
export function projectTable(merged: readonly MergedRow[], labels: SideLabels = DEFAULT_SIDE_LABELS): OutputTable {
  return toTable(sortRows(merged.map(row => projectRow(row, labels))), labels);
}
