// src/matching/reconcile.ts
import {
  DEFAULT_MATCHER_CONFIG,
  type MatchRule,
  type MatcherConfig,
  type MergedRow,
  type RawEventRecord,
  type ReconcileResult,
} from './types';
import { prepareRecord, scorePair, type PreparedRecord, type Scorer, type Side } from './scoring';
import { createPolicy, linkUndated, UsedIds, type Link } from './policies';
import { firstPresent, preferA } from './fields';

export type ReconcileOptions = {
  scorer?: Scorer;
  /** Year inference for textual dates without a year. */
  reference?: Date;
};

function dedupeBySourceId(records: readonly RawEventRecord[]): { unique: RawEventRecord[]; dropped: number } {
  const seen = new Set<string>();
  const unique: RawEventRecord[] = [];
  for (const record of records) {
    if (seen.has(record.sourceId)) continue;
    seen.add(record.sourceId);
    unique.push(record);
  }
  return { unique, dropped: records.length - unique.length };
}

function buildRow(a: PreparedRecord | null, b: PreparedRecord | null, rule: MatchRule | null, score: number | null): MergedRow {
  return {
    eventName: preferA(a, b, p => firstPresent(p.record.displayName)) ?? '',
    eventDate: preferA(a, b, p => p.time?.day ?? null),
    artist: preferA(a, b, p => p.artist) ?? '',
    venue: preferA(a, b, p => p.venue) ?? '',
    ticketsSoldA: a?.record.ticketsSold ?? null,
    ticketsSoldB: b?.record.ticketsSold ?? null,
    sourceAId: a?.record.sourceId ?? null,
    sourceBId: b?.record.sourceId ?? null,
    matchedBy: rule,
    score,
    recordA: a?.record ?? null,
    recordB: b?.record ?? null,
  };
}

function singleton(record: PreparedRecord): MergedRow {
  return record.side === 'a' ? buildRow(record, null, null, null) : buildRow(null, record, null, null);
}

function prepareSide(records: readonly RawEventRecord[], side: Side, reference?: Date): PreparedRecord[] {
  return records.map((record, index) => prepareRecord(record, side, index, reference));
}

/**
 * Links side A and side B into one row per concert. Pure: the same inputs and config give the
 * same rows in the same order (matched pairs in link order, then A leftovers, then B leftovers).
 */
export function reconcile(
  sideA: readonly RawEventRecord[],
  sideB: readonly RawEventRecord[],
  config: Partial<MatcherConfig> = {},
  options: ReconcileOptions = {},
): ReconcileResult {
  const settings: MatcherConfig = { ...DEFAULT_MATCHER_CONFIG, ...config };
  const scorer = options.scorer ?? scorePair;

  const a = dedupeBySourceId(sideA);
  const b = dedupeBySourceId(sideB);
  const preparedA = prepareSide(a.unique, 'a', options.reference);
  const preparedB = prepareSide(b.unique, 'b', options.reference);

  const used = new UsedIds();
  const links: Link[] = createPolicy(settings, scorer).link(preparedA, preparedB, used);
  if (settings.undatedFallback) {
    links.push(...linkUndated(preparedA, preparedB, used));
  }

  const leftoverA = preparedA.filter(record => used.isFree(record));
  const leftoverB = preparedB.filter(record => used.isFree(record));

  const rows: MergedRow[] = [
    ...links.map(link => buildRow(link.a, link.b, link.rule, link.score)),
    ...leftoverA.map(singleton),
    ...leftoverB.map(singleton),
  ];

  const pairsByRule: Record<MatchRule, number> = { strict: 0, threshold: 0, greedy: 0, 'artist-venue': 0 };
  for (const link of links) pairsByRule[link.rule] += 1;

  return {
    rows,
    stats: {
      strategy: settings.strategy,
      inputA: sideA.length,
      inputB: sideB.length,
      duplicatesDropped: a.dropped + b.dropped,
      matchedPairs: links.length,
      pairsByRule,
      singletonsA: leftoverA.length,
      singletonsB: leftoverB.length,
    },
  };
}
