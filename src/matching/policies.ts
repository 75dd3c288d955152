// src/matching/policies.ts
import type { MatchRule, MatchStrategy, MatcherConfig } from './types';
import type { PreparedRecord, Scorer } from './scoring';
import { BucketIndex } from './bucket_index';
import { shiftDay, slotKey } from './normalize_date';

export type Link = {
  a: PreparedRecord;
  b: PreparedRecord;
  rule: MatchRule;
  score: number | null;
};

/** Consumption ledger: a source id is linked at most once per side. */
export class UsedIds {
  private readonly a = new Set<string>();
  private readonly b = new Set<string>();

  isFree(record: PreparedRecord): boolean {
    const set = record.side === 'a' ? this.a : this.b;
    return !set.has(record.record.sourceId);
  }

  consume(a: PreparedRecord, b: PreparedRecord): void {
    this.a.add(a.record.sourceId);
    this.b.add(b.record.sourceId);
  }
}

export interface MatchPolicy {
  readonly strategy: MatchStrategy;
  /** Links side-B records to side-A records, consuming both through `used`. Inputs are read only. */
  link(sideA: readonly PreparedRecord[], sideB: readonly PreparedRecord[], used: UsedIds): Link[];
}

/** Highest score >= minScore; on a tie the earliest side-A record wins. */
function pickBest(
  b: PreparedRecord,
  candidates: readonly PreparedRecord[],
  used: UsedIds,
  scorer: Scorer,
  config: MatcherConfig,
): { a: PreparedRecord; score: number } | null {
  const ordered = [...candidates].sort((x, y) => x.index - y.index);
  let best: { a: PreparedRecord; score: number } | null = null;
  for (const a of ordered) {
    if (!used.isFree(a)) continue;
    const score = scorer(a, b, config);
    if (!score || score.total < config.minScore) continue;
    if (!best || score.total > best.score) best = { a, score: score.total };
  }
  return best;
}

function strictKey(record: PreparedRecord, config: MatcherConfig): string | null {
  if (!record.time) return null;
  if (config.strictKey === 'artist-day') {
    return record.artistKey ? `${record.artistKey}|${record.time.day}` : null;
  }
  return record.nameKey ? `${record.nameKey}|${slotKey(record.time)}` : null;
}

/** Zero tolerance: identical canonical key on both sides. */
export class StrictPolicy implements MatchPolicy {
  readonly strategy = 'strict' as const;

  constructor(private readonly config: MatcherConfig) {}

  link(sideA: readonly PreparedRecord[], sideB: readonly PreparedRecord[], used: UsedIds): Link[] {
    const index = BucketIndex.build(sideA, a => strictKey(a, this.config));
    const links: Link[] = [];
    for (const b of sideB) {
      if (!used.isFree(b)) continue;
      const a = index.get(strictKey(b, this.config)).find(candidate => used.isFree(candidate));
      if (!a) continue;
      used.consume(a, b);
      links.push({ a, b, rule: 'strict', score: null });
    }
    return links;
  }
}

function bucketKey(record: PreparedRecord, day: string, config: MatcherConfig): string | null {
  switch (config.bucketKey) {
    case 'day':
      return day;
    case 'day-venue':
      return record.venueKey ? `${day}|${record.venueKey}` : null;
    case 'artist-day':
      return record.artistKey ? `${record.artistKey}|${day}` : null;
  }
}

/** Day offsets a pair can span and still score: [0, -1, 1, -2, 2, ...]. */
export function dayDeltas(config: Pick<MatcherConfig, 'toleranceMinutes' | 'adjacentDays'>): number[] {
  let span = config.toleranceMinutes > 0 ? Math.floor(config.toleranceMinutes / 1440) + 1 : 0;
  if (config.adjacentDays) span = Math.max(span, 1);
  const deltas = [0];
  for (let d = 1; d <= span; d++) deltas.push(-d, d);
  return deltas;
}

/** Candidates come from the bucket index; best score above the threshold wins. */
export class ThresholdPolicy implements MatchPolicy {
  readonly strategy = 'threshold' as const;

  constructor(private readonly config: MatcherConfig, private readonly scorer: Scorer) {}

  link(sideA: readonly PreparedRecord[], sideB: readonly PreparedRecord[], used: UsedIds): Link[] {
    const index = BucketIndex.build(sideA, a => (a.time ? bucketKey(a, a.time.day, this.config) : null));
    const deltas = dayDeltas(this.config);
    const links: Link[] = [];

    for (const b of sideB) {
      const time = b.time;
      if (!time || !used.isFree(b)) continue;
      const candidates = index.lookup(deltas.map(delta => bucketKey(b, shiftDay(time.day, delta), this.config)));
      const best = pickBest(b, candidates, used, this.scorer, this.config);
      if (!best) continue;
      used.consume(best.a, b);
      links.push({ a: best.a, b, rule: 'threshold', score: best.score });
    }
    return links;
  }
}

/** Every unused dated side-A record is scored; first come, first served, no backtracking. */
export class GreedyPolicy implements MatchPolicy {
  readonly strategy = 'greedy' as const;

  constructor(private readonly config: MatcherConfig, private readonly scorer: Scorer) {}

  link(sideA: readonly PreparedRecord[], sideB: readonly PreparedRecord[], used: UsedIds): Link[] {
    const dated = sideA.filter(a => a.time !== null);
    const links: Link[] = [];
    for (const b of sideB) {
      if (!b.time || !used.isFree(b)) continue;
      const best = pickBest(b, dated, used, this.scorer, this.config);
      if (!best) continue;
      used.consume(best.a, b);
      links.push({ a: best.a, b, rule: 'greedy', score: best.score });
    }
    return links;
  }
}

export function createPolicy(config: MatcherConfig, scorer: Scorer): MatchPolicy {
  switch (config.strategy) {
    case 'strict':
      return new StrictPolicy(config);
    case 'threshold':
      return new ThresholdPolicy(config, scorer);
    case 'greedy':
      return new GreedyPolicy(config, scorer);
  }
}

/**
 * Exact canonical artist + venue for pairs where at least one side has no date.
 * Two dated records never link here: same artist, same venue, other day is another show.
 */
export function linkUndated(sideA: readonly PreparedRecord[], sideB: readonly PreparedRecord[], used: UsedIds): Link[] {
  const keyOf = (r: PreparedRecord) => (r.artistKey && r.venueKey ? `${r.artistKey}|${r.venueKey}` : null);
  const index = BucketIndex.build(sideA, keyOf);
  const links: Link[] = [];
  for (const b of sideB) {
    if (!used.isFree(b)) continue;
    const a = index.get(keyOf(b)).find(candidate => used.isFree(candidate) && (candidate.time === null || b.time === null));
    if (!a) continue;
    used.consume(a, b);
    links.push({ a, b, rule: 'artist-venue', score: null });
  }
  return links;
}
