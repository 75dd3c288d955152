// src/matching/types.ts
export type EventStatus = 'on_sale' | 'sold_out' | 'canceled' | 'postponed';

export type CellValue = string | number | null;

/** One scraped event card/node, as handed over by a source adapter. Never mutated downstream. */
export type RawEventRecord = {
  sourceId: string;
  displayName: string;
  artistName?: string | null;
  venueName?: string | null;
  city?: string | null;
  country?: string | null;
  // ISO (aware or naive), date-only, or whatever text the dashboard shows
  eventTime?: string | null;
  ticketsSold?: number | null;
  grossAmount?: number | null;
  currency?: string | null;
  sellThroughPct?: number | null;
  status: EventStatus;
  sourceUrl?: string;
  scrapeTimestampUtc: string;
  runId: string;
  extra?: Record<string, CellValue>;
};

/** Fields every adapter stamps on the records of one run. */
export type RecordProvenance = Pick<RawEventRecord, 'runId' | 'scrapeTimestampUtc'> & { sourceUrl?: string };

export type MatchStrategy = 'strict' | 'threshold' | 'greedy';
export type BucketKey = 'day' | 'day-venue' | 'artist-day';
export type StrictKey = 'name-time' | 'artist-day';
export type MatchRule = MatchStrategy | 'artist-venue';

export type MatcherConfig = {
  strategy: MatchStrategy;
  minScore: number;
  toleranceMinutes: number;
  adjacentDays: boolean;
  bucketKey: BucketKey;
  strictKey: StrictKey;
  undatedFallback: boolean;
};

export const DEFAULT_MATCHER_CONFIG: MatcherConfig = {
  strategy: 'threshold',
  minScore: 55,
  toleranceMinutes: 30,
  adjacentDays: true,
  bucketKey: 'day',
  strictKey: 'name-time',
  undatedFallback: true,
};

export type MergedRow = {
  eventName: string;
  eventDate: string | null;
  artist: string;
  venue: string;
  ticketsSoldA: number | null;
  ticketsSoldB: number | null;
  sourceAId: string | null;
  sourceBId: string | null;
  matchedBy: MatchRule | null;
  score: number | null;
  recordA: RawEventRecord | null;
  recordB: RawEventRecord | null;
};

export type ReconcileStats = {
  strategy: MatchStrategy;
  inputA: number;
  inputB: number;
  duplicatesDropped: number;
  matchedPairs: number;
  pairsByRule: Record<MatchRule, number>;
  singletonsA: number;
  singletonsB: number;
};

export type ReconcileResult = {
  rows: MergedRow[];
  stats: ReconcileStats;
};

export type SideLabels = { a: string; b: string };

export type OutputRow = {
  eventName: string;
  eventDate: string;
  artist: string;
  venue: string;
  ticketsSoldA: number | null;
  ticketsSoldB: number | null;
  sourceAId: string | null;
  sourceBId: string | null;
  extras: Record<string, CellValue>;
};

export type OutputTable = {
  headers: string[];
  rows: CellValue[][];
};
