// src/matching/scoring.ts
import type { MatcherConfig, RawEventRecord } from './types';
import { canonicalName, containsWords, overlapCoefficient, splitBill, tokenize } from './normalize_text';
import { dayDistance, sameSlot, type EventInstant } from './normalize_date';
import { resolveArtist, resolveEventTime, resolveVenue } from './fields';

export type Side = 'a' | 'b';

/** A record with its matching keys computed once. */
export type PreparedRecord = {
  side: Side;
  index: number;
  record: RawEventRecord;
  artist: string | null;
  artistKey: string;
  billParts: string[];
  artistTokens: Set<string>;
  venue: string | null;
  venueKey: string;
  venueTokens: Set<string>;
  nameKey: string;
  time: EventInstant | null;
};

export type PairScore = {
  artist: number;
  venue: number;
  date: number;
  total: number;
};

/** Returns null when the pair cannot denote the same concert. Must be symmetric. */
export type Scorer = (a: PreparedRecord, b: PreparedRecord, config: MatcherConfig) => PairScore | null;

export const RUBRIC = {
  artistExact: 50,
  artistContained: 35,
  artistOverlap: 30,
  venueExact: 20,
  venueOverlap: 15,
  sameDay: 30,
  withinTolerance: 20,
  adjacentDay: 10,
} as const;

// shorter names ("mc", "dj") would be contained in too many bills
const MIN_CONTAINED_LENGTH = 3;

const round2 = (n: number) => Math.round(n * 100) / 100;

export function prepareRecord(record: RawEventRecord, side: Side, index: number, reference?: Date): PreparedRecord {
  const artist = resolveArtist(record);
  const venue = resolveVenue(record);
  return {
    side,
    index,
    record,
    artist,
    artistKey: canonicalName(artist),
    billParts: splitBill(artist),
    artistTokens: tokenize(artist),
    venue,
    venueKey: canonicalName(venue),
    venueTokens: tokenize(venue, record.city),
    nameKey: canonicalName(record.displayName),
    time: resolveEventTime(record, reference),
  };
}

function contained(outer: PreparedRecord, inner: PreparedRecord): boolean {
  if (inner.artistKey.length < MIN_CONTAINED_LENGTH) return false;
  return outer.billParts.includes(inner.artistKey) || containsWords(outer.artistKey, inner.artistKey);
}

export function artistScore(a: PreparedRecord, b: PreparedRecord): number {
  if (!a.artistKey || !b.artistKey) return 0;
  if (a.artistKey === b.artistKey) return RUBRIC.artistExact;
  if (contained(a, b) || contained(b, a)) return RUBRIC.artistContained;
  return round2(RUBRIC.artistOverlap * overlapCoefficient(a.artistTokens, b.artistTokens));
}

export function venueScore(a: PreparedRecord, b: PreparedRecord): number {
  if (!a.venueKey || !b.venueKey) return 0;
  if (a.venueKey === b.venueKey) return RUBRIC.venueExact;
  return round2(RUBRIC.venueOverlap * overlapCoefficient(a.venueTokens, b.venueTokens));
}

/** null when the dates rule the pair out (or either is unknown). */
export function dateScore(a: PreparedRecord, b: PreparedRecord, config: MatcherConfig): number | null {
  if (!a.time || !b.time) return null;
  const distance = dayDistance(a.time, b.time);
  if (distance === null) return null;
  if (distance === 0) return RUBRIC.sameDay;
  if (sameSlot(a.time, b.time, config.toleranceMinutes)) return RUBRIC.withinTolerance;
  if (distance === 1 && config.adjacentDays) return RUBRIC.adjacentDay;
  return null;
}

export const scorePair: Scorer = (a, b, config) => {
  const date = dateScore(a, b, config);
  if (date === null) return null;
  const artist = artistScore(a, b);
  if (artist === 0) return null;
  const venue = venueScore(a, b);
  return { artist, venue, date, total: round2(artist + venue + date) };
};
