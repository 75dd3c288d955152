// src/matching/fields.ts
import type { RawEventRecord } from './types';
import { parseEventTime, type EventInstant } from './normalize_date';

// "Artist @ Venue", "Artist - Venue", "Artist – Venue". A bare hyphen ("Jay-Z") is not a separator.
const DISPLAY_SPLIT_RE = /^\s*(.+?)\s*(?:@|\s[-–—]\s)\s*(.+?)\s*$/;

export function firstPresent(...values: Array<string | null | undefined>): string | null {
  for (const value of values) {
    if (typeof value !== 'string') continue;
    const trimmed = value.trim();
    if (trimmed.length > 0) return trimmed;
  }
  return null;
}

export function splitDisplayName(displayName: string): { artist: string; venue: string | null } {
  const m = displayName.match(DISPLAY_SPLIT_RE);
  if (!m) return { artist: displayName.trim(), venue: null };
  return { artist: m[1], venue: m[2] };
}

export function resolveArtist(record: RawEventRecord): string | null {
  return firstPresent(record.artistName, splitDisplayName(record.displayName).artist, record.displayName);
}

export function resolveVenue(record: RawEventRecord): string | null {
  return firstPresent(record.venueName, splitDisplayName(record.displayName).venue, record.city);
}

export function resolveEventTime(record: RawEventRecord, reference?: Date): EventInstant | null {
  return parseEventTime(record.eventTime, reference);
}

/** Side A wins, side B fills the gap. */
export function preferA<T, V>(a: T | null, b: T | null, pick: (item: T) => V | null): V | null {
  const fromA = a !== null ? pick(a) : null;
  if (fromA !== null) return fromA;
  return b !== null ? pick(b) : null;
}
