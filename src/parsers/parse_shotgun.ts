// src/parsers/parse_shotgun.ts
import crypto from 'crypto';
import type { CellValue, EventStatus, RawEventRecord, RecordProvenance } from '../matching/types';
import { formatInstant, parseEventTime } from '../matching/normalize_date';

/** What the dashboard flow pulls out of one event card. */
export type ShotgunCard = {
  href: string | null;
  title: string;
  lines: string[];
};

const EVENT_ID_RE = /\/events\/([A-Za-z0-9_-]+)/;

// Only lines that look like a date are handed to the date parser.
const DATE_HINT_RE = new RegExp(
  [
    String.raw`\d{4}-\d{2}-\d{2}`,
    String.raw`\d{1,2}[/.]\d{1,2}[/.]\d{4}`,
    String.raw`\d{1,2}(?:er)?\s+(?:janv|f[ée]vr|mars|avr|mai|juin|juil|ao[uû]t|sept|oct|nov|d[ée]c|jan|feb|mar|apr|may|jun|jul|aug|sep|dec)`,
    String.raw`\b(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\.?\s+\d{1,2}\b`,
  ].join('|'),
  'i',
);

const NUM = String.raw`\d[\d\s.,]*`;
const SOLD_OF_RE = new RegExp(String.raw`(${NUM}?)\s*\/\s*(${NUM}?)\s*(?:billets?|tickets?|places?)?\s*(?:vendus?|sold)?\s*$`, 'i');
const SOLD_RE = new RegExp(String.raw`(${NUM}?)\s*(?:billets?|tickets?|places?)\s*(?:vendus?|sold)?`, 'i');
const SOLD_SUFFIX_RE = new RegExp(String.raw`(${NUM})\s*(?:vendus?|sold)\b`, 'i');
const SOLD_LABEL_RE = new RegExp(String.raw`(?:vendus?|sold)\s*:?\s*(${NUM}?)\s*$`, 'i');
const PCT_RE = /(\d{1,3}(?:[.,]\d+)?)\s*%/;
const AMOUNT = String.raw`\d[\d\s.,]*\d|\d`;
const GROSS_PREFIX_RE = new RegExp(String.raw`(€|\$|£)\s*(${AMOUNT})`);
const GROSS_SUFFIX_RE = new RegExp(String.raw`(${AMOUNT})\s*(€|EUR|\$|USD|£|GBP)(?![A-Za-z])`, 'i');
const VENUE_LINE_RE = /\s[·•|]\s/;

const CURRENCIES: Record<string, string> = { '€': 'EUR', eur: 'EUR', '$': 'USD', usd: 'USD', '£': 'GBP', gbp: 'GBP' };

const STATUS_RULES: ReadonlyArray<[RegExp, EventStatus]> = [
  [/\bannul|\bcancel/i, 'canceled'],
  [/\breport[ée]|\bpostpon/i, 'postponed'],
  [/\bcomplet\b|sold\s*out/i, 'sold_out'],
];

/** Whole count: every separator is a thousands separator. */
export function parseCount(text: string | undefined): number | null {
  if (!text) return null;
  const digits = text.replace(/[\s.,]/g, '');
  if (!/^\d+$/.test(digits)) return null;
  return Number(digits);
}

/** "1 234,50", "1,234.50", "1.234", "980" -> number. The last separator followed by 1-2 digits is the decimal point. */
export function parseAmount(text: string | undefined): number | null {
  if (!text) return null;
  const compact = text.replace(/\s/g, '');
  const m = compact.match(/^(\d[\d.,]*?)(?:[.,](\d{1,2}))?$/);
  if (!m) return null;
  const whole = m[1].replace(/[.,]/g, '');
  if (!/^\d+$/.test(whole)) return null;
  return Number(m[2] ? `${whole}.${m[2]}` : whole);
}

function firstMatch(lines: readonly string[], re: RegExp): RegExpMatchArray | null {
  for (const line of lines) {
    const m = line.match(re);
    if (m) return m;
  }
  return null;
}

function detectStatus(texts: readonly string[]): EventStatus {
  for (const [re, status] of STATUS_RULES) {
    if (texts.some(t => re.test(t))) return status;
  }
  return 'on_sale';
}

function detectGross(lines: readonly string[]): { amount: number | null; currency: string | null } {
  for (const line of lines) {
    const prefix = line.match(GROSS_PREFIX_RE);
    if (prefix) return { amount: parseAmount(prefix[2]), currency: CURRENCIES[prefix[1].toLowerCase()] ?? null };
    const suffix = line.match(GROSS_SUFFIX_RE);
    if (suffix) return { amount: parseAmount(suffix[1]), currency: CURRENCIES[suffix[2].toLowerCase()] ?? null };
  }
  return { amount: null, currency: null };
}

function detectSold(lines: readonly string[]): { sold: number | null; capacity: number | null } {
  // money and percentages are not counts
  const candidates = lines.filter(l => !GROSS_PREFIX_RE.test(l) && !GROSS_SUFFIX_RE.test(l) && !PCT_RE.test(l) && !DATE_HINT_RE.test(l));
  const of = firstMatch(candidates, SOLD_OF_RE);
  if (of) return { sold: parseCount(of[1]), capacity: parseCount(of[2]) };
  const plain = firstMatch(candidates, SOLD_RE) ?? firstMatch(candidates, SOLD_SUFFIX_RE) ?? firstMatch(candidates, SOLD_LABEL_RE);
  return { sold: plain ? parseCount(plain[1]) : null, capacity: null };
}

function detectVenue(lines: readonly string[]): { venue: string | null; city: string | null } {
  const line = lines.find(l => VENUE_LINE_RE.test(l) && !DATE_HINT_RE.test(l));
  if (!line) return { venue: null, city: null };
  const parts = line.split(/\s[·•|]\s/).map(p => p.trim()).filter(Boolean);
  return { venue: parts[0] ?? null, city: parts.length > 1 ? parts[parts.length - 1] : null };
}

function stableId(title: string, dateText: string | null): string {
  const digest = crypto.createHash('sha1').update(`${title}|${dateText ?? ''}`).digest('hex');
  return `sg-${digest.slice(0, 12)}`;
}

function absoluteUrl(href: string | null, base: string | undefined): string | undefined {
  if (!href) return base;
  try {
    return new URL(href, base).toString();
  } catch {
    return base;
  }
}

/** One dashboard card -> record. Cards without a title are dropped. */
export function parseShotgunCard(card: ShotgunCard, provenance: RecordProvenance, reference?: Date): RawEventRecord | null {
  const title = card.title.replace(/\s+/g, ' ').trim();
  if (!title) return null;
  const lines = card.lines.map(l => l.replace(/\s+/g, ' ').trim()).filter(l => l && l !== title);

  const dateLine = lines.find(l => DATE_HINT_RE.test(l)) ?? null;
  const instant = dateLine ? parseEventTime(dateLine, reference) : null;
  const { sold, capacity } = detectSold(lines);
  const pct = firstMatch(lines, PCT_RE);
  const gross = detectGross(lines);
  const { venue, city } = detectVenue(lines);

  let sellThroughPct = pct ? Number(pct[1].replace(',', '.')) : null;
  if (sellThroughPct === null && sold !== null && capacity) {
    sellThroughPct = Math.round((sold / capacity) * 1000) / 10;
  }

  const idFromLink = card.href?.match(EVENT_ID_RE)?.[1];
  const extra: Record<string, CellValue> = { capacity };

  return {
    sourceId: idFromLink ?? stableId(title, dateLine),
    displayName: title,
    artistName: null,
    venueName: venue,
    city,
    country: null,
    eventTime: instant ? formatInstant(instant) : null,
    ticketsSold: sold,
    grossAmount: gross.amount,
    currency: gross.currency,
    sellThroughPct,
    status: detectStatus([title, ...lines]),
    sourceUrl: absoluteUrl(card.href, provenance.sourceUrl),
    scrapeTimestampUtc: provenance.scrapeTimestampUtc,
    runId: provenance.runId,
    extra,
  };
}

export function parseShotgunCards(cards: readonly ShotgunCard[], provenance: RecordProvenance, reference?: Date): RawEventRecord[] {
  const out: RawEventRecord[] = [];
  for (const card of cards) {
    const record = parseShotgunCard(card, provenance, reference);
    if (record) out.push(record);
  }
  return out;
}
