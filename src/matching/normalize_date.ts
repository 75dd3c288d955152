// src/matching/normalize_date.ts
import * as chrono from 'chrono-node';

/**
 * Wall-clock reading of an event start. `minuteOfDay` is null for date-only values,
 * `offsetMinutes` is null when the source gave a naive local time.
 */
export type EventInstant = {
  day: string;
  minuteOfDay: number | null;
  offsetMinutes: number | null;
};

export type TimeInput = EventInstant | Date | string | null | undefined;

const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;
// 10/10/2025, 10.10.2025 20:00, 10/10/2025 à 20h30
const NUMERIC_RE =
  /^(\d{1,2})[/.](\d{1,2})[/.](\d{4})(?:\s*(?:à|a|at|,|-|·)?\s*(\d{1,2})\s*[:hH]\s*(\d{2})?)?$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

function buildDay(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const check = new Date(Date.UTC(year, month - 1, day));
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

function buildMinute(hour: number, minute: number): number | null {
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) return null;
  return hour * 60 + minute;
}

function parseOffset(raw: string | undefined): number | null {
  if (!raw) return null;
  if (raw.toUpperCase() === 'Z') return 0;
  const m = raw.match(/^([+-])(\d{2}):?(\d{2})?$/);
  if (!m) return null;
  const sign = m[1] === '-' ? -1 : 1;
  return sign * (Number(m[2]) * 60 + Number(m[3] ?? 0));
}

function fromIso(text: string): EventInstant | null {
  const m = text.match(ISO_RE);
  if (!m) return null;
  const day = buildDay(Number(m[1]), Number(m[2]), Number(m[3]));
  if (!day) return null;
  if (m[4] === undefined) return { day, minuteOfDay: null, offsetMinutes: null };
  const minuteOfDay = buildMinute(Number(m[4]), Number(m[5]));
  if (minuteOfDay === null) return null;
  return { day, minuteOfDay, offsetMinutes: parseOffset(m[7]) };
}

function fromNumeric(text: string): EventInstant | null {
  const m = text.match(NUMERIC_RE);
  if (!m) return null;
  // day first: both dashboards are French
  const day = buildDay(Number(m[3]), Number(m[2]), Number(m[1]));
  if (!day) return null;
  if (m[4] === undefined) return { day, minuteOfDay: null, offsetMinutes: null };
  const minuteOfDay = buildMinute(Number(m[4]), Number(m[5] ?? 0));
  if (minuteOfDay === null) return null;
  return { day, minuteOfDay, offsetMinutes: null };
}

function fromText(text: string, reference: Date): EventInstant | null {
  // "20h30" / "20h" are not understood everywhere
  const prepared = text
    .replace(/(\d{1,2})\s*h\s*(\d{2})\b/gi, '$1:$2')
    .replace(/(\d{1,2})\s*h\b/gi, '$1:00');

  // a lone "20:30" parses in either locale; only a result that names the day counts
  const locales = [chrono.fr.parse(prepared, reference), chrono.en.parse(prepared, reference)];
  let result: chrono.ParsedResult | undefined;
  let home: chrono.ParsedResult[] = [];
  for (const results of locales) {
    result = results.find(r => r.start.isCertain('day'));
    if (result) {
      home = results;
      break;
    }
  }
  if (!result) return null;

  const { start } = result;
  const year = start.get('year');
  const month = start.get('month');
  const date = start.get('day');
  if (year === null || month === null || date === null) return null;
  const day = buildDay(year, month, date);
  if (!day) return null;

  // "Ven. 10 oct. · 20:00": the time comes back as its own result
  const isClock = (r: chrono.ParsedResult) => r.start.isCertain('hour') && !r.start.isCertain('day');
  const clock = start.isCertain('hour') ? start : (home.find(isClock) ?? locales.flat().find(isClock))?.start;
  if (!clock) return { day, minuteOfDay: null, offsetMinutes: null };
  const minuteOfDay = buildMinute(clock.get('hour') ?? 0, clock.get('minute') ?? 0);
  if (minuteOfDay === null) return { day, minuteOfDay: null, offsetMinutes: null };
  const offsetMinutes = clock.isCertain('timezoneOffset') ? clock.get('timezoneOffset') : null;
  return { day, minuteOfDay, offsetMinutes };
}

function isInstant(value: TimeInput): value is EventInstant {
  return typeof value === 'object' && value !== null && !(value instanceof Date);
}

/** Never throws: anything unreadable is "date unknown". */
export function parseEventTime(value: TimeInput, reference: Date = new Date()): EventInstant | null {
  if (value === null || value === undefined) return null;
  if (isInstant(value)) return value;

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return {
      day: `${pad(value.getUTCFullYear(), 4)}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`,
      minuteOfDay: value.getUTCHours() * 60 + value.getUTCMinutes(),
      offsetMinutes: 0,
    };
  }

  const text = value.trim();
  if (!text) return null;
  try {
    return fromIso(text) ?? fromNumeric(text) ?? fromText(text, reference);
  } catch (err) {
    console.warn('[dates] could not parse event time', { value: text, error: String(err) });
    return null;
  }
}

export function dayKey(value: TimeInput): string | null {
  return parseEventTime(value)?.day ?? null;
}

/** Exact minute for timed values, the day for date-only ones. */
export function slotKey(value: TimeInput): string | null {
  const instant = parseEventTime(value);
  if (!instant) return null;
  if (instant.minuteOfDay === null) return instant.day;
  return `${instant.day}T${pad(Math.floor(instant.minuteOfDay / 60))}:${pad(instant.minuteOfDay % 60)}`;
}

function dayNumber(day: string): number {
  const [y, m, d] = day.split('-').map(Number);
  return Date.UTC(y, m - 1, d) / MS_PER_DAY;
}

export function shiftDay(day: string, delta: number): string {
  const shifted = new Date((dayNumber(day) + delta) * MS_PER_DAY);
  return `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}

export function dayDistance(a: TimeInput, b: TimeInput): number | null {
  const left = parseEventTime(a);
  const right = parseEventTime(b);
  if (!left || !right) return null;
  return Math.abs(dayNumber(left.day) - dayNumber(right.day));
}

function epochMinutes(instant: EventInstant, minuteOfDay: number, useOffset: boolean): number {
  const offset = useOffset ? instant.offsetMinutes ?? 0 : 0;
  return dayNumber(instant.day) * 24 * 60 + minuteOfDay - offset;
}

/**
 * Both times known and at most `toleranceMinutes` apart. Absolute instants are compared
 * when both sides carry an offset, wall-clock readings otherwise.
 */
export function sameSlot(a: TimeInput, b: TimeInput, toleranceMinutes: number): boolean {
  const left = parseEventTime(a);
  const right = parseEventTime(b);
  if (!left || !right || left.minuteOfDay === null || right.minuteOfDay === null) return false;
  const useOffset = left.offsetMinutes !== null && right.offsetMinutes !== null;
  const diff = Math.abs(
    epochMinutes(left, left.minuteOfDay, useOffset) - epochMinutes(right, right.minuteOfDay, useOffset),
  );
  return diff <= toleranceMinutes;
}

/** ISO-like rendering that keeps what is known: `2025-10-10`, `2025-10-10T20:00`, `2025-10-10T20:00+02:00`. */
export function formatInstant(instant: EventInstant): string {
  if (instant.minuteOfDay === null) return instant.day;
  const base = `${instant.day}T${pad(Math.floor(instant.minuteOfDay / 60))}:${pad(instant.minuteOfDay % 60)}`;
  if (instant.offsetMinutes === null) return base;
  if (instant.offsetMinutes === 0) return `${base}Z`;
  const sign = instant.offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(instant.offsetMinutes);
  return `${base}${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}
