// src/parsers/parse_dice.ts
import { z } from 'zod';
import { AdapterError } from '../errors';
import type { RawEventRecord, RecordProvenance } from '../matching/types';

const optionalText = z.string().nullish();

const venueSchema = z.object({
  name: optionalText,
  city: optionalText,
  country: optionalText,
  timezoneName: optionalText,
});

export const diceNodeSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: optionalText,
  startDatetime: optionalText,
  currency: optionalText,
  artists: z.array(z.object({ name: optionalText }).nullable()).nullish(),
  venues: z.array(venueSchema.nullable()).nullish(),
  tickets: z.object({ totalCount: z.union([z.number(), z.string()]).nullish() }).nullish(),
});

export type DiceNode = z.infer<typeof diceNodeSchema>;

const pageSchema = z.object({
  data: z
    .object({
      viewer: z.object({
        events: z.object({
          totalCount: z.number().nullish(),
          pageInfo: z.object({ endCursor: optionalText, hasNextPage: z.boolean().nullish() }),
          edges: z.array(z.object({ node: z.unknown() }).nullable()),
        }),
      }),
    })
    .nullish(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).nullish(),
});

export type DicePage = {
  nodes: unknown[];
  endCursor: string | null;
  hasNextPage: boolean;
  totalCount: number | null;
};

export const DEFAULT_TIMEZONE = 'Europe/Paris';

/** One GraphQL response body -> its event nodes and cursor. A non-empty `errors` array is a failure. */
export function parseDicePage(payload: unknown): DicePage {
  const parsed = pageSchema.safeParse(payload);
  if (!parsed.success) {
    throw new AdapterError('dice', `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  const { data, errors } = parsed.data;
  if (errors && errors.length > 0) {
    throw new AdapterError('dice', `GraphQL errors: ${errors.map(e => e.message).join('; ')}`);
  }
  if (!data) throw new AdapterError('dice', 'response has no data');

  const { events } = data.viewer;
  return {
    nodes: events.edges.flatMap(edge => (edge ? [edge.node] : [])),
    endCursor: events.pageInfo.endCursor ?? null,
    hasNextPage: events.pageInfo.hasNextPage ?? false,
    totalCount: events.totalCount ?? null,
  };
}

/** Accepts 12 or "12"; anything else is unknown. */
export function toTicketCount(value: number | string | null | undefined): number | null {
  if (typeof value === 'number') return Number.isInteger(value) && value >= 0 ? value : null;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value.trim());
  return null;
}

function trimmed(value: string | null | undefined): string | null {
  const v = value?.trim();
  return v ? v : null;
}

export function parseDiceNode(node: unknown, provenance: RecordProvenance): RawEventRecord | null {
  const parsed = diceNodeSchema.safeParse(node);
  if (!parsed.success) {
    console.warn('[dice] skipping malformed event node', { issue: parsed.error.issues[0]?.message });
    return null;
  }
  const ev = parsed.data;
  const displayName = trimmed(ev.name);
  if (!displayName) return null;

  const venue = ev.venues?.find(v => v !== null) ?? null;
  const artist = ev.artists?.find(a => a !== null) ?? null;
  const city = trimmed(venue?.city);

  return {
    sourceId: ev.id,
    displayName,
    artistName: trimmed(artist?.name),
    venueName: trimmed(venue?.name) ?? city,
    city,
    country: trimmed(venue?.country),
    eventTime: trimmed(ev.startDatetime),
    ticketsSold: toTicketCount(ev.tickets?.totalCount),
    grossAmount: null,
    currency: trimmed(ev.currency),
    sellThroughPct: null,
    status: 'on_sale',
    sourceUrl: provenance.sourceUrl,
    scrapeTimestampUtc: provenance.scrapeTimestampUtc,
    runId: provenance.runId,
    extra: { timezone: trimmed(venue?.timezoneName) ?? DEFAULT_TIMEZONE },
  };
}
