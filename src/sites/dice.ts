// src/sites/dice.ts
import type { DiceConfig } from '../config';
import { AdapterError } from '../errors';
import type { RawEventRecord } from '../matching/types';
import { parseDiceNode, parseDicePage } from '../parsers/parse_dice';
import { sleep, withRetry, type RetryOptions } from '../utils';
import { failSoft, type AdapterContext, type EventSourceAdapter } from './adapter';

export const DICE_EVENTS_QUERY = `
query Events($after: String, $from: Datetime, $first: Int) {
  viewer {
    events(first: $first, after: $after, where: { startDatetime: { gte: $from } }) {
      totalCount
      pageInfo { endCursor hasNextPage }
      edges {
        node {
          id
          name
          startDatetime
          currency
          artists { name }
          venues { name city country timezoneName }
          tickets(first: 1) { totalCount }
        }
      }
    }
  }
}
`;

export type HttpResponse = { ok: boolean; status: number; json(): Promise<unknown> };
export type HttpPost = (
  url: string,
  init: { method: 'POST'; headers: Record<string, string>; body: string; signal?: AbortSignal },
) => Promise<HttpResponse>;

const defaultPost: HttpPost = (url, init) => fetch(url, init);

/** Start of the query window: midnight UTC `days` ago. */
export function windowStart(now: Date, days: number): string {
  const from = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() - days));
  return from.toISOString();
}

export class DiceAdapter implements EventSourceAdapter {
  readonly name = 'dice' as const;

  constructor(
    private readonly config: DiceConfig,
    private readonly retry: RetryOptions,
    private readonly post: HttpPost = defaultPost,
    private readonly wait: (ms: number) => Promise<void> = sleep,
  ) {}

  produceEvents(ctx: AdapterContext): Promise<RawEventRecord[]> {
    return failSoft(this.name, () => this.fetchEvents(ctx));
  }

  /** Throws on transport or GraphQL failure; callers wanting fail-soft use produceEvents. */
  async fetchEvents(ctx: AdapterContext): Promise<RawEventRecord[]> {
    const provenance = {
      runId: ctx.runId,
      scrapeTimestampUtc: ctx.scrapedAt.toISOString(),
      sourceUrl: this.config.endpoint,
    };
    const from = windowStart(ctx.scrapedAt, this.config.lookbackDays);
    const records: RawEventRecord[] = [];
    let after: string | null = null;

    for (let page = 1; page <= this.config.maxPages; page++) {
      const variables = { after, from, first: this.config.pageSize };
      const payload = await withRetry(`dice page ${page}`, () => this.query(variables), this.retry, this.wait);
      const result = parseDicePage(payload);

      for (const node of result.nodes) {
        const record = parseDiceNode(node, provenance);
        if (record) records.push(record);
      }
      console.log(`[dice] page ${page}, ${records.length} events so far`, { totalCount: result.totalCount });

      if (!result.hasNextPage) return records;
      if (!result.endCursor) {
        console.warn('[dice] hasNextPage without a cursor, stopping');
        return records;
      }
      after = result.endCursor;
    }

    console.warn(`[dice] page guard reached (${this.config.maxPages}), stopping`, { events: records.length });
    return records;
  }

  private async query(variables: Record<string, unknown>): Promise<unknown> {
    const res = await this.post(this.config.endpoint, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.config.token}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ query: DICE_EVENTS_QUERY, variables }),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
    if (!res.ok) throw new AdapterError('dice', `HTTP ${res.status} from GraphQL endpoint`);
    return res.json();
  }
}
