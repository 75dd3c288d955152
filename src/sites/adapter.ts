// src/sites/adapter.ts
import type { SourceName } from '../config';
import { describeError } from '../errors';
import type { RawEventRecord } from '../matching/types';
import { recordAdapterFailure } from '../metrics';

export type AdapterContext = {
  runId: string;
  scrapedAt: Date;
};

/** One box-office source. `produceEvents` resolves to `[]` on failure instead of rejecting. */
export interface EventSourceAdapter {
  readonly name: SourceName;
  produceEvents(ctx: AdapterContext): Promise<RawEventRecord[]>;
}

export async function failSoft(source: string, work: () => Promise<RawEventRecord[]>): Promise<RawEventRecord[]> {
  try {
    return await work();
  } catch (err) {
    console.error(`[${source}] adapter failed, continuing without its events`, { error: describeError(err) });
    recordAdapterFailure(source);
    return [];
  }
}

/** Guards the orchestrator against an adapter that breaks its contract and rejects anyway. */
export function collectEvents(adapter: EventSourceAdapter, ctx: AdapterContext): Promise<RawEventRecord[]> {
  return failSoft(adapter.name, () => adapter.produceEvents(ctx));
}
