import type { RawEventRecord } from '../types';
import { prepareRecord, type PreparedRecord, type Side } from '../scoring';

export const REFERENCE = new Date(Date.UTC(2025, 8, 1, 12, 0));

export function makeRecord(fields: Partial<RawEventRecord> & Pick<RawEventRecord, 'sourceId' | 'displayName'>): RawEventRecord {
  return {
    status: 'on_sale',
    scrapeTimestampUtc: '2025-09-01T12:00:00Z',
    runId: 'run-test',
    ...fields,
  };
}

export function prepared(
  fields: Partial<RawEventRecord> & Pick<RawEventRecord, 'sourceId' | 'displayName'>,
  side: Side = 'a',
  index = 0,
): PreparedRecord {
  return prepareRecord(makeRecord(fields), side, index, REFERENCE);
}
