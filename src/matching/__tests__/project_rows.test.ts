import { describe, expect, it } from 'vitest';
import { buildHeaders, projectRow, projectTable, sortRows } from '../project_rows';
import { reconcile } from '../reconcile';
import type { OutputRow } from '../types';
import { makeRecord, REFERENCE } from './helpers';

const shotgun = makeRecord({
  sourceId: 'sg-1',
  displayName: 'Daft Punk',
  artistName: 'Daft Punk',
  venueName: 'Accor Arena',
  city: 'Paris',
  eventTime: '2025-10-10T20:00',
  ticketsSold: 120,
  grossAmount: 4200.5,
  currency: 'EUR',
  extra: { capacity: 500 },
});
const dice = makeRecord({
  sourceId: 'dice-1',
  displayName: 'Daft Punk',
  artistName: 'Daft Punk',
  venueName: 'Accor Arena',
  eventTime: '2025-10-10T20:00',
  ticketsSold: 80,
  status: 'sold_out',
});
const diceOnly = makeRecord({ sourceId: 'dice-2', displayName: 'Justice', eventTime: '2025-09-20', ticketsSold: 50 });

function row(eventName: string, eventDate: string): OutputRow {
  return {
    eventName,
    eventDate,
    artist: '',
    venue: '',
    ticketsSoldA: null,
    ticketsSoldB: null,
    sourceAId: null,
    sourceBId: null,
    extras: {},
  };
}

describe('projectRow', () => {
  const { rows } = reconcile([shotgun], [dice, diceOnly], {}, { reference: REFERENCE });

  it('carries provenance for each side present', () => {
    const out = projectRow(rows[0]);
    expect(out.extras).toMatchObject({
      match_method: 'threshold',
      match_score: 100,
      shotgun_status: 'on_sale',
      shotgun_gross_total: 4200.5,
      shotgun_currency: 'EUR',
      shotgun_city: 'Paris',
      shotgun_capacity: 500,
      dice_status: 'sold_out',
      dice_gross_total: null,
    });
  });

  it('labels singletons by the side they came from', () => {
    const out = projectRow(rows[1], { a: 'left', b: 'right' });
    expect(out.extras.match_method).toBe('right_only');
    expect(out.extras.match_score).toBeNull();
    expect(out.extras).not.toHaveProperty('left_status');
  });
});

describe('sortRows', () => {
  it('orders by date, then name, unknown dates first, stable otherwise', () => {
    const sorted = sortRows([row('b', '2025-10-10'), row('Zed', '2025-10-09'), row('A', '2025-10-10'), row('q', ''), row('a', '2025-10-10')]);
    expect(sorted.map(r => `${r.eventDate}/${r.eventName}`)).toEqual([
      '/q',
      '2025-10-09/Zed',
      '2025-10-10/A',
      '2025-10-10/a',
      '2025-10-10/b',
    ]);
  });
});

describe('buildHeaders', () => {
  it('puts the fixed columns first and sorts the extras', () => {
    const rows: OutputRow[] = [
      { ...row('x', ''), extras: { zeta: 1, match_method: 'strict' } },
      { ...row('y', ''), extras: { alpha: 'a' } },
    ];
    expect(buildHeaders(rows)).toEqual([
      'event_name',
      'event_date',
      'artist',
      'venue',
      'shotgun_tickets_sold',
      'dice_tickets_sold',
      'shotgun_event_id',
      'dice_event_id',
      'alpha',
      'match_method',
      'zeta',
    ]);
  });
});

describe('projectTable', () => {
  it('builds a sorted table with every extra column', () => {
    const { rows } = reconcile([shotgun], [dice, diceOnly], {}, { reference: REFERENCE });
    const table = projectTable(rows);

    expect(table.headers).toEqual([
      'event_name',
      'event_date',
      'artist',
      'venue',
      'shotgun_tickets_sold',
      'dice_tickets_sold',
      'shotgun_event_id',
      'dice_event_id',
      'dice_city',
      'dice_country',
      'dice_currency',
      'dice_gross_total',
      'dice_sell_through_pct',
      'dice_status',
      'match_method',
      'match_score',
      'shotgun_capacity',
      'shotgun_city',
      'shotgun_country',
      'shotgun_currency',
      'shotgun_gross_total',
      'shotgun_sell_through_pct',
      'shotgun_status',
    ]);
    expect(table.rows[0]).toEqual([
      'Justice', '2025-09-20', 'Justice', '', null, 50, null, 'dice-2',
      null, null, null, null, null, 'on_sale', 'dice_only', null,
      null, null, null, null, null, null, null,
    ]);
    expect(table.rows[1].slice(0, 8)).toEqual(['Daft Punk', '2025-10-10', 'Daft Punk', 'Accor Arena', 120, 80, 'sg-1', 'dice-1']);
  });
});
